import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    env: {
      METASKILL_LOG_FILE_ENABLED: "false",
      METASKILL_LOG_CONSOLE_ENABLED: "false",
      NODE_ENV: "test",
    },
  },
});
