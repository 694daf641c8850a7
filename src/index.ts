export * from "./infra/index.ts";
export * from "./documents/index.ts";
export * from "./skills/index.ts";
export * from "./subagents/index.ts";
export * from "./rules/index.ts";
export * from "./intent/index.ts";
export * from "./lint/index.ts";
export * from "./mcp/index.ts";
export * from "./scaffold/index.ts";
export {
  installSkills,
  listBundledSkills,
  defaultInstallDir,
  formatInstallBanner,
  BUNDLED_SKILLS_DIR,
} from "./installer/index.ts";
export type { InstallOptions } from "./installer/index.ts";
