/**
 * Configuration schemas and types.
 * Separated to avoid circular dependencies between config.ts and config-loader.ts.
 */
import { z } from "zod";

/**
 * Preprocess booleans coming from env var interpolation.
 * YAML ${VAR:-false} produces the string "false", which z.coerce.boolean()
 * would turn into true.
 */
function coerceBooleanString(val: unknown): unknown {
  if (typeof val === "string") {
    if (val === "true") return true;
    if (val === "false" || val === "") return false;
  }
  return val;
}

export const PathsConfigSchema = z.object({
  projectDir: z.string().default(".claude"),
  userDir: z.string().default("~/.claude"),
});

export const ScaffoldConfigSchema = z.object({
  defaultModel: z.string().default("sonnet"),
  force: z.preprocess(coerceBooleanString, z.boolean().default(false)),
});

export const LintConfigSchema = z.object({
  requireTriggerExamples: z.preprocess(coerceBooleanString, z.boolean().default(true)),
  maxDescriptionLength: z.coerce.number().int().positive().default(1024),
});

export const PromptConfigSchema = z.object({
  skillBudgetChars: z.coerce.number().int().positive().default(8000),
});

export const SettingsSchema = z.object({
  paths: PathsConfigSchema.default({}),
  scaffold: ScaffoldConfigSchema.default({}),
  lint: LintConfigSchema.default({}),
  prompt: PromptConfigSchema.default({}),
  logLevel: z.string().default("info"),
  dataDir: z.string().default("~/.metaskill"),
  logConsoleEnabled: z.preprocess(coerceBooleanString, z.boolean().default(false)),
  logFileEnabled: z.preprocess(coerceBooleanString, z.boolean().default(true)),
  nodeEnv: z.string().default("development"), // development | production | test
});

export type PathsConfig = z.infer<typeof PathsConfigSchema>;
export type ScaffoldConfig = z.infer<typeof ScaffoldConfigSchema>;
export type LintConfig = z.infer<typeof LintConfigSchema>;
export type PromptConfig = z.infer<typeof PromptConfigSchema>;
export type Settings = z.infer<typeof SettingsSchema>;
