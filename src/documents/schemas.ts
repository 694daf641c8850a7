/**
 * Frontmatter schemas for skill, agent and rule documents.
 *
 * Unknown keys pass through untouched; the linter reports them separately.
 */
import { z } from "zod";

/** Tool lists are written either as "Read, Grep, Bash" or as a YAML list. */
function splitToolList(val: unknown): unknown {
  if (typeof val === "string") {
    return val.split(",").map((t) => t.trim()).filter(Boolean);
  }
  return val;
}

export const ToolListSchema = z.preprocess(splitToolList, z.array(z.string().min(1)));

export const MODEL_TIERS = ["sonnet", "opus", "haiku", "inherit"] as const;
const MODEL_TIER_SET: ReadonlySet<string> = new Set(MODEL_TIERS);
const MODEL_ID_PATTERN = /^[A-Za-z0-9][\w.:@/]*-[\w.:@/-]*$/;

/** A tier the host resolves ("sonnet") or a full model id ("claude-sonnet-4-5"). */
export function isModelHint(value: string): boolean {
  return MODEL_TIER_SET.has(value) || MODEL_ID_PATTERN.test(value);
}

export const ModelHintSchema = z
  .string()
  .refine(isModelHint, { message: `expected ${MODEL_TIERS.join(", ")} or a model id` });

export const SkillFrontmatterSchema = z
  .object({
    name: z.string().optional(),
    description: z.string().optional(),
    "argument-hint": z.string().optional(),
    "allowed-tools": ToolListSchema.optional(),
    "user-invocable": z.boolean().optional(),
    "disable-model-invocation": z.boolean().optional(),
    context: z.enum(["fork", "inline"]).optional(),
    agent: z.string().optional(),
    model: ModelHintSchema.optional(),
  })
  .passthrough();

export const PERMISSION_MODES = ["default", "acceptEdits", "plan", "bypassPermissions", "dontAsk"] as const;
export const MEMORY_SCOPES = ["user", "project", "local"] as const;

export const AgentFrontmatterSchema = z
  .object({
    name: z.string().optional(),
    description: z.string().optional(),
    tools: ToolListSchema.optional(),
    disallowedTools: ToolListSchema.optional(),
    model: ModelHintSchema.optional(),
    permissionMode: z.enum(PERMISSION_MODES).optional(),
    maxTurns: z.number().int().positive().optional(),
    memory: z.enum(MEMORY_SCOPES).optional(),
    mcpServers: z.union([z.array(z.string()), z.record(z.string(), z.unknown())]).optional(),
    skills: ToolListSchema.optional(),
  })
  .passthrough();

export const RuleFrontmatterSchema = z
  .object({
    paths: z.preprocess(
      (val) => (typeof val === "string" ? [val] : val),
      z.array(z.string()),
    ).optional(),
  })
  .passthrough();

export const SKILL_KEYS: readonly string[] = Object.keys(SkillFrontmatterSchema.shape);
export const AGENT_KEYS: readonly string[] = Object.keys(AgentFrontmatterSchema.shape);
export const RULE_KEYS: readonly string[] = Object.keys(RuleFrontmatterSchema.shape);

export type SkillFrontmatter = z.infer<typeof SkillFrontmatterSchema>;
export type AgentFrontmatter = z.infer<typeof AgentFrontmatterSchema>;
export type RuleFrontmatter = z.infer<typeof RuleFrontmatterSchema>;

/** Flatten zod issues into "path: message" strings. */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}
