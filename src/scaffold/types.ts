/**
 * Draft and blueprint schemas for the scaffolder.
 *
 * Drafts are what the CLI (or a blueprint) gathers before a file is rendered.
 */
import { z } from "zod";
import { MEMORY_SCOPES, PERMISSION_MODES } from "../documents/schemas.ts";
import { McpServerSchema } from "../mcp/config.ts";
import type { LintOptions } from "../lint/types.ts";

export const AgentDraftSchema = z.object({
  name: z.string(),
  description: z.string(),
  model: z.string().optional(),
  tools: z.array(z.string()).optional(),
  disallowedTools: z.array(z.string()).optional(),
  permissionMode: z.enum(PERMISSION_MODES).optional(),
  maxTurns: z.number().int().positive().optional(),
  memory: z.enum(MEMORY_SCOPES).optional(),
  skills: z.array(z.string()).optional(),
  persona: z.string(),
  responsibilities: z.array(z.string()).default([]),
  rules: z.array(z.string()).default([]),
});

export const SkillDraftSchema = z.object({
  name: z.string(),
  description: z.string(),
  argumentHint: z.string().optional(),
  allowedTools: z.array(z.string()).optional(),
  userInvocable: z.boolean().optional(),
  disableModelInvocation: z.boolean().optional(),
  context: z.enum(["inline", "fork"]).optional(),
  agent: z.string().optional(),
  model: z.string().optional(),
  steps: z.array(z.string()).min(1),
  onFailure: z.string().optional(),
});

export const RuleDraftSchema = z.object({
  name: z.string(),
  title: z.string(),
  paths: z.array(z.string()).optional(),
  conventions: z.array(z.string()).min(1),
});

export const TeamBlueprintSchema = z.object({
  id: z.string(),
  title: z.string(),
  keywords: z.array(z.string()).default([]),
  agents: z.array(AgentDraftSchema).default([]),
  skills: z.array(SkillDraftSchema).default([]),
  rules: z.array(RuleDraftSchema).default([]),
  mcpServers: z.record(z.string(), McpServerSchema).default({}),
});

export const TeamCatalogSchema = z.object({
  fallback: z.string(),
  blueprints: z.array(TeamBlueprintSchema).min(1),
});

export type AgentDraft = z.input<typeof AgentDraftSchema>;
export type SkillDraft = z.input<typeof SkillDraftSchema>;
export type RuleDraft = z.input<typeof RuleDraftSchema>;
export type AgentDraftData = z.infer<typeof AgentDraftSchema>;
export type SkillDraftData = z.infer<typeof SkillDraftSchema>;
export type RuleDraftData = z.infer<typeof RuleDraftSchema>;
export type TeamBlueprint = z.infer<typeof TeamBlueprintSchema>;
export type TeamCatalog = z.infer<typeof TeamCatalogSchema>;

/** Asked before an existing file is replaced. Resolve true to overwrite. */
export type ConfirmOverwrite = (filePath: string) => Promise<boolean>;

export interface ScaffoldOptions {
  root: string;                 // host config dir, e.g. ".claude"
  force?: boolean;
  confirmOverwrite?: ConfirmOverwrite;
  defaultModel?: string;
  lint?: LintOptions;
}

export interface ScaffoldSummary {
  written: string[];
  overwritten: string[];
  skipped: string[];
}

export function emptySummary(): ScaffoldSummary {
  return { written: [], overwritten: [], skipped: [] };
}
