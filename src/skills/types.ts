import type { DocumentSource } from "../documents/source.ts";

/** Metadata + body reference for a discovered skill. */
export interface SkillDefinition {
  name: string;
  description: string;
  disableModelInvocation: boolean;
  userInvocable: boolean;
  allowedTools?: string[];
  context: "inline" | "fork";
  agent?: string;         // subagent type used when context is "fork"
  model?: string;
  argumentHint?: string;
  bodyPath: string;
  source: DocumentSource;
}

export type { SkillFrontmatter } from "../documents/schemas.ts";
