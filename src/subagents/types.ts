import type { DocumentSource } from "../documents/source.ts";
import type { PERMISSION_MODES, MEMORY_SCOPES } from "../documents/schemas.ts";

export type PermissionMode = (typeof PERMISSION_MODES)[number];
export type MemoryScope = (typeof MEMORY_SCOPES)[number];

/** Metadata + prompt for a discovered subagent. */
export interface SubagentDefinition {
  name: string;           // "code-reviewer", "ios-engineer"
  description: string;    // delegation trigger text
  tools: string[];        // ["*"] means inherit every tool
  disallowedTools: string[];
  prompt: string;         // persona body (markdown)
  source: DocumentSource;
  filePath: string;
  model?: string;         // tier ("sonnet", "haiku", "inherit") or full model id
  permissionMode?: PermissionMode;
  maxTurns?: number;
  memory?: MemoryScope;
  mcpServers?: string[];
  skills?: string[];
}

export type { AgentFrontmatter as SubagentFrontmatter } from "../documents/schemas.ts";
