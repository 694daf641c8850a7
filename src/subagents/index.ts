/**
 * Subagent system — file-based agent persona definitions.
 */
export { SubagentRegistry } from "./registry.ts";
export { loadAllSubagents, parseSubagentFile, scanSubagentDir } from "./loader.ts";
export type { SubagentDefinition, SubagentFrontmatter, PermissionMode, MemoryScope } from "./types.ts";
