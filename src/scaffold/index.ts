export { createAgent, createSkill, createRule, normalizeName, agentPath, skillPath, rulePath } from "./create.ts";
export { buildTeam, loadTeamCatalog, selectBlueprint, DEFAULT_CATALOG_PATH } from "./team.ts";
export type { BuildTeamOptions, BuildTeamResult } from "./team.ts";
export { renderAgent, renderSkill, renderRule, titleFromName } from "./render.ts";
export { writeGuarded } from "./writer.ts";
export { formatSummary } from "./summary.ts";
export { emptySummary } from "./types.ts";
export type {
  AgentDraft,
  SkillDraft,
  RuleDraft,
  TeamBlueprint,
  TeamCatalog,
  ConfirmOverwrite,
  ScaffoldOptions,
  ScaffoldSummary,
} from "./types.ts";
