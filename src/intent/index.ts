export {
  classifyIntent,
  resolveClarification,
  findKeywords,
  AGENT_KEYWORDS,
  SKILL_KEYWORDS,
  CLARIFYING_QUESTION,
} from "./classifier.ts";
export type { CreationMode, IntentResult } from "./classifier.ts";
export { parseSlashCommand, routeCommand, COMMANDS } from "./router.ts";
export type { SlashCommand, CommandName } from "./router.ts";
