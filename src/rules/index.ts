export { parseRuleFile, scanRuleDir, renderRulesForPrompt } from "./loader.ts";
export type { RuleDefinition } from "./types.ts";
