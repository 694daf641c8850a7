export {
  splitFrontmatter,
  parseFrontmatter,
  parseDocument,
  serializeDocument,
  extractFirstParagraph,
  extractTitle,
} from "./frontmatter.ts";
export type { FrontmatterData } from "./frontmatter.ts";
export { isKebabCase, toKebabCase, NAME_PATTERN, MAX_NAME_LENGTH } from "./naming.ts";
export {
  SkillFrontmatterSchema,
  AgentFrontmatterSchema,
  RuleFrontmatterSchema,
  ToolListSchema,
  SKILL_KEYS,
  AGENT_KEYS,
  RULE_KEYS,
  PERMISSION_MODES,
  MEMORY_SCOPES,
  MODEL_TIERS,
  ModelHintSchema,
  isModelHint,
  describeIssues,
} from "./schemas.ts";
export type { SkillFrontmatter, AgentFrontmatter, RuleFrontmatter } from "./schemas.ts";
export { canOverride } from "./source.ts";
export type { DocumentSource } from "./source.ts";
