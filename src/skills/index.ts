export { loadAllSkills, parseSkillFile, scanSkillDir, SKILL_FILE } from "./loader.ts";
export { SkillRegistry, substituteArguments } from "./registry.ts";
export type { SkillDefinition } from "./types.ts";
