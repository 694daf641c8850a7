/**
 * SkillLoader — scan directories and parse SKILL.md files.
 *
 * Discovers skills from:
 *   skills/             (builtin, shipped with this package)
 *   ~/.claude/skills/   (user)
 *   .claude/skills/     (project)
 *
 * Each skill is a directory containing SKILL.md with YAML frontmatter + markdown body.
 */
import { existsSync, readdirSync, readFileSync } from "node:fs";
import path from "node:path";
import { getLogger } from "../infra/logger.ts";
import { errorToString } from "../infra/errors.ts";
import { parseDocument, extractFirstParagraph } from "../documents/frontmatter.ts";
import { isKebabCase } from "../documents/naming.ts";
import { SkillFrontmatterSchema, describeIssues } from "../documents/schemas.ts";
import type { DocumentSource } from "../documents/source.ts";
import type { SkillDefinition } from "./types.ts";

const logger = getLogger("skill_loader");

export const SKILL_FILE = "SKILL.md";

/** Parse a SKILL.md file into a SkillDefinition. Returns null (and logs) when unusable. */
export function parseSkillFile(
  filePath: string,
  dirName: string,
  source: DocumentSource,
): SkillDefinition | null {
  try {
    const content = readFileSync(filePath, "utf-8");
    const { data, body } = parseDocument(content);

    const parsed = SkillFrontmatterSchema.safeParse(data);
    if (!parsed.success) {
      logger.warn({ filePath, issues: describeIssues(parsed.error) }, "skill_frontmatter_invalid");
      return null;
    }
    const fm = parsed.data;
    const name = fm.name ?? dirName;

    if (!isKebabCase(name)) {
      logger.warn({ name, filePath }, "invalid_skill_name");
      return null;
    }

    return {
      name,
      description: fm.description ?? extractFirstParagraph(body),
      disableModelInvocation: fm["disable-model-invocation"] ?? false,
      userInvocable: fm["user-invocable"] ?? true,
      allowedTools: fm["allowed-tools"],
      context: fm.context ?? "inline",
      agent: fm.agent,
      model: fm.model,
      argumentHint: fm["argument-hint"],
      bodyPath: filePath,
      source,
    };
  } catch (err) {
    logger.warn({ filePath, error: errorToString(err) }, "skill_parse_error");
    return null;
  }
}

/** Scan a directory for skill subdirectories containing SKILL.md. */
export function scanSkillDir(dir: string, source: DocumentSource): SkillDefinition[] {
  if (!existsSync(dir)) return [];

  const skills: SkillDefinition[] = [];
  try {
    const entries = readdirSync(dir, { withFileTypes: true });
    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      const skillFile = path.join(dir, entry.name, SKILL_FILE);
      if (existsSync(skillFile)) {
        const skill = parseSkillFile(skillFile, entry.name, source);
        if (skill) {
          skills.push(skill);
          logger.debug({ name: skill.name, source }, "skill_discovered");
        }
      }
    }
  } catch (err) {
    logger.warn({ dir, error: errorToString(err) }, "skill_dir_scan_error");
  }
  return skills.sort((a, b) => a.name.localeCompare(b.name));
}

/** Load skills from every source, lowest priority first. */
export function loadAllSkills(dirs: Partial<Record<DocumentSource, string>>): SkillDefinition[] {
  const order: DocumentSource[] = ["builtin", "user", "project"];
  return order.flatMap((source) => {
    const dir = dirs[source];
    return dir ? scanSkillDir(dir, source) : [];
  });
}
