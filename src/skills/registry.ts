/**
 * SkillRegistry — manage discovered skills.
 *
 * Handles priority resolution (project > user > builtin), metadata listing
 * for prompt injection, and body loading with $ARGUMENTS substitution.
 */
import { readFileSync } from "node:fs";
import { getLogger } from "../infra/logger.ts";
import { errorToString } from "../infra/errors.ts";
import { splitFrontmatter } from "../documents/frontmatter.ts";
import { canOverride } from "../documents/source.ts";
import type { SkillDefinition } from "./types.ts";

const logger = getLogger("skill_registry");

/**
 * Substitute $ARGUMENTS, $ARGUMENTS[N] and $N in a skill body.
 * Indices past the last argument become empty. Without a bare $ARGUMENTS
 * the full argument string is appended.
 */
export function substituteArguments(body: string, args?: string): string {
  if (!args) return body;

  const argParts = args.trim().split(/\s+/);
  const result = body.replace(
    /\$ARGUMENTS\[(\d+)\]|\$(\d+)/g,
    (_match, indexed: string | undefined, positional: string | undefined) =>
      argParts[Number(indexed ?? positional)] ?? "",
  );

  if (result.includes("$ARGUMENTS")) {
    return result.replace(/\$ARGUMENTS/g, () => args);
  }
  return `${result}\n\nARGUMENTS: ${args}`;
}

export class SkillRegistry {
  private skills = new Map<string, SkillDefinition>();

  /** Register skills with priority resolution. */
  registerMany(skills: SkillDefinition[]): void {
    for (const skill of skills) {
      const existing = this.skills.get(skill.name);
      if (existing && !canOverride(existing.source, skill.source)) {
        continue; // keep higher-priority version
      }
      this.skills.set(skill.name, skill);
      if (existing) {
        logger.info({ name: skill.name, source: skill.source, replaced: existing.source }, "skill_override");
      }
    }
  }

  /** Get skill by name. Returns null if not found. */
  get(name: string): SkillDefinition | null {
    return this.skills.get(name) ?? null;
  }

  has(name: string): boolean {
    return this.skills.has(name);
  }

  /** Metadata listing for a system prompt. Respects character budget. */
  getMetadataForPrompt(budgetChars: number): string {
    const lines: string[] = ["Available skills:"];
    let totalChars = lines.join("").length;

    for (const skill of this.skills.values()) {
      if (skill.disableModelInvocation) continue;

      const line = `- ${skill.name}: ${skill.description}`;
      if (totalChars + line.length + 1 > budgetChars) {
        logger.warn({ name: skill.name, budget: budgetChars }, "skill_excluded_budget");
        break;
      }
      lines.push(line);
      totalChars += line.length + 1;
    }

    if (lines.length <= 1) return "";
    return lines.join("\n");
  }

  /** Load skill body with $ARGUMENTS substitution. Returns null when missing or unreadable. */
  loadBody(name: string, args?: string): string | null {
    const skill = this.skills.get(name);
    if (!skill) return null;

    try {
      const content = readFileSync(skill.bodyPath, "utf-8");
      const { body } = splitFrontmatter(content);
      return substituteArguments(body, args);
    } catch (err) {
      logger.warn({ name, error: errorToString(err) }, "skill_body_load_error");
      return null;
    }
  }

  /** All skills a user can invoke as a slash command. */
  listUserInvocable(): SkillDefinition[] {
    return [...this.skills.values()].filter((s) => s.userInvocable);
  }

  listAll(): SkillDefinition[] {
    return [...this.skills.values()];
  }
}
