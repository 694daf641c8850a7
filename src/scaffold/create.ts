/**
 * Create-agent / create-skill / create-rule flows.
 *
 * Each flow: normalize the name, validate the draft, render, lint the
 * rendered text, then write it under the host config root.
 */
import path from "node:path";
import { z } from "zod";
import { DocumentValidationError } from "../infra/errors.ts";
import { getLogger } from "../infra/logger.ts";
import { isKebabCase, toKebabCase } from "../documents/naming.ts";
import { describeIssues } from "../documents/schemas.ts";
import { assertValidDocument, DEFAULT_LINT_OPTIONS } from "../lint/validator.ts";
import { SKILL_FILE } from "../skills/loader.ts";
import { renderAgent, renderRule, renderSkill } from "./render.ts";
import { writeGuarded } from "./writer.ts";
import {
  AgentDraftSchema,
  RuleDraftSchema,
  SkillDraftSchema,
  emptySummary,
  type AgentDraft,
  type RuleDraft,
  type ScaffoldOptions,
  type ScaffoldSummary,
  type SkillDraft,
} from "./types.ts";

const logger = getLogger("scaffold");

/** Normalize a user-supplied name; throws when nothing usable is left. */
export function normalizeName(raw: string): string {
  const name = toKebabCase(raw);
  if (!name || !isKebabCase(name)) {
    throw new DocumentValidationError(`Invalid name "${raw}": use letters, numbers and hyphens`);
  }
  return name;
}

function parseDraft<T extends z.ZodTypeAny>(schema: T, draft: unknown, label: string): z.infer<T> {
  const result = schema.safeParse(draft);
  if (!result.success) {
    throw new DocumentValidationError(`Invalid ${label} draft`, describeIssues(result.error));
  }
  return result.data;
}

export function agentPath(root: string, name: string): string {
  return path.join(root, "agents", `${name}.md`);
}

export function skillPath(root: string, name: string): string {
  return path.join(root, "skills", name, SKILL_FILE);
}

export function rulePath(root: string, name: string): string {
  return path.join(root, "rules", `${name}.md`);
}

export async function createAgent(
  input: AgentDraft,
  options: ScaffoldOptions,
  summary: ScaffoldSummary = emptySummary(),
): Promise<ScaffoldSummary> {
  const draft = parseDraft(AgentDraftSchema, input, "agent");
  const name = normalizeName(draft.name);
  const content = renderAgent({ ...draft, name, model: draft.model ?? options.defaultModel });

  assertValidDocument("agent", content, name, options.lint ?? DEFAULT_LINT_OPTIONS);
  await writeGuarded(agentPath(options.root, name), content, options, summary);
  logger.info({ name }, "agent_scaffolded");
  return summary;
}

export async function createSkill(
  input: SkillDraft,
  options: ScaffoldOptions,
  summary: ScaffoldSummary = emptySummary(),
): Promise<ScaffoldSummary> {
  const draft = parseDraft(SkillDraftSchema, input, "skill");
  const name = normalizeName(draft.name);
  const content = renderSkill({ ...draft, name });

  assertValidDocument("skill", content, name, options.lint ?? DEFAULT_LINT_OPTIONS);
  await writeGuarded(skillPath(options.root, name), content, options, summary);
  logger.info({ name }, "skill_scaffolded");
  return summary;
}

export async function createRule(
  input: RuleDraft,
  options: ScaffoldOptions,
  summary: ScaffoldSummary = emptySummary(),
): Promise<ScaffoldSummary> {
  const draft = parseDraft(RuleDraftSchema, input, "rule");
  const name = normalizeName(draft.name);
  const content = renderRule(draft);

  assertValidDocument("rule", content, name, options.lint ?? DEFAULT_LINT_OPTIONS);
  await writeGuarded(rulePath(options.root, name), content, options, summary);
  logger.info({ name }, "rule_scaffolded");
  return summary;
}
