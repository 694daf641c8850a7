/**
 * Document validator — structural and stylistic checks on a single file.
 *
 * Each check returns issues without a `file`; callers attach the path.
 */
import type { z } from "zod";
import { parseDocument, extractTitle, type FrontmatterData } from "../documents/frontmatter.ts";
import { isKebabCase } from "../documents/naming.ts";
import {
  AgentFrontmatterSchema,
  SkillFrontmatterSchema,
  RuleFrontmatterSchema,
  AGENT_KEYS,
  SKILL_KEYS,
  RULE_KEYS,
  describeIssues,
} from "../documents/schemas.ts";
import { errorToString, DocumentValidationError, McpConfigError } from "../infra/errors.ts";
import { parseMcpConfig } from "../mcp/config.ts";
import type { DocumentKind, LintCode, LintIssue, LintOptions, Severity } from "./types.ts";

export type DocumentIssue = Omit<LintIssue, "file">;

export const DEFAULT_LINT_OPTIONS: LintOptions = {
  requireTriggerExamples: true,
  maxDescriptionLength: 1024,
};

const TRIGGER_PATTERNS: RegExp[] = [
  /["“][^"”]+["”]/,
  /\be\.g\./i,
  /\bfor example\b/i,
  /\bsuch as\b/i,
  /\buse when\b/i,
  /\bwhen the user\b/i,
  /\buse proactively\b/i,
  /\bexamples?:/i,
];

/** True when a description carries at least one concrete trigger example. */
export function hasTriggerExamples(description: string): boolean {
  return TRIGGER_PATTERNS.some((pattern) => pattern.test(description));
}

function issue(severity: Severity, code: LintCode, message: string): DocumentIssue {
  return { severity, code, message };
}

/** Name, description and body checks shared by skills and agents. */
function checkIdentity(
  data: FrontmatterData,
  body: string,
  expectedName: string | undefined,
  options: LintOptions,
): DocumentIssue[] {
  const issues: DocumentIssue[] = [];
  const name = data["name"];
  const description = data["description"];

  if (typeof name !== "string" || name.trim() === "") {
    issues.push(issue("error", "missing-name", "frontmatter has no non-empty `name`"));
  } else if (!isKebabCase(name)) {
    issues.push(issue("error", "invalid-name", `name "${name}" is not lowercase kebab-case (max 64 chars)`));
  } else if (expectedName !== undefined && name !== expectedName) {
    issues.push(issue("error", "name-mismatch", `name "${name}" does not match "${expectedName}"`));
  }

  if (typeof description !== "string" || description.trim() === "") {
    issues.push(issue("error", "missing-description", "frontmatter has no non-empty `description`"));
  } else {
    if (options.requireTriggerExamples && !hasTriggerExamples(description)) {
      issues.push(issue("warning", "no-trigger-examples", "description has no concrete trigger examples"));
    }
    if (description.length > options.maxDescriptionLength) {
      issues.push(
        issue(
          "warning",
          "description-too-long",
          `description is ${description.length} chars (limit ${options.maxDescriptionLength})`,
        ),
      );
    }
  }

  if (body.trim() === "") {
    issues.push(issue("warning", "empty-body", "document body is empty"));
  }
  return issues;
}

function checkUnknownKeys(data: FrontmatterData, known: readonly string[]): DocumentIssue[] {
  return Object.keys(data)
    .filter((key) => !known.includes(key))
    .map((key) => issue("warning", "unknown-key", `unknown frontmatter key "${key}"`));
}

function checkSchema(data: FrontmatterData, schema: z.ZodTypeAny): DocumentIssue[] {
  const result = schema.safeParse(data);
  if (result.success) return [];
  return describeIssues(result.error).map((msg) => issue("error", "schema", msg));
}

function parseOrIssue(
  content: string,
): { ok: true; data: FrontmatterData; body: string; hasFrontmatter: boolean } | { ok: false; issue: DocumentIssue } {
  try {
    return { ok: true, ...parseDocument(content) };
  } catch (err) {
    return { ok: false, issue: issue("error", "invalid-frontmatter", errorToString(err)) };
  }
}

/**
 * Validate one document's text.
 *
 * `expectedName` is the skill's directory name or the agent's file stem.
 */
export function validateDocument(
  kind: DocumentKind,
  content: string,
  expectedName?: string,
  options: LintOptions = DEFAULT_LINT_OPTIONS,
): DocumentIssue[] {
  const parsed = parseOrIssue(content);
  if (!parsed.ok) return [parsed.issue];
  const { data, body, hasFrontmatter } = parsed;

  if (kind === "rule") {
    const issues = [...checkSchema(data, RuleFrontmatterSchema), ...checkUnknownKeys(data, RULE_KEYS)];
    if (extractTitle(body) === null) {
      issues.push(issue("warning", "rule-missing-title", "rule has no `# ` title heading"));
    }
    if (body.trim() === "") {
      issues.push(issue("warning", "empty-body", "document body is empty"));
    }
    return issues;
  }

  if (!hasFrontmatter) {
    return [issue("error", "missing-frontmatter", `${kind} file has no YAML frontmatter`)];
  }

  const schema = kind === "skill" ? SkillFrontmatterSchema : AgentFrontmatterSchema;
  const known = kind === "skill" ? SKILL_KEYS : AGENT_KEYS;
  return [
    ...checkIdentity(data, body, expectedName, options),
    ...checkSchema(data, schema),
    ...checkUnknownKeys(data, known),
  ];
}

/** Validate .mcp.json text. */
export function validateMcpJson(content: string): DocumentIssue[] {
  try {
    parseMcpConfig(content);
    return [];
  } catch (err) {
    if (err instanceof McpConfigError) {
      return [issue("error", "invalid-mcp-json", err.message)];
    }
    throw err;
  }
}

/**
 * Throw when a rendered document has lint errors. Warnings are allowed.
 */
export function assertValidDocument(
  kind: DocumentKind,
  content: string,
  expectedName: string,
  options: LintOptions = DEFAULT_LINT_OPTIONS,
): void {
  const errors = validateDocument(kind, content, expectedName, options).filter((i) => i.severity === "error");
  if (errors.length > 0) {
    throw new DocumentValidationError(
      `Generated ${kind} "${expectedName}" is invalid`,
      errors.map((e) => `${e.code}: ${e.message}`),
    );
  }
}
