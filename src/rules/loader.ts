/**
 * RuleLoader — recursive scan of rules/ directories.
 *
 * Rules need no frontmatter. When present it may carry `paths` globs.
 * The title is the first `#` heading, falling back to the file name.
 */
import { existsSync, readdirSync, readFileSync } from "node:fs";
import path from "node:path";
import { getLogger } from "../infra/logger.ts";
import { errorToString } from "../infra/errors.ts";
import { parseDocument, extractTitle } from "../documents/frontmatter.ts";
import { RuleFrontmatterSchema, describeIssues } from "../documents/schemas.ts";
import type { DocumentSource } from "../documents/source.ts";
import type { RuleDefinition } from "./types.ts";

const logger = getLogger("rule_loader");

export function parseRuleFile(filePath: string, name: string, source: DocumentSource): RuleDefinition | null {
  try {
    const { data, body } = parseDocument(readFileSync(filePath, "utf-8"));
    const parsed = RuleFrontmatterSchema.safeParse(data);
    if (!parsed.success) {
      logger.warn({ filePath, issues: describeIssues(parsed.error) }, "rule_frontmatter_invalid");
      return null;
    }

    return {
      name,
      title: extractTitle(body) ?? path.basename(name),
      paths: parsed.data.paths,
      body,
      filePath,
      source,
    };
  } catch (err) {
    logger.warn({ filePath, error: errorToString(err) }, "rule_parse_error");
    return null;
  }
}

/** List *.md files under dir, recursively, as paths relative to dir. */
function listMarkdown(dir: string, prefix = ""): string[] {
  const found: string[] = [];
  for (const entry of readdirSync(path.join(dir, prefix), { withFileTypes: true })) {
    const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      found.push(...listMarkdown(dir, rel));
    } else if (entry.isFile() && entry.name.endsWith(".md")) {
      found.push(rel);
    }
  }
  return found;
}

export function scanRuleDir(dir: string, source: DocumentSource): RuleDefinition[] {
  if (!existsSync(dir)) return [];

  const rules: RuleDefinition[] = [];
  try {
    for (const rel of listMarkdown(dir).sort()) {
      const rule = parseRuleFile(path.join(dir, rel), rel.slice(0, -".md".length), source);
      if (rule) rules.push(rule);
    }
  } catch (err) {
    logger.warn({ dir, error: errorToString(err) }, "rule_dir_scan_error");
  }
  return rules;
}

/** Concatenate rules into one context block, title first. */
export function renderRulesForPrompt(rules: RuleDefinition[]): string {
  return rules
    .map((rule) => {
      const scope = rule.paths?.length ? `\n(Applies to: ${rule.paths.join(", ")})` : "";
      const body = rule.body.replace(/^#[ \t]+.*(?:\n+|$)/m, "").trim();
      return `## ${rule.title}${scope}\n\n${body}`;
    })
    .join("\n\n");
}
