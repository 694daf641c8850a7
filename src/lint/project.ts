/**
 * Project linter — walk a host config root and check every document.
 *
 *   <root>/skills/<name>/SKILL.md
 *   <root>/agents/<name>.md
 *   <root>/rules/**\/*.md
 *   <projectDir>/.mcp.json   (optional)
 */
import { existsSync, readdirSync, readFileSync, type Dirent } from "node:fs";
import path from "node:path";
import { getLogger } from "../infra/logger.ts";
import { parseDocument } from "../documents/frontmatter.ts";
import { SKILL_FILE } from "../skills/loader.ts";
import { DEFAULT_LINT_OPTIONS, validateDocument, validateMcpJson, type DocumentIssue } from "./validator.ts";
import type { DocumentKind, LintIssue, LintOptions, LintReport } from "./types.ts";

const logger = getLogger("lint");

interface DocumentFile {
  kind: DocumentKind;
  filePath: string;
  expectedName: string;
}

function listDir(dir: string): Dirent[] {
  if (!existsSync(dir)) return [];
  return readdirSync(dir, { withFileTypes: true }).sort((a, b) => a.name.localeCompare(b.name));
}

function collectRules(dir: string, prefix = ""): DocumentFile[] {
  const files: DocumentFile[] = [];
  for (const entry of listDir(path.join(dir, prefix))) {
    const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...collectRules(dir, rel));
    } else if (entry.isFile() && entry.name.endsWith(".md")) {
      files.push({ kind: "rule", filePath: path.join(dir, rel), expectedName: rel.slice(0, -".md".length) });
    }
  }
  return files;
}

/** Every document under a host config root, in a stable order. */
export function collectDocuments(root: string): DocumentFile[] {
  const skills = listDir(path.join(root, "skills"))
    .filter((entry) => entry.isDirectory() && existsSync(path.join(root, "skills", entry.name, SKILL_FILE)))
    .map((entry): DocumentFile => ({
      kind: "skill",
      filePath: path.join(root, "skills", entry.name, SKILL_FILE),
      expectedName: entry.name,
    }));

  const agents = listDir(path.join(root, "agents"))
    .filter((entry) => entry.isFile() && entry.name.endsWith(".md"))
    .map((entry): DocumentFile => ({
      kind: "agent",
      filePath: path.join(root, "agents", entry.name),
      expectedName: path.basename(entry.name, ".md"),
    }));

  return [...skills, ...agents, ...collectRules(path.join(root, "rules"))];
}

/** Declared `name` of a document, if it parses. */
function declaredName(content: string): string | null {
  try {
    const name = parseDocument(content).data["name"];
    return typeof name === "string" && name !== "" ? name : null;
  } catch {
    return null; // reported as invalid-frontmatter by validateDocument
  }
}

/** Duplicate names within one directory (skills/ or agents/). */
function findDuplicates(entries: { kind: DocumentKind; filePath: string; name: string | null }[]): LintIssue[] {
  const issues: LintIssue[] = [];
  const seen = new Map<string, string>();
  for (const entry of entries) {
    if (!entry.name || entry.kind === "rule") continue;
    const key = `${entry.kind}:${entry.name}`;
    const first = seen.get(key);
    if (first) {
      issues.push({
        file: entry.filePath,
        severity: "error",
        code: "duplicate-name",
        message: `${entry.kind} name "${entry.name}" is already used by ${first}`,
      });
    } else {
      seen.set(key, entry.filePath);
    }
  }
  return issues;
}

export function summarize(issues: LintIssue[], checkedFiles: number): LintReport {
  return {
    issues,
    errorCount: issues.filter((i) => i.severity === "error").length,
    warningCount: issues.filter((i) => i.severity === "warning").length,
    checkedFiles,
  };
}

export function lintProject(
  root: string,
  options: { lint?: LintOptions; mcpConfigPath?: string } = {},
): LintReport {
  const lintOptions = options.lint ?? DEFAULT_LINT_OPTIONS;
  const documents = collectDocuments(root);
  const issues: LintIssue[] = [];
  const named: { kind: DocumentKind; filePath: string; name: string | null }[] = [];
  const attach = (file: string) => (i: DocumentIssue): LintIssue => ({ file, ...i });

  for (const doc of documents) {
    const content = readFileSync(doc.filePath, "utf-8");
    issues.push(...validateDocument(doc.kind, content, doc.expectedName, lintOptions).map(attach(doc.filePath)));
    named.push({ kind: doc.kind, filePath: doc.filePath, name: declaredName(content) });
  }
  issues.push(...findDuplicates(named));

  let checkedFiles = documents.length;
  if (options.mcpConfigPath && existsSync(options.mcpConfigPath)) {
    const content = readFileSync(options.mcpConfigPath, "utf-8");
    issues.push(...validateMcpJson(content).map(attach(options.mcpConfigPath)));
    checkedFiles++;
  }

  const report = summarize(issues, checkedFiles);
  logger.info(
    { root, files: report.checkedFiles, errors: report.errorCount, warnings: report.warningCount },
    "lint_finished",
  );
  return report;
}

/** One `path: severity code message` line per issue, then totals. */
export function formatReport(report: LintReport, cwd = process.cwd()): string {
  const lines = report.issues.map((i) => {
    const file = path.relative(cwd, i.file) || i.file;
    return `${file}: ${i.severity} ${i.code} ${i.message}`;
  });
  lines.push(
    `${report.checkedFiles} file(s) checked: ${report.errorCount} error(s), ${report.warningCount} warning(s)`,
  );
  return lines.join("\n");
}
