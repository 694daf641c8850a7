export type Severity = "error" | "warning";

export type LintCode =
  // errors
  | "invalid-frontmatter"
  | "missing-frontmatter"
  | "missing-name"
  | "missing-description"
  | "invalid-name"
  | "duplicate-name"
  | "name-mismatch"
  | "schema"
  | "invalid-mcp-json"
  // warnings
  | "no-trigger-examples"
  | "description-too-long"
  | "unknown-key"
  | "empty-body"
  | "rule-missing-title";

export interface LintIssue {
  file: string;
  severity: Severity;
  code: LintCode;
  message: string;
}

export interface LintReport {
  issues: LintIssue[];
  errorCount: number;
  warningCount: number;
  checkedFiles: number;
}

export interface LintOptions {
  requireTriggerExamples: boolean;
  maxDescriptionLength: number;
}

export type DocumentKind = "skill" | "agent" | "rule";
