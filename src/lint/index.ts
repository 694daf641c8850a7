export { lintProject, collectDocuments, formatReport, summarize } from "./project.ts";
export {
  validateDocument,
  validateMcpJson,
  assertValidDocument,
  hasTriggerExamples,
  DEFAULT_LINT_OPTIONS,
} from "./validator.ts";
export type { DocumentIssue } from "./validator.ts";
export type { LintCode, LintIssue, LintOptions, LintReport, Severity, DocumentKind } from "./types.ts";
