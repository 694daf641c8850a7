import type { DocumentSource } from "../documents/source.ts";

/** A coding-conventions document loaded as host context. */
export interface RuleDefinition {
  name: string;          // file path relative to the rules dir, without .md
  title: string;
  paths?: string[];      // globs that scope the rule; absent means always loaded
  body: string;
  filePath: string;
  source: DocumentSource;
}
