/** Where a document was discovered. Later sources override earlier ones. */
export type DocumentSource = "builtin" | "user" | "project";

const SOURCE_PRIORITY: Record<DocumentSource, number> = {
  builtin: 0,
  user: 1,
  project: 2,
};

/** True when a document from `incoming` may replace one from `existing`. */
export function canOverride(existing: DocumentSource, incoming: DocumentSource): boolean {
  return SOURCE_PRIORITY[incoming] >= SOURCE_PRIORITY[existing];
}
