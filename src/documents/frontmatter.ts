/**
 * Frontmatter handling shared by skill, agent and rule documents.
 *
 * A document is a YAML block fenced by `---` lines followed by a markdown body.
 */
import yaml from "js-yaml";
import { DocumentParseError, errorToString } from "../infra/errors.ts";

export type FrontmatterData = Record<string, unknown>;

/** Split YAML frontmatter from markdown body. */
export function splitFrontmatter(content: string): { frontmatter: string | null; body: string } {
  const normalized = content.replace(/^\uFEFF/, "").replace(/\r\n/g, "\n");
  const match = normalized.match(/^---[ \t]*\n(?:([\s\S]*?)\n)?---[ \t]*(?:\n([\s\S]*))?$/);
  if (match) {
    return { frontmatter: match[1] ?? "", body: (match[2] ?? "").trim() };
  }
  return { frontmatter: null, body: normalized.trim() };
}

/** Parse a frontmatter block. Empty input yields an empty mapping. */
export function parseFrontmatter(text: string): FrontmatterData {
  let parsed: unknown;
  try {
    parsed = yaml.load(text);
  } catch (err) {
    throw new DocumentParseError(`Invalid YAML frontmatter: ${errorToString(err)}`);
  }

  if (parsed === undefined || parsed === null) return {};
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new DocumentParseError("Frontmatter must be a YAML mapping");
  }
  return Object.fromEntries(Object.entries(parsed));
}

/** Split and parse in one step. Documents without frontmatter get `{}`. */
export function parseDocument(content: string): { data: FrontmatterData; body: string; hasFrontmatter: boolean } {
  const { frontmatter, body } = splitFrontmatter(content);
  if (frontmatter === null) {
    return { data: {}, body, hasFrontmatter: false };
  }
  return { data: parseFrontmatter(frontmatter), body, hasFrontmatter: true };
}

/** Render frontmatter + body back into a markdown document. */
export function serializeDocument(frontmatter: FrontmatterData, body: string): string {
  const defined = Object.fromEntries(
    Object.entries(frontmatter).filter(([, value]) => value !== undefined),
  );
  const header = yaml.dump(defined, { lineWidth: -1, noRefs: true });
  return `---\n${header}---\n\n${body.trim()}\n`;
}

/** Extract first non-empty, non-heading paragraph as fallback description. */
export function extractFirstParagraph(body: string): string {
  for (const line of body.split("\n")) {
    const trimmed = line.trim();
    if (trimmed && !trimmed.startsWith("#")) {
      return trimmed.slice(0, 200);
    }
  }
  return "";
}

/** Text of the first level-1 heading, or null. */
export function extractTitle(body: string): string | null {
  for (const line of body.split("\n")) {
    const match = line.match(/^#\s+(.+?)\s*#*\s*$/);
    if (match?.[1]) return match[1];
  }
  return null;
}
