/** Document names: lowercase letters, numbers and single hyphens, max 64 chars. */
export const NAME_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;
export const MAX_NAME_LENGTH = 64;

export function isKebabCase(name: string): boolean {
  return name.length <= MAX_NAME_LENGTH && NAME_PATTERN.test(name);
}

/**
 * Normalize free text into a kebab-case name.
 * camelCase boundaries split only before a capitalized word, so
 * "codeReviewer" becomes "code-reviewer" while "iOS Engineer" stays "ios-engineer".
 */
export function toKebabCase(text: string): string {
  return text
    .replace(/([a-z0-9])([A-Z][a-z])/g, "$1-$2")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, MAX_NAME_LENGTH)
    .replace(/-+$/, "");
}
