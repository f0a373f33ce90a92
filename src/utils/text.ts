/**
 * Text normalization helpers used by prompt assembly and evidence matching.
 *
 * @module utils/text
 */

/**
 * Collapse runs of whitespace into single spaces and trim.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Fold text into a form suitable for substring evidence matching:
 * NFKC, lower case, punctuation replaced by spaces. Decimal points and
 * percent signs survive so that "3.5" and "20%" still match.
 */
export function normalizeForMatch(text: string): string {
  return text
    .normalize('NFKC')
    .toLowerCase()
    .replace(/\.(?!\d)/g, ' ')
    .replace(/[^\p{L}\p{N}.%]+/gu, ' ')
    .trim()
    .replace(/\s+/g, ' ');
}

/**
 * Split normalized text into tokens.
 */
export function tokenize(text: string): string[] {
  const normalized = normalizeForMatch(text);
  return normalized.length === 0 ? [] : normalized.split(' ');
}

/**
 * Token-bounded containment: `needle` occurs in `haystack` starting and
 * ending on token boundaries. Both arguments must already be normalized.
 */
export function containsPhrase(haystack: string, needle: string): boolean {
  if (needle.length === 0) return false;
  return ` ${haystack} `.includes(` ${needle} `);
}

/**
 * `conveyor_type` -> `conveyor type`
 */
export function readableFieldName(name: string): string {
  return name.replace(/[_\-.]+/g, ' ').trim();
}

/**
 * Truncate to `maxChars`, appending an ellipsis when shortened.
 */
export function truncate(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return `${text.slice(0, Math.max(0, maxChars - 3))}...`;
}
