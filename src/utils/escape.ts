/**
 * Typst escaping helpers.
 *
 * Markup mode and string literals have different escape rules, so each
 * output position picks the matching helper. Verbatim regions (raw code)
 * must never pass through either.
 */

const MARKUP_SPECIAL_CHARS = /[#$\\{}[\]_*"`]/g;
const STRING_SPECIAL_CHARS = /[\\"]/g;

/**
 * Prefix every Typst markup-significant character with a single backslash.
 */
export function escapeMarkup(text: string): string {
  return text.replace(MARKUP_SPECIAL_CHARS, '\\$&');
}

/**
 * Escape a value for use inside a double-quoted Typst string literal.
 */
export function escapeString(text: string): string {
  return text.replace(STRING_SPECIAL_CHARS, '\\$&');
}
