/**
 * Line-oriented text helpers shared by the slide and list renderers.
 */

/**
 * Prefix every non-empty line with `indent`. Empty lines stay empty so the
 * output carries no trailing whitespace.
 */
export function indentLines(text: string, indent = '  '): string {
  return splitLines(text)
    .map((line) => (line ? `${indent}${line}` : line))
    .join('\n');
}

/**
 * Split on newlines without producing a trailing empty entry for a final
 * line terminator.
 */
export function splitLines(text: string): string[] {
  if (!text) return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/** Length of the longest run of `char` in `text`. */
export function longestRun(text: string, char: string): number {
  let longest = 0;
  let current = 0;
  for (const c of text) {
    current = c === char ? current + 1 : 0;
    if (current > longest) longest = current;
  }
  return longest;
}
