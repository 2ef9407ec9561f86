/**
 * Front matter extraction.
 *
 * Only flat `key: value` lines are understood. This is not a YAML parser:
 * values are kept as trimmed strings, quotes included.
 */

export type FrontMatter = ReadonlyMap<string, string>;

export interface FrontMatterResult {
  frontMatter: FrontMatter;
  /** Input with the front matter block removed, otherwise untouched. */
  body: string;
}

// Opening `---`, lazily matched block, closing `---` followed by a newline or end of input.
const FRONT_MATTER_RE = /^---[ \t]*\r?\n(?:([\s\S]*?)\r?\n)?---[ \t]*(?:\r?\n|$)/;

/**
 * Parse the lines of a front matter block. Lines without a colon or with an
 * empty key are skipped.
 */
export function parseFrontMatterBlock(block: string): Map<string, string> {
  const result = new Map<string, string>();
  for (const line of block.split(/\r?\n/)) {
    const colon = line.indexOf(':');
    if (colon === -1) continue;

    const key = line.slice(0, colon).trim().toLowerCase();
    if (!key) continue;

    result.set(key, line.slice(colon + 1).trim());
  }
  return result;
}

/**
 * Split a leading `---`-delimited block off the raw input.
 * Never throws; without a closing delimiter the whole input is body.
 */
export function extractFrontMatter(raw: string): FrontMatterResult {
  const match = FRONT_MATTER_RE.exec(raw);
  if (!match) {
    return { frontMatter: new Map(), body: raw };
  }

  return {
    frontMatter: parseFrontMatterBlock(match[1] ?? ''),
    body: raw.slice(match[0].length),
  };
}
