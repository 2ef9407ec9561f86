/**
 * Nesting limit shared by syntax tree construction and rendering.
 */

export const DEFAULT_MAX_NESTING_DEPTH = 200;

/** A positive integer limit, else the default. */
export function resolveMaxNestingDepth(maxNestingDepth: number | undefined): number {
  const maxDepth = maxNestingDepth ?? DEFAULT_MAX_NESTING_DEPTH;
  return Number.isInteger(maxDepth) && maxDepth > 0 ? maxDepth : DEFAULT_MAX_NESTING_DEPTH;
}

export function throwNestingLimitExceeded(depth: number, maxDepth: number): never {
  throw new Error(`Markdown nesting limit exceeded: depth ${depth} > maxDepth ${maxDepth}`);
}
