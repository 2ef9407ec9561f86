/**
 * Render context — tracks recursion depth while walking a syntax tree.
 */

import type { SyntaxNode } from '../model/SyntaxNode';
import { resolveMaxNestingDepth, throwNestingLimitExceeded } from '../utils/nesting';

export { DEFAULT_MAX_NESTING_DEPTH } from '../utils/nesting';

export interface RenderContext {
  /** Depth of the node being rendered; the root is 0. */
  depth: number;
  /** Deepest nesting allowed before rendering aborts. */
  maxDepth: number;
}

export interface RenderContextOptions {
  maxNestingDepth?: number;
}

/** Renders a child sequence; passed into per-kind renderers to avoid circular imports. */
export type ChildRenderer = (nodes: readonly SyntaxNode[], ctx: RenderContext) => string;

export function createRenderContext(options: RenderContextOptions = {}): RenderContext {
  return { depth: 0, maxDepth: resolveMaxNestingDepth(options.maxNestingDepth) };
}

/**
 * Context for a node one level deeper. Throws once the depth limit is passed.
 */
export function descend(ctx: RenderContext): RenderContext {
  if (ctx.depth >= ctx.maxDepth) {
    throwNestingLimitExceeded(ctx.depth + 1, ctx.maxDepth);
  }
  return { ...ctx, depth: ctx.depth + 1 };
}
