/**
 * Node renderer — maps a syntax tree to Typst markup.
 *
 * Escaping happens only at text leaves and the image caption. Code blocks
 * and code spans are copied from the source untouched, except that a span
 * holding a backtick becomes a `#raw` string.
 */

import type { CodeBlockNode, SyntaxNode } from '../model/SyntaxNode';
import type { RenderContext, RenderContextOptions } from './RenderContext';
import { createRenderContext, descend } from './RenderContext';
import { renderList } from './ListRenderer';
import { renderTable } from './TableRenderer';
import { renderImage } from './ImageRenderer';
import { escapeMarkup, escapeString } from '../utils/escape';
import { longestRun } from '../utils/text';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function renderChildren(nodes: readonly SyntaxNode[], ctx: RenderContext): string {
  const childCtx = descend(ctx);
  return nodes.map((child) => renderNodeInContext(child, childCtx)).join('');
}

/**
 * Fence long enough that no backtick run inside the code can close it.
 */
function renderCodeBlock(node: CodeBlockNode): string {
  const fence = '`'.repeat(Math.max(3, longestRun(node.raw, '`') + 1));
  return `${fence}${node.language}\n${node.raw}\n${fence}\n\n`;
}

// ---------------------------------------------------------------------------
// Node Dispatch
// ---------------------------------------------------------------------------

function renderNodeInContext(node: SyntaxNode, ctx: RenderContext): string {
  switch (node.kind) {
    case 'document':
      return renderChildren(node.children, ctx).trim();
    case 'paragraph':
      return `${renderChildren(node.children, ctx).trim()}\n\n`;
    case 'text':
      return escapeMarkup(node.raw);
    case 'emphasis':
      return `_${renderChildren(node.children, ctx)}_`;
    case 'strong':
      return `*${renderChildren(node.children, ctx)}*`;
    case 'strikethrough':
      return `#strike[${renderChildren(node.children, ctx)}]`;
    case 'lineBreak':
      return '\\\n';
    case 'link':
      // Link text is already escaped by its text leaves
      return `#link("${node.url}")[${renderChildren(node.children, ctx)}]`;
    case 'image':
      return renderImage(node);
    case 'footnote':
      return `#footnote[${renderChildren(node.children, ctx).trim()}]`;
    case 'codeSpan':
      // A backtick would close the raw span early
      return node.raw.includes('`') ? `#raw("${escapeString(node.raw)}")` : `\`${node.raw}\``;
    case 'codeBlock':
      return renderCodeBlock(node);
    case 'blockQuote':
      return `#quote[${renderChildren(node.children, ctx).trim()}]\n\n`;
    case 'list':
      return renderList(node, ctx, renderChildren);
    case 'listItem':
      return renderChildren(node.children, ctx).trim();
    case 'heading':
      return `${'='.repeat(node.level)} ${renderChildren(node.children, ctx).trim()}\n\n`;
    case 'thematicBreak':
      return '#line(length: 100%)\n\n';
    case 'table':
      return renderTable(node, ctx, renderChildren);
    case 'tableCell':
      return renderChildren(node.children, ctx).trim();
    case 'unknown':
      return node.children ? renderChildren(node.children, ctx) : '';
  }
}

/**
 * Render a node and its subtree to Typst markup.
 *
 * Total over every node kind. Throws only when the tree nests deeper than
 * `maxNestingDepth`.
 */
export function renderNode(node: SyntaxNode, options: RenderContextOptions = {}): string {
  return renderNodeInContext(node, createRenderContext(options));
}
