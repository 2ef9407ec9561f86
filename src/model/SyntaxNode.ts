/**
 * Syntax tree consumed by the node renderer.
 *
 * The tree is built from an mdast tree (see parser/MarkdownParser) so the
 * renderer never depends on the parser's node shapes directly.
 */

import type { FootnoteDefinition, ListItem, Nodes, Root, Table, TableCell } from 'mdast';
import { visit } from 'unist-util-visit';
import { resolveMaxNestingDepth, throwNestingLimitExceeded } from '../utils/nesting';

// ---------------------------------------------------------------------------
// Node Types
// ---------------------------------------------------------------------------

export interface DocumentNode {
  kind: 'document';
  children: SyntaxNode[];
}

export interface ParagraphNode {
  kind: 'paragraph';
  children: SyntaxNode[];
}

export interface TextNode {
  kind: 'text';
  raw: string;
}

export interface EmphasisNode {
  kind: 'emphasis';
  children: SyntaxNode[];
}

export interface StrongNode {
  kind: 'strong';
  children: SyntaxNode[];
}

export interface StrikethroughNode {
  kind: 'strikethrough';
  children: SyntaxNode[];
}

export interface LineBreakNode {
  kind: 'lineBreak';
}

export interface LinkNode {
  kind: 'link';
  url: string;
  children: SyntaxNode[];
}

export interface ImageNode {
  kind: 'image';
  url: string;
  /** Empty when the source image has no alt text. */
  alt: string;
}

/** Footnote body inlined at its reference. */
export interface FootnoteNode {
  kind: 'footnote';
  children: SyntaxNode[];
}

export interface CodeSpanNode {
  kind: 'codeSpan';
  raw: string;
}

export interface CodeBlockNode {
  kind: 'codeBlock';
  language: string;
  raw: string;
}

export interface BlockQuoteNode {
  kind: 'blockQuote';
  children: SyntaxNode[];
}

export interface ListNode {
  kind: 'list';
  ordered: boolean;
  /** No blank lines between or inside items. */
  tight: boolean;
  children: ListItemNode[];
}

export interface ListItemNode {
  kind: 'listItem';
  /** Task list state; absent for plain items. */
  checked?: boolean;
  children: SyntaxNode[];
}

export interface HeadingNode {
  kind: 'heading';
  level: number;
  children: SyntaxNode[];
}

export interface ThematicBreakNode {
  kind: 'thematicBreak';
}

export interface TableCellNode {
  kind: 'tableCell';
  children: SyntaxNode[];
}

export interface TableNode {
  kind: 'table';
  header: TableCellNode[];
  rows: TableCellNode[][];
}

/** Any parser node without a dedicated kind. `type` keeps the parser's name. */
export interface UnknownNode {
  kind: 'unknown';
  type: string;
  children?: SyntaxNode[];
}

export type SyntaxNode =
  | DocumentNode
  | ParagraphNode
  | TextNode
  | EmphasisNode
  | StrongNode
  | StrikethroughNode
  | LineBreakNode
  | LinkNode
  | ImageNode
  | FootnoteNode
  | CodeSpanNode
  | CodeBlockNode
  | BlockQuoteNode
  | ListNode
  | ListItemNode
  | HeadingNode
  | ThematicBreakNode
  | TableNode
  | TableCellNode
  | UnknownNode;

export type SyntaxNodeKind = SyntaxNode['kind'];

// ---------------------------------------------------------------------------
// mdast Conversion
// ---------------------------------------------------------------------------

export interface SyntaxTreeOptions {
  /** Deepest mdast nesting converted before giving up. */
  maxNestingDepth?: number;
}

/** Definitions looked up while converting, plus the depth limit. */
interface TreeIndex {
  /** Link definition identifier -> URL. */
  links: Map<string, string>;
  footnotes: Map<string, FootnoteDefinition>;
  /** Footnotes being inlined; a reference back into one stays as text. */
  expanding: Set<string>;
  maxDepth: number;
}

/**
 * Collect definitions in one pass. The walk stops at the depth limit, before
 * the visitor's own recursion gets deep.
 */
function indexTree(root: Root, maxDepth: number): TreeIndex {
  const index: TreeIndex = { links: new Map(), footnotes: new Map(), expanding: new Set(), maxDepth };
  const depths = new Map<object, number>();

  visit(root, (node, _index, parent) => {
    const depth = parent ? (depths.get(parent) ?? 0) + 1 : 0;
    if (depth > maxDepth) {
      throwNestingLimitExceeded(depth, maxDepth);
    }
    depths.set(node, depth);

    // First definition wins for duplicate labels
    if (node.type === 'definition' && !index.links.has(node.identifier)) {
      index.links.set(node.identifier, node.url);
    }
    if (node.type === 'footnoteDefinition' && !index.footnotes.has(node.identifier)) {
      index.footnotes.set(node.identifier, node);
    }
  });
  return index;
}

function convertChildren(nodes: readonly Nodes[], index: TreeIndex, depth: number): SyntaxNode[] {
  if (depth > index.maxDepth) {
    throwNestingLimitExceeded(depth, index.maxDepth);
  }
  return nodes.map((node) => convertNode(node, index, depth));
}

function convertListItem(item: ListItem, index: TreeIndex, depth: number): ListItemNode {
  const children = convertChildren(item.children, index, depth + 1);
  return typeof item.checked === 'boolean'
    ? { kind: 'listItem', checked: item.checked, children }
    : { kind: 'listItem', children };
}

/**
 * GFM tables keep the header as their first row.
 */
function convertTable(table: Table, index: TreeIndex, depth: number): TableNode {
  const [headerRow, ...bodyRows] = table.children;
  const toCells = (cells: readonly TableCell[]): TableCellNode[] =>
    cells.map((cell) => ({
      kind: 'tableCell',
      children: convertChildren(cell.children, index, depth + 3),
    }));

  return {
    kind: 'table',
    header: headerRow ? toCells(headerRow.children) : [],
    rows: bodyRows.map((row) => toCells(row.children)),
  };
}

/**
 * The definition's blocks, or the reference's source text when there is no
 * definition or the footnote refers back to itself.
 */
function convertFootnoteReference(identifier: string, label: string, index: TreeIndex, depth: number): SyntaxNode {
  const definition = index.footnotes.get(identifier);
  if (!definition || index.expanding.has(identifier)) {
    return { kind: 'text', raw: `[^${label}]` };
  }

  index.expanding.add(identifier);
  try {
    return { kind: 'footnote', children: convertChildren(definition.children, index, depth + 1) };
  } finally {
    index.expanding.delete(identifier);
  }
}

function convertNode(node: Nodes, index: TreeIndex, depth: number): SyntaxNode {
  const children = (nodes: readonly Nodes[]): SyntaxNode[] => convertChildren(nodes, index, depth + 1);

  switch (node.type) {
    case 'root':
      return { kind: 'document', children: children(node.children) };
    case 'paragraph':
      return { kind: 'paragraph', children: children(node.children) };
    case 'text':
      return { kind: 'text', raw: node.value };
    case 'emphasis':
      return { kind: 'emphasis', children: children(node.children) };
    case 'strong':
      return { kind: 'strong', children: children(node.children) };
    case 'delete':
      return { kind: 'strikethrough', children: children(node.children) };
    case 'break':
      return { kind: 'lineBreak' };
    case 'link':
      return { kind: 'link', url: node.url, children: children(node.children) };
    case 'linkReference': {
      const url = index.links.get(node.identifier);
      if (url === undefined) return { kind: 'unknown', type: node.type, children: children(node.children) };
      return { kind: 'link', url, children: children(node.children) };
    }
    case 'image':
      return { kind: 'image', url: node.url, alt: node.alt ?? '' };
    case 'imageReference': {
      const url = index.links.get(node.identifier);
      if (url === undefined) return { kind: 'unknown', type: node.type };
      return { kind: 'image', url, alt: node.alt ?? '' };
    }
    case 'footnoteReference':
      return convertFootnoteReference(node.identifier, node.label ?? node.identifier, index, depth);
    case 'footnoteDefinition':
      // Rendered where it is referenced
      return { kind: 'unknown', type: node.type };
    case 'inlineCode':
      return { kind: 'codeSpan', raw: node.value };
    case 'code':
      return { kind: 'codeBlock', language: node.lang ?? '', raw: node.value };
    case 'blockquote':
      return { kind: 'blockQuote', children: children(node.children) };
    case 'list':
      return {
        kind: 'list',
        ordered: node.ordered ?? false,
        tight: !node.spread,
        children: node.children.map((item) => convertListItem(item, index, depth + 1)),
      };
    case 'listItem':
      return convertListItem(node, index, depth);
    case 'heading':
      return { kind: 'heading', level: node.depth, children: children(node.children) };
    case 'thematicBreak':
      return { kind: 'thematicBreak' };
    case 'table':
      return convertTable(node, index, depth);
    case 'tableCell':
      return { kind: 'tableCell', children: children(node.children) };
    default:
      if ('children' in node) {
        return { kind: 'unknown', type: node.type, children: children(node.children) };
      }
      return { kind: 'unknown', type: node.type };
  }
}

/**
 * Convert a parsed mdast root into a document node.
 *
 * Throws when the tree nests deeper than `maxNestingDepth`.
 */
export function buildSyntaxTree(root: Root, options: SyntaxTreeOptions = {}): DocumentNode {
  const index = indexTree(root, resolveMaxNestingDepth(options.maxNestingDepth));
  return { kind: 'document', children: convertChildren(root.children, index, 1) };
}
