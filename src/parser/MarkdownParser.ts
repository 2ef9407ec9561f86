/**
 * Markdown parser using unified + remark-parse + remark-gfm.
 *
 * GFM adds tables, strikethrough and autolink literals on top of CommonMark.
 */

import { unified } from 'unified';
import remarkParse from 'remark-parse';
import remarkGfm from 'remark-gfm';
import type { Root } from 'mdast';
import { buildSyntaxTree } from '../model/SyntaxNode';
import type { DocumentNode, SyntaxTreeOptions } from '../model/SyntaxNode';

const processor = unified().use(remarkParse).use(remarkGfm);

/**
 * Parse a markdown string into an mdast tree.
 */
export function parseMdast(content: string): Root {
  return processor.parse(content);
}

/**
 * Parse a markdown string into the renderer's syntax tree.
 */
export function parseMarkdown(content: string, options: SyntaxTreeOptions = {}): DocumentNode {
  return buildSyntaxTree(parseMdast(content), options);
}
