/**
 * Table renderer — emits a Typst `#table` call with trailing content cells.
 *
 * Rows are not delimited explicitly; Typst wraps cells by the column count.
 */

import type { TableCellNode, TableNode } from '../model/SyntaxNode';
import type { ChildRenderer, RenderContext } from './RenderContext';
import { descend } from './RenderContext';

const FALLBACK_COLUMN_COUNT = 2;

/**
 * Column count: header cells, else cells of the first row, else 2.
 */
export function tableColumnCount(node: TableNode): number {
  if (node.header.length > 0) return node.header.length;
  if (node.rows.length > 0 && node.rows[0].length > 0) return node.rows[0].length;
  return FALLBACK_COLUMN_COUNT;
}

export function renderTable(node: TableNode, ctx: RenderContext, renderChildren: ChildRenderer): string {
  const cellCtx = descend(ctx);
  const renderCell = (cell: TableCellNode): string =>
    renderChildren(cell.children, cellCtx).trim();

  let result = `#table(columns: ${tableColumnCount(node)})`;
  for (const cell of node.header) {
    result += `[*${renderCell(cell)}*]`;
  }
  for (const row of node.rows) {
    for (const cell of row) {
      result += `[${renderCell(cell)}]`;
    }
  }
  return `${result}\n\n`;
}
