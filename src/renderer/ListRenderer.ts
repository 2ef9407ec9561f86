/**
 * List renderer — one Typst list line per item.
 */

import type { ListItemNode, ListNode } from '../model/SyntaxNode';
import type { ChildRenderer, RenderContext } from './RenderContext';
import { descend } from './RenderContext';
import { escapeMarkup } from '../utils/escape';
import { splitLines } from '../utils/text';

/** Task list checkbox kept as literal text, e.g. `\[x\] `. */
function taskPrefix(item: ListItemNode): string {
  if (item.checked === undefined) return '';
  return escapeMarkup(item.checked ? '[x] ' : '[ ] ');
}

/**
 * Render a list node.
 *
 * Ordered lists use `+`, unordered lists `-`. Item content is trimmed; any
 * lines after the first (nested lists, extra paragraphs) are indented so
 * Typst keeps them inside the item. Blocks inside an item are separated by
 * a blank line only in loose lists.
 */
export function renderList(node: ListNode, ctx: RenderContext, renderChildren: ChildRenderer): string {
  const marker = node.ordered ? '+' : '-';
  const itemCtx = descend(ctx);

  const items = node.children.map((item) => {
    const content = item.children
      .map((child) => renderChildren([child], itemCtx).trim())
      .filter((block) => block !== '')
      .join(node.tight ? '\n' : '\n\n');
    const [first = '', ...rest] = splitLines(content);
    const continuation = rest.map((line) => (line ? `  ${line}` : line));
    return [`${marker} ${taskPrefix(item)}${first}`, ...continuation].join('\n');
  });

  return `${items.join('\n')}\n\n`;
}
