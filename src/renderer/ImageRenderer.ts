/**
 * Image renderer.
 *
 * URLs are written unchanged inside the string literal; only the caption is
 * escaped, since it is rendered as markup.
 */

import type { ImageNode } from '../model/SyntaxNode';
import { escapeMarkup } from '../utils/escape';

/**
 * A bare `#image` call, or a `#figure` captioned with the alt text when the
 * image has one.
 */
export function renderImage(node: ImageNode): string {
  if (!node.alt) {
    return `#image("${node.url}")`;
  }
  return `#figure(image("${node.url}"), caption: [${escapeMarkup(node.alt)}])`;
}
