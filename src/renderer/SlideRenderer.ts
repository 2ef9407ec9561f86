/**
 * Slide renderer — wraps one slide's converted body in the Typst slide
 * directives its heading level calls for.
 */

import type { SlideData } from '../model/Slide';
import { hasBody, slideBody, slideSource } from '../model/Slide';
import { parseMarkdown } from '../parser/MarkdownParser';
import { renderNode } from './NodeRenderer';
import type { RenderContextOptions } from './RenderContext';
import { escapeMarkup, escapeString } from '../utils/escape';
import { indentLines, splitLines } from '../utils/text';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Converts a markdown fragment to unindented Typst markup. */
export type BodyConverter = (markdown: string) => string;

/**
 * How values inside quoted Typst arguments are written.
 * - escape: backslashes and double quotes are escaped (default)
 * - verbatim: values are substituted unchanged
 */
export type QuotingMode = 'escape' | 'verbatim';

export interface SlideRendererOptions extends RenderContextOptions {
  /** Body converter. Defaults to the in-process markdown parser and node renderer. */
  convertBody?: BodyConverter;
  quoting?: QuotingMode;
  /** Called when a slide's body fails to convert; the slide is replaced by a placeholder. */
  onSlideError?: (index: number, error: unknown) => void;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function createAstConverter(options: RenderContextOptions = {}): BodyConverter {
  return (markdown) => renderNode(parseMarkdown(markdown, options), options);
}

export function quoteValue(value: string, quoting: QuotingMode = 'escape'): string {
  return quoting === 'escape' ? escapeString(value) : value;
}

/**
 * Comment out the slide's source so a failed conversion stays visible in
 * the output without breaking it.
 */
function createErrorPlaceholder(slide: SlideData): string {
  const commented = splitLines(slideSource(slide)).map((line) => (line ? `// ${line}` : '//'));
  return ['// Failed to convert markdown:', ...commented].join('\n');
}

function slideBlock(title: string, body: string, quoting: QuotingMode): string {
  return `#slide(title: "${quoteValue(title, quoting)}")[\n${indentLines(body)}\n]`;
}

function renderSlideContent(slide: SlideData, convert: BodyConverter, quoting: QuotingMode): string {
  switch (slide.level) {
    case 0:
      return convert(slideSource(slide));
    case 1: {
      const section = `#section[${escapeMarkup(slide.title)}]`;
      if (!hasBody(slide)) return section;
      return `${section}\n\n${slideBlock(slide.title, convert(slideBody(slide)), quoting)}`;
    }
    case 2:
      return slideBlock(slide.title, convert(slideBody(slide)), quoting);
  }
}

// ---------------------------------------------------------------------------
// Main Slide Render Function
// ---------------------------------------------------------------------------

/**
 * Render a slide to Typst.
 *
 * - level 0: the converted content, unwrapped
 * - level 1: a `#section` marker, plus a `#slide` block when the body is not blank
 * - level 2: a `#slide` block, even for a blank body
 *
 * Conversion errors never escape: `onSlideError` is notified and a commented
 * placeholder holding the slide's source is returned instead.
 */
export function renderSlide(slide: SlideData, options: SlideRendererOptions = {}): string {
  const convert = options.convertBody ?? createAstConverter(options);
  try {
    return renderSlideContent(slide, convert, options.quoting ?? 'escape');
  } catch (e) {
    options.onSlideError?.(slide.index, e);
    return createErrorPlaceholder(slide);
  }
}
