/**
 * Markdown → Typst slide deck conversion.
 */

import { buildDeck } from '../model/Deck';
import type { FrontMatter } from '../parser/FrontMatterParser';
import { assembleDocument } from '../renderer/DocumentRenderer';
import type { HeaderOptions } from '../renderer/DocumentRenderer';
import { createAstConverter, renderSlide } from '../renderer/SlideRenderer';
import type { BodyConverter } from '../renderer/SlideRenderer';
import { createPandocConverter } from '../utils/pandoc';
import type { PandocOptions } from '../utils/pandoc';
import type { ConversionReporter } from './Reporter';
import { describeError, silentReporter } from './Reporter';

export type ConversionBackend = 'ast' | 'pandoc' | BodyConverter;

export interface ConvertOptions extends HeaderOptions {
  /**
   * Slide body converter.
   * - ast: in-process parser and renderer (default)
   * - pandoc: external `pandoc` process per slide
   * - a custom converter function
   */
  backend?: ConversionBackend;
  /** Options for the pandoc backend. */
  pandoc?: PandocOptions;
  /** Deepest markdown nesting the ast backend renders. */
  maxNestingDepth?: number;
  /** Status sink. Defaults to silent. */
  reporter?: ConversionReporter;
  onSlideError?: (index: number, error: unknown) => void;
}

export interface ConversionResult {
  output: string;
  frontMatter: FrontMatter;
  slideCount: number;
  /** Indexes of slides replaced by a failure placeholder. */
  failedSlides: number[];
}

function resolveBackend(options: ConvertOptions): BodyConverter {
  const backend = options.backend ?? 'ast';
  if (typeof backend === 'function') return backend;
  if (backend === 'pandoc') return createPandocConverter(options.pandoc);
  return createAstConverter({ maxNestingDepth: options.maxNestingDepth });
}

/**
 * Convert a markdown document, front matter included, into a complete
 * Typst document. Slides render in source order; a failing slide is
 * replaced by a placeholder and reported, never aborting the document.
 */
export function convertMarkdownToTypst(raw: string, options: ConvertOptions = {}): ConversionResult {
  const reporter = options.reporter ?? silentReporter;
  const deck = buildDeck(raw);
  const convertBody = resolveBackend(options);
  const failedSlides: number[] = [];
  const total = deck.slides.length;

  reporter.info(`Found ${total} slides`);

  const blocks = deck.slides.map((slide) => {
    reporter.progress?.(slide.index + 1, total);
    return renderSlide(slide, {
      convertBody,
      quoting: options.quoting,
      onSlideError: (index, error) => {
        failedSlides.push(index);
        reporter.warn(`Slide ${index + 1} failed to convert: ${describeError(error)}`);
        options.onSlideError?.(index, error);
      },
    });
  });

  return {
    output: assembleDocument(deck.frontMatter, blocks, options),
    frontMatter: deck.frontMatter,
    slideCount: total,
    failedSlides,
  };
}
