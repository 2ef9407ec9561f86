/**
 * Deck model — front matter plus the ordered slides of one document.
 */

import { extractFrontMatter } from '../parser/FrontMatterParser';
import type { FrontMatter } from '../parser/FrontMatterParser';
import { segmentSlides } from '../parser/SlideParser';
import type { SlideData } from './Slide';

export interface DeckData {
  frontMatter: FrontMatter;
  /** Markdown after the front matter block. */
  body: string;
  slides: SlideData[];
}

/**
 * Split raw markdown into front matter and slides.
 */
export function buildDeck(raw: string): DeckData {
  const { frontMatter, body } = extractFrontMatter(raw);
  return { frontMatter, body, slides: segmentSlides(body) };
}
