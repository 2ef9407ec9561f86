/**
 * Document assembly — the `typslides` header populated from front matter,
 * followed by the rendered slides.
 *
 * Directive names and argument layout are what the typslides template
 * expects; keep them stable.
 */

import type { FrontMatter } from '../parser/FrontMatterParser';
import type { QuotingMode } from './SlideRenderer';
import { quoteValue } from './SlideRenderer';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface HeaderOptions {
  /** Path of the template library in the `#import` line. */
  libraryPath?: string;
  /** Theme function passed to `#show`. */
  theme?: string;
  /** Slide aspect ratio understood by the theme. */
  ratio?: string;
  quoting?: QuotingMode;
}

export type ResolvedHeaderOptions = Required<HeaderOptions>;

export const DEFAULT_HEADER_OPTIONS: ResolvedHeaderOptions = {
  libraryPath: '../typslides/lib.typ',
  theme: 'typslides',
  ratio: '16-9',
  quoting: 'escape',
};

const DEFAULT_LOGO = 'img/logo.svg';
const DEFAULT_LOGO_ALT = 'img/alt.svg';

export function resolveHeaderOptions(options: HeaderOptions = {}): ResolvedHeaderOptions {
  return {
    libraryPath: options.libraryPath || DEFAULT_HEADER_OPTIONS.libraryPath,
    theme: options.theme || DEFAULT_HEADER_OPTIONS.theme,
    ratio: options.ratio || DEFAULT_HEADER_OPTIONS.ratio,
    quoting: options.quoting ?? DEFAULT_HEADER_OPTIONS.quoting,
  };
}

// ---------------------------------------------------------------------------
// Header
// ---------------------------------------------------------------------------

/**
 * Build the document header: template import, theme configuration, title
 * slide and table of contents. Ends with a blank line.
 *
 * Missing fields become empty strings; the logos fall back to the template's
 * conventional asset paths. `info` prefers `date` over `info`.
 */
export function renderHeader(frontMatter: FrontMatter, options: HeaderOptions = {}): string {
  const { libraryPath, theme, ratio, quoting } = resolveHeaderOptions(options);
  const field = (key: string, fallback = ''): string => quoteValue(frontMatter.get(key) ?? fallback, quoting);

  const info = frontMatter.get('date') || frontMatter.get('info') || '';

  const lines = [
    `#import "${quoteValue(libraryPath, quoting)}": *`,
    '',
    '// Project configuration',
    `#show: ${theme}.with(`,
    `  logo: image("${field('logo', DEFAULT_LOGO)}", width: 13.75em, height: 13.5em),`,
    `  logo-alt: image("${field('logo-alt', DEFAULT_LOGO_ALT)}", width: 50em, height: 50em),`,
    `  website-url: "${field('website-url')}",`,
    `  email: "${field('email')}",`,
    `  ratio: "${quoteValue(ratio, quoting)}",`,
    ')',
    '',
    '#front-slide(',
    `  title: "${field('title')}",`,
    `  subtitle: "${field('subtitle')}",`,
    `  authors: "${field('author')}",`,
    `  info: "${quoteValue(info, quoting)}",`,
    ')',
    '',
    '#table-of-contents()',
    '',
    '',
  ];
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// Assembly
// ---------------------------------------------------------------------------

/**
 * Header followed by the rendered slides, separated by blank lines.
 * Empty blocks (a blank lead-in before the first heading) are skipped.
 */
export function assembleDocument(
  frontMatter: FrontMatter,
  blocks: readonly string[],
  options: HeaderOptions = {},
): string {
  const header = renderHeader(frontMatter, options);
  const body = blocks.filter((block) => block.trim() !== '').join('\n\n');
  return body ? `${header}${body}\n` : header;
}
