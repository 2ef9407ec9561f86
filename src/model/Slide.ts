/**
 * Slide model — one heading-bounded run of source lines.
 */

/** 0 = no heading (first slide only), 1 = `# `, 2 = `## `. */
export type SlideLevel = 0 | 1 | 2;

export interface SlideData {
  /** Position in source order, 0-based. */
  index: number;
  level: SlideLevel;
  /** Heading text without its marker; empty for level 0. */
  title: string;
  /** Every source line of the slide, heading included. */
  lines: string[];
  /** Lines after the heading, or all lines for level 0. */
  bodyLines: string[];
}

/** The slide's full source, heading line included. */
export function slideSource(slide: SlideData): string {
  return slide.lines.join('\n');
}

/** The slide's body markdown. */
export function slideBody(slide: SlideData): string {
  return slide.bodyLines.join('\n');
}

/** Whether the body holds anything other than whitespace. */
export function hasBody(slide: SlideData): boolean {
  return slide.bodyLines.some((line) => line.trim() !== '');
}
