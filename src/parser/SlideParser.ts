/**
 * Slide segmentation — splits a markdown body into slides on level-1 and
 * level-2 ATX heading lines.
 *
 * Only the line prefix is inspected: `### ` and deeper never start a slide
 * and stay in the enclosing slide's body.
 */

import type { SlideData, SlideLevel } from '../model/Slide';

const H1_RE = /^#\s+/;
const H2_RE = /^##\s+/;
// Optional closing sequence, e.g. `## Title ##`
const CLOSING_HASHES_RE = /\s+#+\s*$/;

/**
 * Heading level of a slide boundary line, or 0 when the line is not a boundary.
 */
export function boundaryLevel(line: string): SlideLevel {
  if (H1_RE.test(line)) return 1;
  if (H2_RE.test(line)) return 2;
  return 0;
}

/**
 * Extract the title from a boundary line: marker, closing hashes and
 * surrounding whitespace removed.
 */
export function headingTitle(line: string): string {
  const match = H1_RE.exec(line) ?? H2_RE.exec(line);
  const rest = match ? line.slice(match[0].length) : line;
  return rest.replace(CLOSING_HASHES_RE, '').trim();
}

function toSlide(lines: string[], index: number): SlideData {
  const level = boundaryLevel(lines[0] ?? '');
  if (level === 0) {
    return { index, level, title: '', lines, bodyLines: lines };
  }
  return {
    index,
    level,
    title: headingTitle(lines[0]),
    lines,
    bodyLines: lines.slice(1),
  };
}

/**
 * Partition the body into slides in source order.
 *
 * Every boundary line opens a new slide; a non-empty run before the first
 * boundary becomes a level-0 slide. A body without boundaries yields exactly
 * one level-0 slide.
 */
export function segmentSlides(body: string): SlideData[] {
  const runs: string[][] = [];
  let current: string[] = [];

  for (const line of body.split('\n')) {
    if (boundaryLevel(line) !== 0 && current.length > 0) {
      runs.push(current);
      current = [];
    }
    current.push(line);
  }
  if (current.length > 0) {
    runs.push(current);
  }

  return runs.map(toSlide);
}
