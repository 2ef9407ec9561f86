import { describe, expect, it } from 'vitest';
import { hasBody, slideBody, slideSource } from '../../../src/model/Slide';
import type { SlideData } from '../../../src/model/Slide';

const slide: SlideData = {
  index: 0,
  level: 2,
  title: 'Details',
  lines: ['## Details', '', '- a'],
  bodyLines: ['', '- a'],
};

describe('Slide', () => {
  it('joins the full source', () => {
    expect(slideSource(slide)).toBe('## Details\n\n- a');
  });

  it('joins the body', () => {
    expect(slideBody(slide)).toBe('\n- a');
  });

  it('detects a non-blank body', () => {
    expect(hasBody(slide)).toBe(true);
    expect(hasBody({ ...slide, bodyLines: ['', ' \t'] })).toBe(false);
    expect(hasBody({ ...slide, bodyLines: [] })).toBe(false);
  });
});
