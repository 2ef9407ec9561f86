import { describe, expect, it } from 'vitest';
import { extractFrontMatter, parseFrontMatterBlock } from '../../../src/parser/FrontMatterParser';

describe('extractFrontMatter', () => {
  it('extracts key/value pairs and returns the remaining body', () => {
    const { frontMatter, body } = extractFrontMatter('---\ntitle: Demo\nAuthor:  Ann Example \n---\n# Intro\n');

    expect(Object.fromEntries(frontMatter)).toEqual({ title: 'Demo', author: 'Ann Example' });
    expect(body).toBe('# Intro\n');
  });

  it('splits each line at the first colon only', () => {
    const { frontMatter } = extractFrontMatter('---\nwebsite-url: https://example.test:8080/a\n---\n');
    expect(frontMatter.get('website-url')).toBe('https://example.test:8080/a');
  });

  it('ignores lines without a colon', () => {
    const { frontMatter } = extractFrontMatter('---\njust words\ntitle: Demo\n---\nBody');
    expect([...frontMatter.keys()]).toEqual(['title']);
  });

  it('ignores lines with an empty key', () => {
    const { frontMatter } = extractFrontMatter('---\n: orphan\n---\nBody');
    expect(frontMatter.size).toBe(0);
  });

  it('keeps unrecognized keys', () => {
    const { frontMatter } = extractFrontMatter('---\ntheme-color: teal\n---\n');
    expect(frontMatter.get('theme-color')).toBe('teal');
  });

  it('treats input without a closing delimiter as body only', () => {
    const raw = '---\ntitle: Demo\n# Intro\nHello';
    const { frontMatter, body } = extractFrontMatter(raw);

    expect(frontMatter.size).toBe(0);
    expect(body).toBe(raw);
  });

  it('only matches a block at the very start of the input', () => {
    const raw = 'Intro\n---\ntitle: Demo\n---\n';
    const { frontMatter, body } = extractFrontMatter(raw);

    expect(frontMatter.size).toBe(0);
    expect(body).toBe(raw);
  });

  it('accepts a closing delimiter at the end of input', () => {
    const { frontMatter, body } = extractFrontMatter('---\ntitle: Demo\n---');

    expect(frontMatter.get('title')).toBe('Demo');
    expect(body).toBe('');
  });

  it('accepts an empty block', () => {
    const { frontMatter, body } = extractFrontMatter('---\n---\nBody');

    expect(frontMatter.size).toBe(0);
    expect(body).toBe('Body');
  });

  it('handles CRLF line endings', () => {
    const { frontMatter, body } = extractFrontMatter('---\r\ntitle: Demo\r\n---\r\nBody');

    expect(frontMatter.get('title')).toBe('Demo');
    expect(body).toBe('Body');
  });

  it('stops at the first closing delimiter', () => {
    const { frontMatter, body } = extractFrontMatter('---\na: 1\n---\nText\n---\nb: 2\n---\n');

    expect(Object.fromEntries(frontMatter)).toEqual({ a: '1' });
    expect(body).toBe('Text\n---\nb: 2\n---\n');
  });
});

describe('parseFrontMatterBlock', () => {
  it('lets a later duplicate key win', () => {
    expect(parseFrontMatterBlock('title: One\nTITLE: Two').get('title')).toBe('Two');
  });

  it('keeps an empty value', () => {
    expect(parseFrontMatterBlock('subtitle:').get('subtitle')).toBe('');
  });
});
