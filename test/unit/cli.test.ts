import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { defaultOutputPath, main } from '../../src/cli';
import { convertMarkdownToTypst } from '../../src/core/Converter';
import type { ConversionReporter } from '../../src/core/Reporter';

function createReporter() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies ConversionReporter;
}

const SOURCE = '---\ntitle: Demo\n---\n## Hello\nWorld\n';

describe('defaultOutputPath', () => {
  it('replaces the extension with .typ', () => {
    expect(defaultOutputPath(join('decks', 'talk.md'))).toBe(join('decks', 'talk.typ'));
  });

  it('appends .typ to a name without extension', () => {
    expect(defaultOutputPath('notes')).toBe('notes.typ');
  });
});

describe('main', () => {
  let dir: string;
  let inputPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'md2typst-'));
    inputPath = join(dir, 'talk.md');
    writeFileSync(inputPath, SOURCE, 'utf8');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes the converted deck next to the input', () => {
    const reporter = createReporter();
    const outputPath = join(dir, 'talk.typ');

    expect(main([inputPath], reporter)).toBe(0);
    expect(readFileSync(outputPath, 'utf8')).toBe(convertMarkdownToTypst(SOURCE).output);
    expect(reporter.info.mock.calls).toEqual([
      [`Processing ${inputPath}`],
      ['Found 1 slides'],
      [`Success! Output written to ${outputPath}`],
    ]);
    expect(reporter.error).not.toHaveBeenCalled();
  });

  it('writes to the path given by --output', () => {
    const outputPath = join(dir, 'custom.typ');

    expect(main([inputPath, '-o', outputPath], createReporter())).toBe(0);
    expect(readFileSync(outputPath, 'utf8')).toContain('#slide(title: "Hello")[\n  World\n]\n');
  });

  it('passes header options to the converter', () => {
    const outputPath = join(dir, 'custom.typ');

    main([inputPath, '-o', outputPath, '--lib', 'lib.typ', '--theme', 'custom', '--ratio', '4-3'], createReporter());

    const lines = readFileSync(outputPath, 'utf8').split('\n');
    expect(lines[0]).toBe('#import "lib.typ": *');
    expect(lines[3]).toBe('#show: custom.with(');
    expect(lines[8]).toBe('  ratio: "4-3",');
  });

  it('keeps quotes unescaped with --verbatim-quotes', () => {
    writeFileSync(inputPath, '## Say "hi"\nx', 'utf8');

    main([inputPath, '--verbatim-quotes'], createReporter());

    expect(readFileSync(join(dir, 'talk.typ'), 'utf8')).toContain('#slide(title: "Say "hi"")[');
  });

  it('fails for a missing input file', () => {
    const reporter = createReporter();
    const missing = join(dir, 'missing.md');

    expect(main([missing], reporter)).toBe(1);
    expect(reporter.error).toHaveBeenCalledWith(`Error: File '${missing}' not found`);
  });

  it('fails without an input file', () => {
    const reporter = createReporter();

    expect(main([], reporter)).toBe(1);
    expect(reporter.error).toHaveBeenCalledWith('Error: expected exactly one input file');
  });

  it('fails with more than one input file', () => {
    const reporter = createReporter();

    expect(main([inputPath, inputPath], reporter)).toBe(1);
    expect(reporter.error).toHaveBeenCalledWith('Error: expected exactly one input file');
  });

  it('fails for an unknown option', () => {
    const reporter = createReporter();

    expect(main([inputPath, '--bogus'], reporter)).toBe(1);
    expect(reporter.error.mock.calls[0][0]).toMatch(/^Error: Unknown option '--bogus'/);
  });

  it('fails for an unknown backend', () => {
    const reporter = createReporter();

    expect(main([inputPath, '--backend', 'word'], reporter)).toBe(1);
    expect(reporter.error).toHaveBeenCalledWith('Error: Unknown backend "word" (expected ast or pandoc)');
  });

  it('prints usage for --help', () => {
    const reporter = createReporter();

    expect(main(['--help'], reporter)).toBe(0);
    expect(reporter.info.mock.calls[0][0]).toMatch(/^Usage: md2typst-slides <input\.md>/);
  });

  it('fails when the output cannot be written', () => {
    const reporter = createReporter();
    const outputPath = join(dir, 'no-such-dir', 'out.typ');

    expect(main([inputPath, '-o', outputPath], reporter)).toBe(1);
    expect(reporter.error.mock.calls[0][0]).toMatch(/^Error: cannot write '.*out\.typ': /);
  });
});
