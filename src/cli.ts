/**
 * Command-line entry: `md2typst-slides <input.md> [-o output.typ]`.
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { basename, dirname, extname, join } from 'node:path';
import { parseArgs } from 'node:util';
import { convertMarkdownToTypst } from './core/Converter';
import type { ConvertOptions } from './core/Converter';
import { consoleReporter, describeError } from './core/Reporter';
import type { ConversionReporter } from './core/Reporter';

const USAGE = `Usage: md2typst-slides <input.md> [options]

Convert a markdown file to a Typst slide deck. Level-1 headings become
sections, level-2 headings become slides.

Options:
  -o, --output <path>   Output file (default: input with a .typ extension)
      --lib <path>      Template library path in the #import line
      --theme <name>    Theme function passed to #show
      --ratio <ratio>   Slide aspect ratio (default: 16-9)
      --backend <name>  ast (default) or pandoc
      --verbatim-quotes Do not escape quotes in quoted arguments
  -h, --help            Show this help`;

/** Input path with its extension replaced by `.typ`. */
export function defaultOutputPath(inputPath: string): string {
  return join(dirname(inputPath), `${basename(inputPath, extname(inputPath))}.typ`);
}

function parseBackend(value: string | undefined): ConvertOptions['backend'] {
  if (value === undefined || value === 'ast' || value === 'pandoc') return value;
  throw new Error(`Unknown backend "${value}" (expected ast or pandoc)`);
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      output: { type: 'string', short: 'o' },
      lib: { type: 'string' },
      theme: { type: 'string' },
      ratio: { type: 'string' },
      backend: { type: 'string' },
      'verbatim-quotes': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    allowPositionals: true,
  });
}

/**
 * Run the CLI with the given arguments (without node and script path).
 * Returns the process exit code.
 */
export function main(argv: string[], reporter: ConversionReporter = consoleReporter): number {
  let args: ReturnType<typeof parseCliArgs>;
  try {
    args = parseCliArgs(argv);
  } catch (e) {
    reporter.error(`Error: ${describeError(e)}`);
    reporter.info(USAGE);
    return 1;
  }
  const { values, positionals } = args;

  if (values.help) {
    reporter.info(USAGE);
    return 0;
  }

  const inputPath = positionals[0];
  if (!inputPath || positionals.length > 1) {
    reporter.error('Error: expected exactly one input file');
    reporter.info(USAGE);
    return 1;
  }

  reporter.info(`Processing ${inputPath}`);

  if (!existsSync(inputPath)) {
    reporter.error(`Error: File '${inputPath}' not found`);
    return 1;
  }

  const outputPath = values.output || defaultOutputPath(inputPath);

  let content: string;
  try {
    content = readFileSync(inputPath, 'utf8');
  } catch (e) {
    reporter.error(`Error: cannot read '${inputPath}': ${describeError(e)}`);
    return 1;
  }

  let backend: ConvertOptions['backend'];
  try {
    backend = parseBackend(values.backend);
  } catch (e) {
    reporter.error(`Error: ${describeError(e)}`);
    return 1;
  }

  const result = convertMarkdownToTypst(content, {
    libraryPath: values.lib,
    theme: values.theme,
    ratio: values.ratio,
    quoting: values['verbatim-quotes'] ? 'verbatim' : 'escape',
    backend,
    reporter,
  });

  try {
    writeFileSync(outputPath, result.output, 'utf8');
  } catch (e) {
    reporter.error(`Error: cannot write '${outputPath}': ${describeError(e)}`);
    return 1;
  }

  reporter.info(`Success! Output written to ${outputPath}`);
  return 0;
}
