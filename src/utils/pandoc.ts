/**
 * Pandoc-backed body converter.
 *
 * Alternative to the in-process renderer: each slide body is piped through
 * `pandoc -f markdown -t typst`. Failures throw, and the slide renderer turns
 * them into a placeholder for that slide only.
 */

import { spawnSync } from 'node:child_process';
import type { BodyConverter } from '../renderer/SlideRenderer';

export interface PandocOptions {
  /** Executable to run. Default `pandoc`. */
  command?: string;
  /** Arguments; the markdown is always passed on stdin. */
  args?: string[];
  /** Kill the process after this many milliseconds. */
  timeoutMs?: number;
}

const DEFAULT_ARGS = ['-f', 'markdown', '-t', 'typst'];

export function createPandocConverter(options: PandocOptions = {}): BodyConverter {
  const command = options.command ?? 'pandoc';
  const args = options.args ?? DEFAULT_ARGS;

  return (markdown) => {
    const result = spawnSync(command, args, {
      input: markdown,
      encoding: 'utf8',
      timeout: options.timeoutMs,
    });

    if (result.error) {
      throw new Error(`Pandoc failed to start: ${result.error.message}`);
    }
    if (result.status !== 0) {
      const detail = result.stderr.trim() || `signal ${result.signal ?? 'unknown'}`;
      throw new Error(`Pandoc exited with status ${result.status}: ${detail}`);
    }
    return result.stdout.trimEnd();
  };
}
