/**
 * Status reporting for conversions. The orchestrator and CLI write through
 * this interface; the core render functions never do.
 */

export interface ConversionReporter {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Called before slide `current` (1-based) of `total` is rendered. */
  progress?(current: number, total: number): void;
}

export const consoleReporter: ConversionReporter = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
  progress: (current, total) => console.log(`Converting slide ${current}/${total}`),
};

export const silentReporter: ConversionReporter = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

/** Message of an `Error`, or the stringified value of anything else thrown. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
