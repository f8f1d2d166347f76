/**
 * Logging for the game and its persistence layer.
 *
 * Library code takes a HangmanLogger so the interactive CLI can route
 * warnings through @clack/prompts while tests and programmatic callers
 * get tagged console output.
 */

import * as p from '@clack/prompts';

export interface HangmanLogger {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

/**
 * Tagged console output, e.g. `[Statistics] Could not save ...`
 */
export function createConsoleLogger(tag: string): HangmanLogger {
  const prefix = `[${tag}]`;
  return {
    info: (message) => console.log(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} ${message}`),
    error: (message) => console.error(`${prefix} ${message}`),
  };
}

/**
 * Logger for interactive sessions. Renders inside the clack prompt flow
 */
export const clackLogger: HangmanLogger = {
  info: (message) => p.log.info(message),
  warn: (message) => p.log.warn(message),
  error: (message) => p.log.error(message),
};

/**
 * Discards everything. Handy in tests that don't assert on output.
 */
export const silentLogger: HangmanLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
