/**
 * CLI entry point for terminal-hangman
 *
 * No flags: everything happens through interactive prompts. Exits 0 when
 * the player quits and 1 when the game cannot start at all (for example,
 * no word lists were found).
 */

import * as p from '@clack/prompts';
import { createConfig } from './config';
import { clackLogger } from './logger';
import { runHangman } from './games';
import { WordDataError } from './games/hangman/errors';

async function main() {
  p.intro('Hangman');
  const config = createConfig({}, process.env, clackLogger);
  await runHangman(config, { logger: clackLogger });
  p.outro('See you next time.');
}

main().catch((err: unknown) => {
  if (err instanceof WordDataError) {
    p.log.error(`Could not load word data: ${err.message}`);
    p.log.info('Check that the words/ directory is present or set HANGMAN_WORDS_DIR.');
  } else {
    p.log.error(`Fatal error: ${err instanceof Error ? err.message : String(err)}`);
  }
  process.exit(1);
});
