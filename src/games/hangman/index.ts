/**
 * Hangman
 *
 * Pick a category, guess letters or the whole word, six misses and you
 * hang. Scores, statistics and a transcript are kept for every game.
 */

import type { HangmanConfig } from '../../config';
import { type HangmanLogger, clackLogger } from '../../logger';
import { setTheme } from '../utils';
import {
  renderGameStart,
  renderGameState,
  renderGoodbye,
  renderLetterFeedback,
  renderResult,
  renderStatistics,
  renderWelcome,
  renderWordFeedback,
} from './display';
import { isGameOver } from './engine';
import { WordSourceError } from './errors';
import { QUIT, type Quit, promptCategory, promptGuess, promptPlayAgain, promptWord } from './prompts';
import { type GameSummary, HangmanSession } from './session';
import { StatisticsStore } from './stats';
import { FileWordSource } from './words';

export interface RunHangmanOptions {
  logger?: HangmanLogger;
  /** Where rendered screens go */
  print?: (text: string) => void;
}

/**
 * Play one game to its end. Resolves to the summary, or QUIT when the
 * player walked away (the game is then discarded unrecorded).
 */
export async function playGame(
  session: HangmanSession,
  print: (text: string) => void,
): Promise<GameSummary | Quit> {
  print(renderGameStart(session.game.category, session.game.targetWord.length));

  while (!isGameOver(session.game)) {
    print(renderGameState(session.game));

    const input = await promptGuess();
    if (input.kind === 'quit') {
      session.abandon();
      return QUIT;
    }

    if (input.kind === 'word') {
      const word = await promptWord();
      if (word === QUIT) {
        session.abandon();
        return QUIT;
      }
      const result = session.guessWord(word);
      print(renderWordFeedback(word, result, session.game));
    } else {
      const result = session.guessLetter(input.letter);
      print(renderLetterFeedback(input.letter, result, session.game));
    }
  }

  print(renderGameState(session.game));
  return session.finish();
}

/**
 * Category menu → game → play again, until the player quits. Throws
 * WordDataError when no word list can be loaded.
 */
export async function runHangman(config: HangmanConfig, options: RunHangmanOptions = {}): Promise<void> {
  const logger = options.logger ?? clackLogger;
  const print = options.print ?? ((text: string) => console.log(text));

  setTheme(config.theme);

  const wordSource = new FileWordSource({
    wordsDir: config.wordsDir,
    categoryFiles: config.categoryFiles,
  }).load();

  for (const [file, found] of Object.entries(wordSource.validateWordFiles())) {
    if (!found) logger.warn(`Word file missing: ${file}`);
  }

  const session = new HangmanSession({
    wordSource,
    statsStore: new StatisticsStore(config.statsFile, { logger }),
    logDir: config.logDir,
    logger,
  });

  print(renderWelcome());

  while (true) {
    const category = await promptCategory(wordSource.getAvailableCategories());
    if (category === QUIT) break;

    try {
      session.startGame(category);
    } catch (err) {
      if (err instanceof WordSourceError) {
        logger.error(`Could not start game: ${err.message}`);
        continue;
      }
      throw err;
    }

    const summary = await playGame(session, print);
    if (summary === QUIT) break;

    print(renderResult(summary));
    print(renderStatistics(summary.statistics));

    if (!(await promptPlayAgain())) break;
  }

  print(renderGoodbye());
}
