/**
 * Game modules
 *
 * Usage:
 * 1. Set the theme: setTheme('cyan')
 * 2. Run the interactive game: await runHangman(createConfig())
 * 3. Or drive the engine directly through HangmanSession
 */

// Re-export utilities
export {
  setTheme,
  getTheme,
  getCurrentThemeColor,
  getCurrentPalette,
  formatCategory,
  toTitle,
  isAlphabetic,
  stripAnsi,
} from './utils';

export type { ThemeMode } from './utils';

// Game loop
export { runHangman, playGame } from './hangman';
export type { RunHangmanOptions } from './hangman';

// Engine
export {
  MAX_WRONG_GUESSES,
  MIXED_CATEGORY,
  createGameState,
  guessLetter,
  guessWord,
  progressDisplay,
  renderProgress,
  isWordComplete,
  isGameOver,
  getGameStatus,
  remainingAttempts,
} from './hangman/engine';
export type {
  GameState,
  GameStatus,
  GuessOutcome,
  GuessRecord,
  LetterGuessResult,
  WordGuessResult,
  NewGameOptions,
} from './hangman/engine';

// Session
export { HangmanSession } from './hangman/session';
export type { GameSummary, HangmanSessionOptions } from './hangman/session';

// Scoring
export { calculateScore, POINTS_PER_LETTER, WRONG_GUESS_PENALTY, MIN_WIN_SCORE } from './hangman/scoring';

// Statistics
export {
  StatisticsStore,
  statisticsSchema,
  createDefaultStatistics,
  calculateDerivedStats,
  applyOutcome,
} from './hangman/stats';
export type { Statistics, StatisticsStoreOptions } from './hangman/stats';

// Transcripts
export {
  formatGameLog,
  formatTimestamp,
  writeGameLog,
  getNextGameNumber,
  getGameLogPath,
} from './hangman/gameLog';
export type { GameLogEntry } from './hangman/gameLog';

// Words
export { FileWordSource, parseWordList } from './hangman/words';
export type { WordSource, DrawnWord, FileWordSourceOptions } from './hangman/words';

// Input boundary
export { QUIT, parseGuessInput, parseWordInput } from './hangman/prompts';
export type { Quit, GuessInput, ParseResult } from './hangman/prompts';

// Errors
export {
  HangmanError,
  WordSourceError,
  NoWordsAvailableError,
  UnknownCategoryError,
  WordDataError,
  PersistenceReadError,
  PersistenceWriteError,
  GameOverError,
} from './hangman/errors';
