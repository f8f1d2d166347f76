/**
 * terminal-hangman
 *
 * Word-guessing game for the terminal, usable as a CLI or as a library.
 *
 * Library usage:
 *   import { createConfig, HangmanSession, FileWordSource, StatisticsStore } from 'terminal-hangman';
 *   const config = createConfig();
 *   const session = new HangmanSession({
 *     wordSource: new FileWordSource(config).load(),
 *     statsStore: new StatisticsStore(config.statsFile),
 *     logDir: config.logDir,
 *   });
 *   session.startGame('animals');
 *   session.guessLetter('e');
 *
 * CLI usage:
 *   hangman
 */

export * from './games';

// Configuration
export { createConfig, findPackageRoot, DEFAULT_CATEGORY_FILES } from './config';
export type { HangmanConfig, HangmanEnv } from './config';

// Logging
export { createConsoleLogger, clackLogger, silentLogger } from './logger';
export type { HangmanLogger } from './logger';

// Themes
export { getPalette, getAnsiColor, getThemeModes, isValidThemeMode, THEME_MODES, ANSI_RESET } from './themes';
export type { ThemePalette } from './themes';
