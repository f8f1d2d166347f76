/**
 * Runtime configuration: where words are read from, where statistics and
 * transcripts are written, and which color theme to use.
 *
 * Defaults live under ~/.hangman; HANGMAN_HOME, HANGMAN_WORDS_DIR and
 * HANGMAN_THEME override them. There are no command-line flags.
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { homedir } from 'os';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { type ThemeMode, isValidThemeMode } from './themes';
import { type HangmanLogger, createConsoleLogger } from './logger';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const PACKAGE_NAME = 'terminal-hangman';
const DEFAULT_THEME: ThemeMode = 'cyan';

/**
 * Category name → file under `<wordsDir>/categories`. Order is the order
 * categories are offered to the player.
 */
export const DEFAULT_CATEGORY_FILES: Readonly<Record<string, string>> = {
  animals: 'animals.txt',
  countries: 'countries.txt',
  programming: 'programming.txt',
  science: 'science.txt',
};

export interface HangmanConfig {
  /** Root for everything the game writes */
  dataDir: string;
  statsFile: string;
  /** Holds one `game<N>/log.txt` per finished game */
  logDir: string;
  /** Holds `words.txt` and `categories/` */
  wordsDir: string;
  categoryFiles: Readonly<Record<string, string>>;
  theme: ThemeMode;
}

export type HangmanEnv = Partial<Record<'HANGMAN_HOME' | 'HANGMAN_WORDS_DIR' | 'HANGMAN_THEME', string>>;

// ---------------------------------------------------------------------------
// Package root: walk up from this file to find our package.json, so the
// bundled dist/cli.js and the sources both locate the shipped words/ folder
// ---------------------------------------------------------------------------

const packageJsonSchema = z.object({ name: z.string() });

export function findPackageRoot(from: string = dirname(fileURLToPath(import.meta.url))): string {
  let dir = from;
  for (let i = 0; i < 5; i++) {
    const pkgPath = resolve(dir, 'package.json');
    if (existsSync(pkgPath)) {
      const pkg = packageJsonSchema.safeParse(JSON.parse(readFileSync(pkgPath, 'utf-8')));
      if (pkg.success && pkg.data.name === PACKAGE_NAME) return dir;
    }
    dir = resolve(dir, '..');
  }
  return process.cwd();
}

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

/**
 * Build the configuration. Explicit overrides win over the environment,
 * which wins over the defaults. Paths derived from `dataDir` follow it
 * unless overridden themselves.
 */
export function createConfig(
  overrides: Partial<HangmanConfig> = {},
  env: HangmanEnv = process.env,
  logger: HangmanLogger = createConsoleLogger('Config'),
): HangmanConfig {
  const dataDir = overrides.dataDir ?? env.HANGMAN_HOME ?? resolve(homedir(), '.hangman');
  const wordsDir = overrides.wordsDir ?? env.HANGMAN_WORDS_DIR ?? resolve(findPackageRoot(), 'words');

  let theme = overrides.theme ?? DEFAULT_THEME;
  if (!overrides.theme && env.HANGMAN_THEME) {
    if (isValidThemeMode(env.HANGMAN_THEME)) {
      theme = env.HANGMAN_THEME;
    } else {
      logger.warn(`Unknown theme '${env.HANGMAN_THEME}', using ${DEFAULT_THEME}`);
    }
  }

  return {
    dataDir,
    statsFile: overrides.statsFile ?? resolve(dataDir, 'statistics.json'),
    logDir: overrides.logDir ?? resolve(dataDir, 'game_log'),
    wordsDir,
    categoryFiles: overrides.categoryFiles ?? DEFAULT_CATEGORY_FILES,
    theme,
  };
}
