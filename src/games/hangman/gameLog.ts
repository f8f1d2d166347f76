/**
 * Per-game transcripts: `<logDir>/game<N>/log.txt`.
 *
 * Game numbers continue from the highest existing directory, so deleting
 * old transcripts never causes a number to be reused. A transcript, once
 * written, is never touched again.
 */

import { existsSync, mkdirSync, readdirSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { type HangmanLogger, createConsoleLogger } from '../../logger';
import { formatCategory } from '../utils';
import { type GameState, MAX_WRONG_GUESSES } from './engine';
import { PersistenceReadError, PersistenceWriteError } from './errors';
import type { Statistics } from './stats';

export interface GameLogEntry {
  state: GameState;
  score: number;
  /** Totals after this game was recorded */
  statistics: Statistics;
  timestamp: Date;
}

const GAME_DIR_PATTERN = /^game(\d+)$/;
const RULE = '---------------------------------------';

// ---------------------------------------------------------------------------
// Numbering
// ---------------------------------------------------------------------------

export function getNextGameNumber(logDir: string, logger: HangmanLogger = createConsoleLogger('GameLog')): number {
  if (!existsSync(logDir)) return 1;

  let highest = 0;
  try {
    for (const entry of readdirSync(logDir, { withFileTypes: true })) {
      const match = entry.isDirectory() ? GAME_DIR_PATTERN.exec(entry.name) : null;
      if (match) highest = Math.max(highest, Number(match[1]));
    }
  } catch (err) {
    logger.warn(new PersistenceReadError(logDir, err).message);
  }
  return highest + 1;
}

export function getGameLogPath(logDir: string, gameNumber: number): string {
  return resolve(logDir, `game${gameNumber}`, 'log.txt');
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => n.toString().padStart(2, '0');
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function formatGameLog({ state, score, statistics, timestamp }: GameLogEntry): string {
  const letterGuesses = state.history.filter(guess => guess.kind === 'letter');
  const guessLines = letterGuesses.length > 0
    ? letterGuesses.map((guess, i) => `${i + 1}. ${guess.value} → ${guess.result === 'correct' ? 'Correct' : 'Wrong'} (letter)`)
    : ['(none)'];
  const wrongList = [...state.wrongLetters].sort();

  const lines = [
    `Game ${state.gameNumber} Log`,
    `Category: ${formatCategory(state.category)}`,
    `Word: ${state.targetWord}`,
    `Word Length: ${state.targetWord.length}`,
    `Date & Time: ${formatTimestamp(timestamp)}`,
    '',
    'Guesses (in order):',
    ...guessLines,
    '',
    `Wrong Guesses List: ${wrongList.length > 0 ? wrongList.join(', ') : 'None'}`,
    `Wrong Guesses Count: ${state.wrongGuessCount}`,
    `Remaining Attempts at End: ${MAX_WRONG_GUESSES - state.wrongGuessCount}`,
    `Result: ${state.won ? 'Win' : 'Loss'}`,
    `Points Earned: ${score}`,
    `Total Score (after this round): ${statistics.totalScore}`,
    `Games Played: ${statistics.gamesPlayed}`,
    `Wins: ${statistics.wins}`,
    `Losses: ${statistics.losses}`,
    `Win Rate: ${statistics.winRate.toFixed(2)}%`,
    '',
    RULE,
    'Session Notes:',
    `- Gallows reached stage ${state.wrongGuessCount} after ${state.wrongGuessCount} wrong guess(es).`,
    '- Progress trace:',
    ...state.progressTrace.map((progress, i) => (i === 0 ? ` ${progress}` : ` -> ${progress}`)),
    RULE,
  ];

  return `${lines.join('\n')}\n`;
}

// ---------------------------------------------------------------------------
// Writing
// ---------------------------------------------------------------------------

/**
 * Write the transcript for a finished game. Returns the file path, or null
 * when it could not be written (including when one already exists).
 */
export function writeGameLog(
  logDir: string,
  entry: GameLogEntry,
  logger: HangmanLogger = createConsoleLogger('GameLog'),
): string | null {
  const path = getGameLogPath(logDir, entry.state.gameNumber);
  try {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, formatGameLog(entry), { encoding: 'utf-8', flag: 'wx' });
    return path;
  } catch (err) {
    logger.warn(`${new PersistenceWriteError(path, err).message}. Game log was not saved.`);
    return null;
  }
}
