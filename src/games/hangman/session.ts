/**
 * Hangman session. Owns the one live GameState and connects the pure
 * engine to the word source, scoring, statistics and transcripts.
 */

import { type HangmanLogger, createConsoleLogger } from '../../logger';
import {
  type GameState,
  type LetterGuessResult,
  type WordGuessResult,
  createGameState,
  guessLetter,
  guessWord,
  isGameOver,
} from './engine';
import { HangmanError } from './errors';
import { getNextGameNumber, writeGameLog } from './gameLog';
import { calculateScore } from './scoring';
import type { Statistics, StatisticsStore } from './stats';
import type { WordSource } from './words';

export interface HangmanSessionOptions {
  wordSource: WordSource;
  statsStore: StatisticsStore;
  logDir: string;
  logger?: HangmanLogger;
  /** Clock for transcript timestamps */
  now?: () => Date;
}

export interface GameSummary {
  state: GameState;
  score: number;
  statistics: Statistics;
  /** null when the transcript could not be written */
  logPath: string | null;
}

export class HangmanSession {
  private current: GameState | null = null;
  private summary: GameSummary | null = null;
  private readonly logger: HangmanLogger;
  private readonly now: () => Date;

  constructor(private readonly options: HangmanSessionOptions) {
    this.logger = options.logger ?? createConsoleLogger('Hangman');
    this.now = options.now ?? (() => new Date());
  }

  get hasGame(): boolean {
    return this.current !== null;
  }

  /**
   * The live game. Throws when no game has been started.
   */
  get game(): GameState {
    if (!this.current) throw new HangmanError('No game in progress');
    return this.current;
  }

  /**
   * Draw a word and begin a new game, replacing any previous one. A
   * WordSourceError propagates and leaves the session as it was.
   */
  startGame(category: string | null = null): GameState {
    const { word, category: actualCategory } = this.options.wordSource.getRandomWord(category);
    this.current = createGameState({
      word,
      category: actualCategory,
      gameNumber: getNextGameNumber(this.options.logDir, this.logger),
    });
    this.summary = null;
    return this.current;
  }

  guessLetter(letter: string): LetterGuessResult {
    const { state, result } = guessLetter(this.game, letter);
    this.current = state;
    return result;
  }

  guessWord(word: string): WordGuessResult {
    const { state, result } = guessWord(this.game, word);
    this.current = state;
    return result;
  }

  /**
   * Score the finished game, record it in the statistics and write its
   * transcript. Calling it again returns the same summary without
   * recording twice.
   */
  finish(): GameSummary {
    const state = this.game;
    if (!isGameOver(state)) {
      throw new HangmanError('Game is still in progress');
    }
    if (this.summary) return this.summary;

    const score = calculateScore(state.targetWord.length, state.wrongGuessCount, state.won);
    const statistics = this.options.statsStore.recordOutcome(state.won, score);
    const logPath = writeGameLog(
      this.options.logDir,
      { state, score, statistics, timestamp: this.now() },
      this.logger,
    );

    this.summary = { state, score, statistics, logPath };
    return this.summary;
  }

  /**
   * Drop the current game without recording it
   */
  abandon(): void {
    this.current = null;
    this.summary = null;
  }
}
