/**
 * Hangman Engine: pure game logic
 *
 * One game is a single immutable GameState value. Every transition takes
 * the current state and returns the next one alongside the guess result;
 * nothing here performs I/O.
 *
 *   NotStarted → InProgress → Won | Lost
 */

import { GameOverError } from './errors';
import { isAlphabetic } from '../utils';

// ============================================================================
// Types
// ============================================================================

export type LetterGuessResult = 'repeated' | 'correct' | 'wrong';
export type WordGuessResult = 'correct' | 'wrong';
export type GameStatus = 'in-progress' | 'won' | 'lost';

export type GuessRecord =
  | { kind: 'letter'; value: string; result: Exclude<LetterGuessResult, 'repeated'> }
  | { kind: 'word'; value: string; result: WordGuessResult };

export interface GameState {
  readonly targetWord: string;
  /** Category name, or 'mixed' */
  readonly category: string;
  readonly gameNumber: number;
  /** Insertion-ordered; always correctLetters ∪ wrongLetters */
  readonly guessedLetters: ReadonlySet<string>;
  readonly correctLetters: ReadonlySet<string>;
  readonly wrongLetters: ReadonlySet<string>;
  /** Wrong letters plus wrong whole-word attempts */
  readonly wrongGuessCount: number;
  /** Accepted guesses; repeated letters are not accepted */
  readonly guessCount: number;
  readonly won: boolean;
  readonly lost: boolean;
  /** Masked word after game start and after every accepted guess */
  readonly progressTrace: readonly string[];
  readonly history: readonly GuessRecord[];
}

export interface GuessOutcome<R> {
  state: GameState;
  result: R;
}

export interface NewGameOptions {
  word: string;
  category: string;
  gameNumber: number;
}

// ============================================================================
// Constants
// ============================================================================

export const MAX_WRONG_GUESSES = 6;
export const MIXED_CATEGORY = 'mixed';
const MASK = '_';

// ============================================================================
// Queries
// ============================================================================

/**
 * Render the target as space-separated characters, `_` for letters not yet
 * revealed. Non-letters (spaces, hyphens) can never be guessed through the
 * single-letter gate, so they are shown from the start.
 */
export function renderProgress(targetWord: string, correctLetters: ReadonlySet<string>): string {
  return targetWord
    .split('')
    .map(char => (!isAlphabetic(char) || correctLetters.has(char) ? char : MASK))
    .join(' ');
}

export function progressDisplay(state: GameState): string {
  return renderProgress(state.targetWord, state.correctLetters);
}

/**
 * Every letter of the target has been revealed
 */
export function isWordComplete(targetWord: string, correctLetters: ReadonlySet<string>): boolean {
  return targetWord.split('').every(char => !isAlphabetic(char) || correctLetters.has(char));
}

export function isGameOver(state: GameState): boolean {
  return state.won || state.lost;
}

export function getGameStatus(state: GameState): GameStatus {
  if (state.won) return 'won';
  if (state.lost) return 'lost';
  return 'in-progress';
}

export function remainingAttempts(state: GameState): number {
  return Math.max(0, MAX_WRONG_GUESSES - state.wrongGuessCount);
}

// ============================================================================
// Transitions
// ============================================================================

export function createGameState({ word, category, gameNumber }: NewGameOptions): GameState {
  const targetWord = word.trim().toLowerCase();
  const correctLetters = new Set<string>();
  return {
    targetWord,
    category: category.toLowerCase(),
    gameNumber,
    guessedLetters: new Set<string>(),
    correctLetters,
    wrongLetters: new Set<string>(),
    wrongGuessCount: 0,
    guessCount: 0,
    won: false,
    lost: false,
    progressTrace: [renderProgress(targetWord, correctLetters)],
    history: [],
  };
}

/**
 * Guess a single letter. A letter that was already guessed is a no-op and
 * returns the same state object.
 */
export function guessLetter(state: GameState, input: string): GuessOutcome<LetterGuessResult> {
  if (isGameOver(state)) throw new GameOverError();

  const letter = input.toLowerCase();
  if (state.guessedLetters.has(letter)) {
    return { state, result: 'repeated' };
  }

  const guessedLetters = new Set(state.guessedLetters).add(letter);
  const guessCount = state.guessCount + 1;

  if (state.targetWord.includes(letter)) {
    const correctLetters = new Set(state.correctLetters).add(letter);
    return {
      state: {
        ...state,
        guessedLetters,
        correctLetters,
        guessCount,
        won: isWordComplete(state.targetWord, correctLetters),
        progressTrace: [...state.progressTrace, renderProgress(state.targetWord, correctLetters)],
        history: [...state.history, { kind: 'letter', value: letter, result: 'correct' }],
      },
      result: 'correct',
    };
  }

  const wrongGuessCount = state.wrongGuessCount + 1;
  const progress = renderProgress(state.targetWord, state.correctLetters);
  return {
    state: {
      ...state,
      guessedLetters,
      wrongLetters: new Set(state.wrongLetters).add(letter),
      guessCount,
      wrongGuessCount,
      lost: wrongGuessCount >= MAX_WRONG_GUESSES,
      progressTrace: [...state.progressTrace, `${progress} (${letter} wrong — no progress change)`],
      history: [...state.history, { kind: 'letter', value: letter, result: 'wrong' }],
    },
    result: 'wrong',
  };
}

/**
 * Guess the whole word. Case and spaces are ignored on both sides. A miss
 * costs exactly one wrong guess however close it was.
 */
export function guessWord(state: GameState, input: string): GuessOutcome<WordGuessResult> {
  if (isGameOver(state)) throw new GameOverError();

  const guess = normalizeWord(input);
  const guessCount = state.guessCount + 1;

  if (guess === normalizeWord(state.targetWord)) {
    const letters = state.targetWord.split('').filter(isAlphabetic);
    const correctLetters = new Set([...state.correctLetters, ...letters]);
    return {
      state: {
        ...state,
        guessedLetters: new Set([...state.guessedLetters, ...letters]),
        correctLetters,
        guessCount,
        won: true,
        progressTrace: [...state.progressTrace, renderProgress(state.targetWord, correctLetters)],
        history: [...state.history, { kind: 'word', value: guess, result: 'correct' }],
      },
      result: 'correct',
    };
  }

  const wrongGuessCount = state.wrongGuessCount + 1;
  const progress = renderProgress(state.targetWord, state.correctLetters);
  return {
    state: {
      ...state,
      guessCount,
      wrongGuessCount,
      lost: wrongGuessCount >= MAX_WRONG_GUESSES,
      progressTrace: [...state.progressTrace, `${progress} (word '${guess}' wrong — no progress change)`],
      history: [...state.history, { kind: 'word', value: guess, result: 'wrong' }],
    },
    result: 'wrong',
  };
}

function normalizeWord(word: string): string {
  return word.toLowerCase().replace(/ /g, '');
}
