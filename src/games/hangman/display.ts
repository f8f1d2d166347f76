/**
 * Text renderers for the interactive game. Each returns a string (ANSI
 * colored with the current theme) and leaves printing to the caller.
 */

import { ANSI_RESET } from '../../themes';
import { formatCategory, getCurrentPalette } from '../utils';
import { getHangmanStage, LOSE_ART, TITLE_ART, WIN_ART } from './art';
import {
  type GameState,
  type LetterGuessResult,
  type WordGuessResult,
  MAX_WRONG_GUESSES,
  progressDisplay,
  remainingAttempts,
} from './engine';
import type { GameSummary } from './session';
import type { Statistics } from './stats';

function paint(color: string, text: string): string {
  return `${color}${text}${ANSI_RESET}`;
}

export function renderWelcome(): string {
  const { primary, muted } = getCurrentPalette();
  return [
    ...TITLE_ART.map(line => paint(`\x1b[1m${primary}`, line)),
    '',
    paint(muted, 'Guess the word one letter at a time. Six misses and you hang.'),
  ].join('\n');
}

export function renderGameStart(category: string, wordLength: number): string {
  return `New word selected from '${formatCategory(category)}' (length ${wordLength})`;
}

export function renderGameState(state: GameState): string {
  const { primary, success, danger, muted } = getCurrentPalette();
  const guessed = [...state.guessedLetters].sort();
  const gallowsColor = state.wrongGuessCount > 0 ? danger : primary;

  return [
    `Word: ${paint(`\x1b[1m${success}`, progressDisplay(state))}`,
    `Guessed letters: ${guessed.length > 0 ? guessed.join(', ') : 'None'}`,
    `Remaining attempts: ${paint(muted, String(remainingAttempts(state)))}`,
    '',
    ...getHangmanStage(state.wrongGuessCount).map(line => paint(gallowsColor, line)),
  ].join('\n');
}

export function renderLetterFeedback(letter: string, result: LetterGuessResult, state: GameState): string {
  const shown = letter.toUpperCase();
  switch (result) {
    case 'repeated':
      return `You already guessed '${shown}'. No penalty!`;
    case 'correct':
      return `Correct! '${shown}' is in the word.\nProgress: ${progressDisplay(state)}`;
    case 'wrong':
      return `Wrong! '${shown}' is not in the word.\nWrong guesses: ${state.wrongGuessCount}/${MAX_WRONG_GUESSES}`;
  }
}

export function renderWordFeedback(guess: string, result: WordGuessResult, state: GameState): string {
  const shown = guess.toUpperCase();
  if (result === 'correct') {
    return `Excellent! You guessed the word '${shown}' correctly!`;
  }
  return `Wrong! '${shown}' is not the correct word.\nWrong guesses: ${state.wrongGuessCount}/${MAX_WRONG_GUESSES}`;
}

export function renderResult({ state, score, statistics }: GameSummary): string {
  const { success, danger } = getCurrentPalette();
  const banner = state.won
    ? WIN_ART.map(line => paint(success, line))
    : LOSE_ART.map(line => paint(danger, line));
  const headline = state.won
    ? `You win! Word: ${state.targetWord.toUpperCase()}`
    : `You lose! The word was: ${state.targetWord.toUpperCase()}`;

  return [
    ...banner,
    '',
    headline,
    `Points earned this round: ${score}`,
    `Total score: ${statistics.totalScore}`,
  ].join('\n');
}

export function renderStatistics(stats: Statistics): string {
  return [
    `Games played: ${stats.gamesPlayed}`,
    `Wins: ${stats.wins}`,
    `Losses: ${stats.losses}`,
    `Win rate: ${stats.winRate.toFixed(2)}%`,
    `Average score per game: ${stats.averageScore.toFixed(1)}`,
    `Total score: ${stats.totalScore}`,
  ].join('\n');
}

export function renderGoodbye(): string {
  return 'Thanks for playing Hangman! Goodbye!';
}
