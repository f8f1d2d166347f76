/**
 * ASCII art: gallows stages, title and end-of-game banners.
 */

import { MAX_WRONG_GUESSES } from './engine';

// Gallows stages, indexed by wrong guesses (0 = empty, 6 = complete)
export const HANGMAN_STAGES: readonly (readonly string[])[] = [
  [
    '  ┌───────┐ ',
    '  │       │ ',
    '  │         ',
    '  │         ',
    '  │         ',
    '  │         ',
    '══╧════════ ',
  ],
  // head
  [
    '  ┌───────┐ ',
    '  │       │ ',
    '  │      ◯  ',
    '  │         ',
    '  │         ',
    '  │         ',
    '══╧════════ ',
  ],
  // body
  [
    '  ┌───────┐ ',
    '  │       │ ',
    '  │      ◯  ',
    '  │      │  ',
    '  │         ',
    '  │         ',
    '══╧════════ ',
  ],
  // left arm
  [
    '  ┌───────┐ ',
    '  │       │ ',
    '  │      ◯  ',
    '  │     ╱│  ',
    '  │         ',
    '  │         ',
    '══╧════════ ',
  ],
  // right arm
  [
    '  ┌───────┐ ',
    '  │       │ ',
    '  │      ◯  ',
    '  │     ╱│╲ ',
    '  │         ',
    '  │         ',
    '══╧════════ ',
  ],
  // left leg
  [
    '  ┌───────┐ ',
    '  │       │ ',
    '  │      ◯  ',
    '  │     ╱│╲ ',
    '  │     ╱   ',
    '  │         ',
    '══╧════════ ',
  ],
  // right leg
  [
    '  ┌───────┐ ',
    '  │       │ ',
    '  │      ◯  ',
    '  │     ╱│╲ ',
    '  │     ╱ ╲ ',
    '  │         ',
    '══╧════════ ',
  ],
];

export const TITLE_ART: readonly string[] = [
  '█ █ ▄▀█ █▄ █ █▀▀ █▄ ▄█ ▄▀█ █▄ █',
  '█▀█ █▀█ █ ▀█ █▄█ █ ▀ █ █▀█ █ ▀█',
];

export const WIN_ART: readonly string[] = [
  '★ ═══════════════ ★',
  '    W O R D   F O U N D',
  '★ ═══════════════ ★',
];

export const LOSE_ART: readonly string[] = [
  '╳ ═══════════════ ╳',
  '      H A N G E D',
  '╳ ═══════════════ ╳',
];

/**
 * Gallows for a wrong-guess count, clamped to the drawable range
 */
export function getHangmanStage(wrongGuesses: number): readonly string[] {
  const index = Math.min(Math.max(wrongGuesses, 0), MAX_WRONG_GUESSES);
  return HANGMAN_STAGES[index];
}
