/**
 * Score for a finished game.
 *
 * Ten points per character of the word, minus five per wrong guess, never
 * below ten for a win. Losses score nothing.
 */

export const POINTS_PER_LETTER = 10;
export const WRONG_GUESS_PENALTY = 5;
export const MIN_WIN_SCORE = 10;

export function calculateScore(wordLength: number, wrongGuessCount: number, won: boolean): number {
  if (!won) return 0;
  return Math.max(wordLength * POINTS_PER_LETTER - wrongGuessCount * WRONG_GUESS_PENALTY, MIN_WIN_SCORE);
}
