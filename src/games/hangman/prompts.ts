/**
 * Input boundary. Prompts re-ask until the answer is valid, so the engine
 * only ever sees a single letter or a letters-and-spaces word. Quitting
 * (typing "quit", choosing Quit, or Ctrl-C) comes back as the QUIT value
 * rather than an exception.
 */

import * as p from '@clack/prompts';
import { formatCategory, isAlphabetic } from '../utils';

export const QUIT = Symbol('quit');
export type Quit = typeof QUIT;

export type GuessInput =
  | { kind: 'letter'; letter: string }
  | { kind: 'word' }
  | { kind: 'quit' };

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

const QUIT_WORDS = new Set(['quit', 'exit']);
const GUESS_WORD_COMMAND = 'guess';
const MIXED_CHOICE = '__mixed__';
const QUIT_CHOICE = '__quit__';

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse the per-turn input: one letter, "guess" to switch to a full-word
 * guess, or "quit". "q" is a letter, not a quit command.
 */
export function parseGuessInput(raw: string): ParseResult<GuessInput> {
  const input = raw.trim().toLowerCase();

  if (QUIT_WORDS.has(input)) return { ok: true, value: { kind: 'quit' } };
  if (input === GUESS_WORD_COMMAND) return { ok: true, value: { kind: 'word' } };
  if (input.length === 1 && isAlphabetic(input)) {
    return { ok: true, value: { kind: 'letter', letter: input } };
  }

  if (input.length > 1) {
    return { ok: false, error: `Please enter only a single letter, or type '${GUESS_WORD_COMMAND}' to guess the full word.` };
  }
  if (input.length === 1) {
    return { ok: false, error: 'Please enter only letters.' };
  }
  return { ok: false, error: 'Please enter a valid letter.' };
}

/**
 * Parse a full-word guess: letters and spaces only, or "quit"
 */
export function parseWordInput(raw: string): ParseResult<string | Quit> {
  const input = raw.trim().toLowerCase();

  if (QUIT_WORDS.has(input)) return { ok: true, value: QUIT };
  if (/^[a-z ]+$/.test(input)) return { ok: true, value: input };
  return { ok: false, error: 'Please enter a valid word (letters only).' };
}

function validationMessage<T>(parse: (raw: string) => ParseResult<T>) {
  return (raw: string): string | undefined => {
    const result = parse(raw);
    return result.ok ? undefined : result.error;
  };
}

// ============================================================================
// Prompts
// ============================================================================

/**
 * Pick a category. Resolves to the category name, null for a mixed draw,
 * or QUIT.
 */
export async function promptCategory(categories: string[]): Promise<string | null | Quit> {
  const choice = await p.select<{ value: string; label: string }[], string>({
    message: 'Choose a category',
    options: [
      ...categories.map(category => ({ value: category, label: formatCategory(category) })),
      { value: MIXED_CHOICE, label: 'All Categories (Mixed)' },
      { value: QUIT_CHOICE, label: 'Quit' },
    ],
  });

  if (p.isCancel(choice) || choice === QUIT_CHOICE) return QUIT;
  if (choice === MIXED_CHOICE) return null;
  return choice;
}

export async function promptGuess(): Promise<GuessInput> {
  const answer = await p.text({
    message: `Enter a letter (or type '${GUESS_WORD_COMMAND}' to guess the full word, 'quit' to exit)`,
    validate: validationMessage(parseGuessInput),
  });

  if (p.isCancel(answer)) return { kind: 'quit' };
  const parsed = parseGuessInput(answer);
  return parsed.ok ? parsed.value : { kind: 'quit' };
}

export async function promptWord(): Promise<string | Quit> {
  const answer = await p.text({
    message: 'Enter your guess for the full word',
    validate: validationMessage(parseWordInput),
  });

  if (p.isCancel(answer)) return QUIT;
  const parsed = parseWordInput(answer);
  return parsed.ok ? parsed.value : QUIT;
}

export async function promptPlayAgain(): Promise<boolean> {
  const answer = await p.confirm({ message: 'Would you like to play again?' });
  return !p.isCancel(answer) && answer;
}
