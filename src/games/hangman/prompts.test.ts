import { describe, it, expect, vi, beforeEach } from 'vitest';

const { CANCEL } = vi.hoisted(() => ({ CANCEL: Symbol('cancel') }));

vi.mock('@clack/prompts', () => ({
  select: vi.fn(),
  text: vi.fn(),
  confirm: vi.fn(),
  isCancel: (value: unknown) => value === CANCEL,
}));

import * as p from '@clack/prompts';
import {
  QUIT,
  parseGuessInput,
  parseWordInput,
  promptCategory,
  promptGuess,
  promptPlayAgain,
  promptWord,
} from './prompts';

describe('parseGuessInput', () => {
  it('accepts a single letter, trimmed and lower-cased', () => {
    expect(parseGuessInput('  E ')).toEqual({ ok: true, value: { kind: 'letter', letter: 'e' } });
  });

  it('treats q as a letter', () => {
    expect(parseGuessInput('q')).toEqual({ ok: true, value: { kind: 'letter', letter: 'q' } });
  });

  it('recognises quit and exit in any case', () => {
    expect(parseGuessInput('QUIT')).toEqual({ ok: true, value: { kind: 'quit' } });
    expect(parseGuessInput('exit')).toEqual({ ok: true, value: { kind: 'quit' } });
  });

  it('switches to a word guess on "guess"', () => {
    expect(parseGuessInput('Guess')).toEqual({ ok: true, value: { kind: 'word' } });
  });

  it('rejects several characters', () => {
    expect(parseGuessInput('ab')).toEqual({
      ok: false,
      error: "Please enter only a single letter, or type 'guess' to guess the full word.",
    });
  });

  it('rejects a digit', () => {
    expect(parseGuessInput('7')).toEqual({ ok: false, error: 'Please enter only letters.' });
  });

  it('rejects empty input', () => {
    expect(parseGuessInput('   ')).toEqual({ ok: false, error: 'Please enter a valid letter.' });
  });
});

describe('parseWordInput', () => {
  it('accepts letters and spaces', () => {
    expect(parseWordInput(' New Zealand ')).toEqual({ ok: true, value: 'new zealand' });
  });

  it('returns QUIT for quit', () => {
    expect(parseWordInput('quit')).toEqual({ ok: true, value: QUIT });
  });

  it('rejects digits and punctuation', () => {
    const error = 'Please enter a valid word (letters only).';
    expect(parseWordInput('r2d2')).toEqual({ ok: false, error });
    expect(parseWordInput('t-rex')).toEqual({ ok: false, error });
    expect(parseWordInput('')).toEqual({ ok: false, error });
  });
});

describe('prompts', () => {
  beforeEach(() => {
    vi.mocked(p.select).mockReset();
    vi.mocked(p.text).mockReset();
    vi.mocked(p.confirm).mockReset();
  });

  it('offers each category then mixed and quit', async () => {
    vi.mocked(p.select).mockResolvedValue('animals');
    expect(await promptCategory(['animals', 'science'])).toBe('animals');

    const [{ options }] = vi.mocked(p.select).mock.calls[0];
    expect(options).toEqual([
      { value: 'animals', label: 'Animals' },
      { value: 'science', label: 'Science' },
      { value: '__mixed__', label: 'All Categories (Mixed)' },
      { value: '__quit__', label: 'Quit' },
    ]);
  });

  it('maps the mixed choice to null', async () => {
    vi.mocked(p.select).mockResolvedValue('__mixed__');
    expect(await promptCategory(['animals'])).toBeNull();
  });

  it('maps the quit choice and cancellation to QUIT', async () => {
    vi.mocked(p.select).mockResolvedValueOnce('__quit__').mockResolvedValueOnce(CANCEL);
    expect(await promptCategory(['animals'])).toBe(QUIT);
    expect(await promptCategory(['animals'])).toBe(QUIT);
  });

  it('parses the answer to a guess prompt', async () => {
    vi.mocked(p.text).mockResolvedValue('A');
    expect(await promptGuess()).toEqual({ kind: 'letter', letter: 'a' });
  });

  it('validates guess input through the parser', async () => {
    vi.mocked(p.text).mockResolvedValue('a');
    await promptGuess();

    const [{ validate }] = vi.mocked(p.text).mock.calls[0];
    expect(validate?.('a')).toBeUndefined();
    expect(validate?.('1')).toBe('Please enter only letters.');
  });

  it('quits a guess prompt on cancel', async () => {
    vi.mocked(p.text).mockResolvedValue(CANCEL);
    expect(await promptGuess()).toEqual({ kind: 'quit' });
  });

  it('returns a word or QUIT from the word prompt', async () => {
    vi.mocked(p.text).mockResolvedValueOnce('Otter').mockResolvedValueOnce(CANCEL);
    expect(await promptWord()).toBe('otter');
    expect(await promptWord()).toBe(QUIT);
  });

  it('treats a cancelled play-again prompt as no', async () => {
    vi.mocked(p.confirm).mockResolvedValueOnce(true).mockResolvedValueOnce(CANCEL);
    expect(await promptPlayAgain()).toBe(true);
    expect(await promptPlayAgain()).toBe(false);
  });
});
