import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

vi.mock('./prompts', async (importOriginal) => ({
  ...(await importOriginal<typeof import('./prompts')>()),
  promptCategory: vi.fn(),
  promptGuess: vi.fn(),
  promptWord: vi.fn(),
  promptPlayAgain: vi.fn(),
}));

import { playGame, runHangman } from './index';
import { QUIT, promptCategory, promptGuess, promptPlayAgain, promptWord } from './prompts';
import { HangmanSession } from './session';
import { StatisticsStore } from './stats';
import { FileWordSource } from './words';
import { silentLogger } from '../../logger';
import { createConfig } from '../../config';
import { renderGoodbye } from './display';

describe('hangman game loop', () => {
  let dir: string;
  let output: string[];
  const print = (text: string) => {
    output.push(text);
  };

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'hangman-loop-'));
    mkdirSync(join(dir, 'words', 'categories'), { recursive: true });
    writeFileSync(join(dir, 'words', 'categories', 'animals.txt'), 'cat\n');
    output = [];
    vi.mocked(promptCategory).mockReset();
    vi.mocked(promptGuess).mockReset();
    vi.mocked(promptWord).mockReset();
    vi.mocked(promptPlayAgain).mockReset();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function config() {
    return createConfig(
      { dataDir: join(dir, 'data'), wordsDir: join(dir, 'words'), categoryFiles: { animals: 'animals.txt' } },
      {},
      silentLogger,
    );
  }

  function newSession() {
    const { wordsDir, categoryFiles, statsFile, logDir } = config();
    return new HangmanSession({
      wordSource: new FileWordSource({ wordsDir, categoryFiles }).load(),
      statsStore: new StatisticsStore(statsFile, { logger: silentLogger }),
      logDir,
      logger: silentLogger,
    });
  }

  it('plays letters and a word guess to a recorded win', async () => {
    const session = newSession();
    session.startGame('animals');
    vi.mocked(promptGuess)
      .mockResolvedValueOnce({ kind: 'letter', letter: 'c' })
      .mockResolvedValueOnce({ kind: 'letter', letter: 'z' })
      .mockResolvedValueOnce({ kind: 'word' });
    vi.mocked(promptWord).mockResolvedValueOnce('cat');

    const summary = await playGame(session, print);

    expect(summary).not.toBe(QUIT);
    if (summary === QUIT) return;
    expect(summary.state.won).toBe(true);
    expect(summary.score).toBe(25);
    expect(output[0]).toBe("New word selected from 'Animals' (length 3)");
    expect(output).toContain("Excellent! You guessed the word 'CAT' correctly!");
    expect(existsSync(join(dir, 'data', 'game_log', 'game1', 'log.txt'))).toBe(true);
  });

  it('discards the game when the player quits mid-game', async () => {
    const session = newSession();
    session.startGame('animals');
    vi.mocked(promptGuess)
      .mockResolvedValueOnce({ kind: 'letter', letter: 'c' })
      .mockResolvedValueOnce({ kind: 'quit' });

    expect(await playGame(session, print)).toBe(QUIT);
    expect(session.hasGame).toBe(false);
    expect(existsSync(join(dir, 'data', 'statistics.json'))).toBe(false);
  });

  it('runs one round, shows statistics and says goodbye', async () => {
    vi.mocked(promptCategory).mockResolvedValueOnce('animals');
    vi.mocked(promptGuess)
      .mockResolvedValueOnce({ kind: 'letter', letter: 'c' })
      .mockResolvedValueOnce({ kind: 'letter', letter: 'a' })
      .mockResolvedValueOnce({ kind: 'letter', letter: 't' });
    vi.mocked(promptPlayAgain).mockResolvedValueOnce(false);

    await runHangman(config(), { logger: silentLogger, print });

    expect(output).toContain(['Games played: 1', 'Wins: 1', 'Losses: 0', 'Win rate: 100.00%', 'Average score per game: 30.0', 'Total score: 30'].join('\n'));
    expect(output[output.length - 1]).toBe(renderGoodbye());
    const saved: unknown = JSON.parse(readFileSync(join(dir, 'data', 'statistics.json'), 'utf-8'));
    expect(saved).toMatchObject({ gamesPlayed: 1, wins: 1, totalScore: 30 });
  });

  it('warns about missing word files and returns to the menu on a bad category', async () => {
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    vi.mocked(promptCategory).mockResolvedValueOnce('planets').mockResolvedValueOnce(QUIT);

    await runHangman(config(), { logger, print });

    expect(logger.warn).toHaveBeenCalledWith('Word file missing: words.txt');
    expect(logger.error).toHaveBeenCalledWith("Could not start game: Category 'planets' not found");
    expect(promptGuess).not.toHaveBeenCalled();
    expect(output[output.length - 1]).toBe(renderGoodbye());
  });
});
