import { describe, it, expect, vi } from 'vitest';
import { homedir } from 'os';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { DEFAULT_CATEGORY_FILES, createConfig, findPackageRoot } from './config';
import { silentLogger } from './logger';

describe('createConfig', () => {
  it('defaults to ~/.hangman and the shipped word lists', () => {
    const config = createConfig({}, {}, silentLogger);
    const dataDir = resolve(homedir(), '.hangman');

    expect(config.dataDir).toBe(dataDir);
    expect(config.statsFile).toBe(resolve(dataDir, 'statistics.json'));
    expect(config.logDir).toBe(resolve(dataDir, 'game_log'));
    expect(config.wordsDir).toBe(resolve(findPackageRoot(), 'words'));
    expect(config.categoryFiles).toBe(DEFAULT_CATEGORY_FILES);
    expect(config.theme).toBe('cyan');
  });

  it('derives paths from HANGMAN_HOME', () => {
    const config = createConfig({}, { HANGMAN_HOME: '/tmp/hangman-home', HANGMAN_WORDS_DIR: '/tmp/words' }, silentLogger);
    expect(config.statsFile).toBe(resolve('/tmp/hangman-home', 'statistics.json'));
    expect(config.logDir).toBe(resolve('/tmp/hangman-home', 'game_log'));
    expect(config.wordsDir).toBe('/tmp/words');
  });

  it('prefers explicit overrides to the environment', () => {
    const config = createConfig(
      { dataDir: '/tmp/override', logDir: '/tmp/logs', theme: 'nord' },
      { HANGMAN_HOME: '/tmp/hangman-home', HANGMAN_THEME: 'amber' },
      silentLogger,
    );
    expect(config.dataDir).toBe('/tmp/override');
    expect(config.statsFile).toBe(resolve('/tmp/override', 'statistics.json'));
    expect(config.logDir).toBe('/tmp/logs');
    expect(config.theme).toBe('nord');
  });

  it('takes the theme from HANGMAN_THEME', () => {
    expect(createConfig({}, { HANGMAN_THEME: 'amber' }, silentLogger).theme).toBe('amber');
  });

  it('warns about an unknown theme and keeps the default', () => {
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    expect(createConfig({}, { HANGMAN_THEME: 'plaid' }, logger).theme).toBe('cyan');
    expect(logger.warn).toHaveBeenCalledWith("Unknown theme 'plaid', using cyan");
  });
});

describe('findPackageRoot', () => {
  it('finds the directory holding this package', () => {
    expect(findPackageRoot()).toBe(resolve(dirname(fileURLToPath(import.meta.url)), '..'));
  });
});
