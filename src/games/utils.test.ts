import { describe, it, expect, afterEach } from 'vitest';
import {
  formatCategory,
  getCurrentPalette,
  getCurrentThemeColor,
  getTheme,
  isAlphabetic,
  setTheme,
  stripAnsi,
  toTitle,
} from './utils';
import { getThemeModes, isValidThemeMode } from '../themes';

describe('theme state', () => {
  afterEach(() => {
    setTheme('cyan');
  });

  it('starts on cyan', () => {
    expect(getTheme()).toBe('cyan');
    expect(getCurrentThemeColor()).toBe('\x1b[96m');
  });

  it('switches palettes with setTheme', () => {
    setTheme('amber');
    expect(getTheme()).toBe('amber');
    expect(getCurrentPalette().name).toBe('Amber');
    expect(getCurrentThemeColor()).toBe('\x1b[93m');
  });

  it('validates theme names', () => {
    expect(getThemeModes()).toContain('nord');
    expect(isValidThemeMode('nord')).toBe(true);
    expect(isValidThemeMode('plaid')).toBe(false);
  });
});

describe('text helpers', () => {
  it('title-cases labels', () => {
    expect(toTitle('south_america')).toBe('South America');
    expect(toTitle('NEW zealand')).toBe('New Zealand');
  });

  it('formats a missing category as Mixed', () => {
    expect(formatCategory(null)).toBe('Mixed');
    expect(formatCategory('')).toBe('Mixed');
    expect(formatCategory('science')).toBe('Science');
  });

  it('accepts only single ASCII letters', () => {
    expect(isAlphabetic('Q')).toBe(true);
    expect(isAlphabetic('é')).toBe(false);
    expect(isAlphabetic('ab')).toBe(false);
  });

  it('strips color codes', () => {
    expect(stripAnsi('\x1b[1;92mwin\x1b[0m')).toBe('win');
  });
});
