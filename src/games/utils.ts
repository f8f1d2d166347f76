/**
 * Shared utilities for games
 *
 * Theme state and small text helpers used by the renderers and the
 * transcript writer. The theme is configured once at startup via setTheme().
 */

import { type ThemeMode, type ThemePalette, getAnsiColor, getPalette } from '../themes';

// ============================================================================
// Theme Configuration
// ============================================================================

/**
 * Current theme mode - configured by the consuming application
 */
let currentTheme: ThemeMode = 'cyan';

/**
 * Set the current theme mode
 */
export function setTheme(mode: ThemeMode): void {
  currentTheme = mode;
}

/**
 * Get the current theme mode
 */
export function getTheme(): ThemeMode {
  return currentTheme;
}

/**
 * Get current theme color code
 */
export function getCurrentThemeColor(): string {
  return getAnsiColor(currentTheme);
}

/**
 * Get the current theme's full palette
 */
export function getCurrentPalette(): ThemePalette {
  return getPalette(currentTheme);
}

// ============================================================================
// Text Utilities
// ============================================================================

/**
 * Title-case a snake_case or space separated label: "south_america" → "South America"
 */
export function toTitle(label: string): string {
  return label
    .split(/[_\s]+/)
    .filter(Boolean)
    .map(s => s.charAt(0).toUpperCase() + s.slice(1).toLowerCase())
    .join(' ');
}

/**
 * Display name for a category, "Mixed" when there is none
 */
export function formatCategory(category: string | null | undefined): string {
  return category ? toTitle(category) : 'Mixed';
}

/**
 * True for a single ASCII letter, either case
 */
export function isAlphabetic(char: string): boolean {
  return /^[a-z]$/i.test(char);
}

/**
 * Strip ANSI escape sequences (for measuring and for tests)
 */
export function stripAnsi(text: string): string {
  // eslint-disable-next-line no-control-regex
  return text.replace(/\x1b\[[0-9;]*m/g, '');
}

// Re-export ThemeMode type for convenience
export type { ThemeMode } from '../themes';
