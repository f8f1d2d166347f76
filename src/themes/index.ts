/**
 * Terminal color themes
 *
 * ANSI escape codes used to tint the gallows, the word and the status lines.
 */

/**
 * Available theme identifiers
 */
export const THEME_MODES = [
  'cyan', 'amber', 'green', 'white', 'hotpink', 'blood',
  'ice', 'bladerunner', 'solarized', 'nord', 'highcontrast',
] as const;

export type ThemeMode = (typeof THEME_MODES)[number];

/**
 * ANSI palette for one theme
 */
export interface ThemePalette {
  /** Display name */
  name: string;
  /** Main text/accent color */
  primary: string;
  /** Revealed letters, wins */
  success: string;
  /** Wrong letters, losses */
  danger: string;
  /** Hints and secondary text */
  muted: string;
}

const DIM = '\x1b[2m';

const palettes: Record<ThemeMode, ThemePalette> = {
  cyan: { name: 'Cyberpunk', primary: '\x1b[96m', success: '\x1b[1;92m', danger: '\x1b[1;91m', muted: `${DIM}\x1b[96m` },
  amber: { name: 'Amber', primary: '\x1b[93m', success: '\x1b[1;92m', danger: '\x1b[1;91m', muted: `${DIM}\x1b[93m` },
  green: { name: 'Phosphor', primary: '\x1b[92m', success: '\x1b[1;97m', danger: '\x1b[1;91m', muted: `${DIM}\x1b[92m` },
  white: { name: 'Mono', primary: '\x1b[97m', success: '\x1b[1;92m', danger: '\x1b[1;91m', muted: `${DIM}\x1b[97m` },
  hotpink: { name: 'Hot Pink', primary: '\x1b[95m', success: '\x1b[1;96m', danger: '\x1b[1;91m', muted: `${DIM}\x1b[95m` },
  blood: { name: 'Blood', primary: '\x1b[91m', success: '\x1b[1;97m', danger: '\x1b[1;31m', muted: `${DIM}\x1b[91m` },
  ice: { name: 'Ice', primary: '\x1b[96m', success: '\x1b[1;97m', danger: '\x1b[1;95m', muted: `${DIM}\x1b[96m` },
  bladerunner: { name: 'Blade Runner', primary: '\x1b[38;5;208m', success: '\x1b[1;96m', danger: '\x1b[1;91m', muted: `${DIM}\x1b[38;5;208m` },
  solarized: { name: 'Solarized', primary: '\x1b[36m', success: '\x1b[1;32m', danger: '\x1b[1;31m', muted: `${DIM}\x1b[36m` },
  nord: { name: 'Nord', primary: '\x1b[96m', success: '\x1b[1;92m', danger: '\x1b[1;91m', muted: '\x1b[38;5;59m' },
  highcontrast: { name: 'High Contrast', primary: '\x1b[97m', success: '\x1b[1;93m', danger: '\x1b[1;91m', muted: '\x1b[37m' },
};

// ============================================================================
// API Functions
// ============================================================================

/**
 * Get the full palette for a theme
 */
export function getPalette(mode: ThemeMode): ThemePalette {
  return palettes[mode];
}

/**
 * Get the primary ANSI escape code for a theme
 */
export function getAnsiColor(mode: ThemeMode): string {
  return palettes[mode].primary || '\x1b[92m';
}

/**
 * Get all available theme modes
 */
export function getThemeModes(): ThemeMode[] {
  return [...THEME_MODES];
}

/**
 * Check if a string is a valid theme mode
 */
export function isValidThemeMode(value: string): value is ThemeMode {
  return THEME_MODES.some(mode => mode === value);
}

/**
 * ANSI reset code
 */
export const ANSI_RESET = '\x1b[0m';
