/**
 * Terminal color themes
 *
 * ANSI escape codes for the accent color and a muted companion used for
 * the play-field background grid.
 */

/**
 * Available theme identifiers
 */
export type PhosphorMode =
  | 'cyan'
  | 'amber'
  | 'green'
  | 'white'
  | 'hotpink'
  | 'ice';

interface ThemeCodes {
  /** Display name */
  name: string;
  /** Accent color (ANSI) */
  accent: string;
  /** Muted background detail (ANSI) */
  subtle: string;
}

const themes: Record<PhosphorMode, ThemeCodes> = {
  cyan: { name: 'Cyberpunk', accent: '\x1b[96m', subtle: '\x1b[38;5;23m' },
  amber: { name: 'Fallout', accent: '\x1b[38;5;214m', subtle: '\x1b[38;5;94m' },
  green: { name: 'Matrix', accent: '\x1b[92m', subtle: '\x1b[38;5;22m' },
  white: { name: 'Ghost', accent: '\x1b[97m', subtle: '\x1b[38;5;238m' },
  hotpink: { name: 'Synthwave', accent: '\x1b[38;5;205m', subtle: '\x1b[38;5;53m' },
  ice: { name: 'Glacier', accent: '\x1b[38;5;153m', subtle: '\x1b[38;5;24m' },
};

// ============================================================================
// API Functions
// ============================================================================

/**
 * Get ANSI escape code for a theme
 */
export function getAnsiColor(mode: PhosphorMode): string {
  return themes[mode].accent;
}

/**
 * Get subtle background color for game elements
 */
export function getSubtleColor(mode: PhosphorMode): string {
  return themes[mode].subtle;
}

export function getThemeName(mode: PhosphorMode): string {
  return themes[mode].name;
}

/**
 * Get all available theme modes
 */
export function getThemeModes(): PhosphorMode[] {
  return Object.keys(themes) as PhosphorMode[];
}

const VALID_THEME_MODES = new Set<string>(Object.keys(themes));

/**
 * Check if a string is a valid theme mode
 */
export function isValidThemeMode(value: string): value is PhosphorMode {
  return VALID_THEME_MODES.has(value);
}
