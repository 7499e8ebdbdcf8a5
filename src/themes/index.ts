/**
 * Terminal color themes
 *
 * The theme colors the text layer of the game: textures, the HUD and
 * notices. Paddle, block and background keep their fixed colors.
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
  | 'blood'
  | 'ice'
  | 'oled';

export interface ThemeInfo {
  /** Display name */
  name: string;
  /** ANSI escape code for foreground text */
  ansi: string;
}

export const themes: Record<PhosphorMode, ThemeInfo> = {
  cyan: { name: 'Cyberpunk', ansi: '\x1b[96m' },
  amber: { name: 'Fallout', ansi: '\x1b[93m' },
  green: { name: 'Matrix', ansi: '\x1b[92m' },
  white: { name: 'Ghost', ansi: '\x1b[97m' },
  hotpink: { name: 'Synthwave', ansi: '\x1b[95m' },
  blood: { name: 'Blood', ansi: '\x1b[91m' },
  ice: { name: 'Ice', ansi: '\x1b[38;5;117m' },
  oled: { name: 'OLED', ansi: '\x1b[38;5;250m' },
};

// ============================================================================
// API Functions
// ============================================================================

/**
 * Get ANSI escape code for a theme
 */
export function getAnsiColor(mode: PhosphorMode): string {
  return themes[mode].ansi;
}

/**
 * Get all available theme modes
 */
export function getThemeModes(): PhosphorMode[] {
  return Object.keys(themes).filter(isValidThemeMode);
}

const VALID_THEME_MODES = new Set<string>(Object.keys(themes));

/**
 * Check if a string is a valid theme mode
 */
export function isValidThemeMode(value: string): value is PhosphorMode {
  return VALID_THEME_MODES.has(value);
}
