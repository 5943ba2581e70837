/**
 * Terminal color themes
 *
 * ANSI accent colors for the game's text, borders and menus.
 */

/**
 * Available theme identifiers
 */
export type ThemeMode =
  | 'cyan'
  | 'amber'
  | 'green'
  | 'white'
  | 'hotpink'
  | 'blood'
  | 'ice'
  | 'daylight'
  | 'solarized'
  | 'nord'
  | 'highcontrast'
  | 'cream';

export interface ThemeColors {
  /** Display name */
  name: string;
  /** Accent escape code */
  ansi: string;
  /** Muted escape code for background details */
  subtle: string;
  /** Light terminal background, needs dark text */
  light: boolean;
}

export const themes: Record<ThemeMode, ThemeColors> = {
  cyan: { name: 'Doorbuster Cyan', ansi: '\x1b[96m', subtle: '\x1b[38;5;236m', light: false },
  amber: { name: 'Receipt Amber', ansi: '\x1b[93m', subtle: '\x1b[38;5;236m', light: false },
  green: { name: 'Price Tag Green', ansi: '\x1b[92m', subtle: '\x1b[38;5;236m', light: false },
  white: { name: 'Fluorescent', ansi: '\x1b[97m', subtle: '\x1b[38;5;236m', light: false },
  hotpink: { name: 'Clearance Pink', ansi: '\x1b[95m', subtle: '\x1b[38;5;236m', light: false },
  blood: { name: 'Sold Out Red', ansi: '\x1b[91m', subtle: '\x1b[38;5;236m', light: false },
  ice: { name: 'Freezer Aisle', ansi: '\x1b[96m', subtle: '\x1b[38;5;236m', light: false },
  daylight: { name: 'Daylight', ansi: '\x1b[34m', subtle: '\x1b[38;5;252m', light: true },
  solarized: { name: 'Solarized', ansi: '\x1b[36m', subtle: '\x1b[38;5;236m', light: false },
  nord: { name: 'Nord', ansi: '\x1b[96m', subtle: '\x1b[38;5;236m', light: false },
  highcontrast: { name: 'High Contrast', ansi: '\x1b[97m', subtle: '\x1b[38;5;238m', light: false },
  cream: { name: 'Paper Bag', ansi: '\x1b[38;5;130m', subtle: '\x1b[38;5;223m', light: true },
};

export const DEFAULT_THEME: ThemeMode = 'cyan';

/**
 * ANSI reset code
 */
export const ANSI_RESET = '\x1b[0m';

export function getTheme(mode: ThemeMode): ThemeColors {
  return themes[mode];
}

export function getAnsiColor(mode: ThemeMode): string {
  return themes[mode].ansi;
}

export function isLightTheme(mode: ThemeMode): boolean {
  return themes[mode].light;
}

export function getSubtleColor(mode: ThemeMode): string {
  return themes[mode].subtle;
}

const THEME_MODES = new Set<string>(Object.keys(themes));

export function isValidThemeMode(value: string): value is ThemeMode {
  return THEME_MODES.has(value);
}

export function getThemeModes(): ThemeMode[] {
  return Object.keys(themes).filter(isValidThemeMode);
}
