/**
 * Terminal color themes
 *
 * Each theme pairs an accent color (borders, text, menus) with a tile
 * palette. Dark themes use the dark palette, light themes the light one.
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
  | 'nord'
  | 'solarized'
  | 'daylight'
  | 'cream';

export interface ThemeColors {
  /** Display name */
  name: string;
  /** Accent ANSI escape (foreground) */
  accent: string;
  light: boolean;
}

export interface TileStyle {
  fg: string;
  bg: string;
}

export type TilePalette = Record<number, TileStyle>;

export const themes: Record<PhosphorMode, ThemeColors> = {
  cyan: { name: 'Cyberpunk', accent: '\x1b[96m', light: false },
  amber: { name: 'Fallout', accent: '\x1b[38;5;214m', light: false },
  green: { name: 'Matrix', accent: '\x1b[92m', light: false },
  white: { name: 'Ghost', accent: '\x1b[97m', light: false },
  hotpink: { name: 'Synthwave', accent: '\x1b[38;5;205m', light: false },
  nord: { name: 'Nord', accent: '\x1b[38;5;110m', light: false },
  solarized: { name: 'Solarized', accent: '\x1b[38;5;37m', light: false },
  daylight: { name: 'Daylight', accent: '\x1b[38;5;236m', light: true },
  cream: { name: 'Cream', accent: '\x1b[38;5;94m', light: true },
};

// 256-color approximations of the classic 2048 tile colors
const DARK_TILES: TilePalette = {
  2: { fg: '\x1b[38;5;252m', bg: '\x1b[48;5;236m' },
  4: { fg: '\x1b[38;5;230m', bg: '\x1b[48;5;238m' },
  8: { fg: '\x1b[38;5;231m', bg: '\x1b[48;5;173m' },
  16: { fg: '\x1b[38;5;231m', bg: '\x1b[48;5;209m' },
  32: { fg: '\x1b[38;5;231m', bg: '\x1b[48;5;203m' },
  64: { fg: '\x1b[38;5;231m', bg: '\x1b[48;5;196m' },
  128: { fg: '\x1b[38;5;231m', bg: '\x1b[48;5;179m' },
  256: { fg: '\x1b[38;5;231m', bg: '\x1b[48;5;178m' },
  512: { fg: '\x1b[38;5;231m', bg: '\x1b[48;5;172m' },
  1024: { fg: '\x1b[38;5;231m', bg: '\x1b[48;5;136m' },
  2048: { fg: '\x1b[38;5;231m', bg: '\x1b[48;5;220m' },
};

const LIGHT_TILES: TilePalette = {
  2: { fg: '\x1b[38;5;239m', bg: '\x1b[48;5;255m' },
  4: { fg: '\x1b[38;5;239m', bg: '\x1b[48;5;230m' },
  8: { fg: '\x1b[38;5;231m', bg: '\x1b[48;5;216m' },
  16: { fg: '\x1b[38;5;231m', bg: '\x1b[48;5;209m' },
  32: { fg: '\x1b[38;5;231m', bg: '\x1b[48;5;203m' },
  64: { fg: '\x1b[38;5;231m', bg: '\x1b[48;5;202m' },
  128: { fg: '\x1b[38;5;231m', bg: '\x1b[48;5;222m' },
  256: { fg: '\x1b[38;5;231m', bg: '\x1b[48;5;221m' },
  512: { fg: '\x1b[38;5;231m', bg: '\x1b[48;5;220m' },
  1024: { fg: '\x1b[38;5;231m', bg: '\x1b[48;5;214m' },
  2048: { fg: '\x1b[38;5;231m', bg: '\x1b[48;5;178m' },
};

/** Tiles past the palette (4096 and up) */
const SUPER_TILE: TileStyle = { fg: '\x1b[38;5;231m', bg: '\x1b[48;5;53m' };

/**
 * Get theme colors by mode
 */
export function getTheme(mode: PhosphorMode): ThemeColors {
  return themes[mode];
}

/**
 * Get ANSI escape code for a theme
 */
export function getAnsiColor(mode: PhosphorMode): string {
  return themes[mode].accent;
}

export function isLightTheme(mode: PhosphorMode): boolean {
  return themes[mode].light;
}

export function getTileStyle(mode: PhosphorMode, value: number): TileStyle {
  const palette = isLightTheme(mode) ? LIGHT_TILES : DARK_TILES;
  return palette[value] ?? SUPER_TILE;
}

/**
 * Get all available theme modes
 */
export function getThemeModes(): PhosphorMode[] {
  return Object.keys(themes).filter(isValidThemeMode);
}

export function isValidThemeMode(value: string): value is PhosphorMode {
  return Object.prototype.hasOwnProperty.call(themes, value);
}
