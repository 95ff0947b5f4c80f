/**
 * User configuration for term-2048
 *
 * Read from ~/.term-2048/config.json (or $TERM_2048_HOME/config.json),
 * merged over defaults. Bad fields fall back to their default.
 */

import { readFileSync, writeFileSync, mkdirSync, existsSync } from 'fs';
import { resolve, dirname } from 'path';
import { homedir } from 'os';
import { type PhosphorMode, isValidThemeMode } from './themes';
import { isPowerOfTwo } from './game/board';

// ---------------------------------------------------------------------------
// Types & defaults
// ---------------------------------------------------------------------------

export type Difficulty = 'easy' | 'medium' | 'hard';

export interface DifficultySettings {
  label: string;
  fourProbability: number;
}

export const DIFFICULTIES: Record<Difficulty, DifficultySettings> = {
  easy: { label: 'Easy', fourProbability: 0.05 },
  medium: { label: 'Medium', fourProbability: 0.1 },
  hard: { label: 'Hard', fourProbability: 0.15 },
};

export interface GameConfig {
  theme: PhosphorMode;
  difficulty: Difficulty;
  target: number;
  undos: number;
}

export const DEFAULT_CONFIG: GameConfig = {
  theme: 'cyan',
  difficulty: 'medium',
  target: 2048,
  undos: 3,
};

export const MIN_TARGET = 8;
export const MAX_TARGET = 131072;
export const MAX_UNDOS = 10;

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export function getDataDir(): string {
  return process.env.TERM_2048_HOME || resolve(homedir(), '.term-2048');
}

export function getConfigPath(dataDir: string = getDataDir()): string {
  return resolve(dataDir, 'config.json');
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export function isDifficulty(value: unknown): value is Difficulty {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(DIFFICULTIES, value);
}

export function isValidTarget(value: unknown): value is number {
  return typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= MIN_TARGET &&
    value <= MAX_TARGET &&
    isPowerOfTwo(value);
}

export function isValidUndos(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= MAX_UNDOS;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge raw (parsed JSON) settings over the defaults.
 * Returns the config plus one warning per rejected field.
 */
export function parseConfig(raw: unknown): { config: GameConfig; warnings: string[] } {
  const config: GameConfig = { ...DEFAULT_CONFIG };
  const warnings: string[] = [];

  if (!isRecord(raw)) {
    warnings.push('config is not a JSON object, using defaults');
    return { config, warnings };
  }

  if (raw.theme !== undefined) {
    if (typeof raw.theme === 'string' && isValidThemeMode(raw.theme)) config.theme = raw.theme;
    else warnings.push(`unknown theme ${JSON.stringify(raw.theme)}`);
  }
  if (raw.difficulty !== undefined) {
    if (isDifficulty(raw.difficulty)) config.difficulty = raw.difficulty;
    else warnings.push(`unknown difficulty ${JSON.stringify(raw.difficulty)}`);
  }
  if (raw.target !== undefined) {
    if (isValidTarget(raw.target)) config.target = raw.target;
    else warnings.push(`target must be a power of two between ${MIN_TARGET} and ${MAX_TARGET}`);
  }
  if (raw.undos !== undefined) {
    if (isValidUndos(raw.undos)) config.undos = raw.undos;
    else warnings.push(`undos must be an integer between 0 and ${MAX_UNDOS}`);
  }

  return { config, warnings };
}

// ---------------------------------------------------------------------------
// Load / save
// ---------------------------------------------------------------------------

export function loadConfig(path: string = getConfigPath()): GameConfig {
  if (!existsSync(path)) return { ...DEFAULT_CONFIG };

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.warn(`[Config] Could not read ${path}: ${reason}`);
    return { ...DEFAULT_CONFIG };
  }

  const { config, warnings } = parseConfig(raw);
  for (const warning of warnings) {
    console.warn(`[Config] ${warning}`);
  }
  return config;
}

export function saveConfig(config: GameConfig, path: string = getConfigPath()): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(config, null, 2) + '\n');
}
