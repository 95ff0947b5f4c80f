/**
 * Local game statistics
 *
 * Finished games go to two tables kept in one JSON document:
 * `games` (one row per game) and `highScores` (aggregates per difficulty).
 */

import { readFileSync, writeFileSync, mkdirSync, existsSync, renameSync } from 'fs';
import { resolve, dirname } from 'path';
import { type Difficulty, getDataDir, isDifficulty } from '../config';
import type { GameRecord } from '../game/session';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface HighScoreEntry {
  bestScore: number;
  bestMaxTile: number;
  gamesPlayed: number;
  gamesWon: number;
  totalMoves: number;
  totalSeconds: number;
  lastPlayedAt: string | null;
}

export interface StatsData {
  version: 1;
  games: GameRecord[];
  highScores: Partial<Record<Difficulty, HighScoreEntry>>;
}

/**
 * Anything that accepts finished games
 */
export interface SessionRecorder {
  record(record: GameRecord): void;
}

export const MAX_GAME_HISTORY = 500;

export function getStatsPath(dataDir: string = getDataDir()): string {
  return resolve(dataDir, 'stats.json');
}

export function createEmptyStats(): StatsData {
  return { version: 1, games: [], highScores: {} };
}

function emptyEntry(): HighScoreEntry {
  return {
    bestScore: 0,
    bestMaxTile: 0,
    gamesPlayed: 0,
    gamesWon: 0,
    totalMoves: 0,
    totalSeconds: 0,
    lastPlayedAt: null,
  };
}

// ---------------------------------------------------------------------------
// Aggregation
// ---------------------------------------------------------------------------

/**
 * Add a finished game to both tables. Returns new data; the input is not mutated.
 */
export function applyRecord(stats: StatsData, record: GameRecord): StatsData {
  const previous = stats.highScores[record.difficulty] ?? emptyEntry();
  const entry: HighScoreEntry = {
    bestScore: Math.max(previous.bestScore, record.score),
    bestMaxTile: Math.max(previous.bestMaxTile, record.maxTile),
    gamesPlayed: previous.gamesPlayed + 1,
    gamesWon: previous.gamesWon + (record.won ? 1 : 0),
    totalMoves: previous.totalMoves + record.moves,
    totalSeconds: previous.totalSeconds + record.durationSeconds,
    lastPlayedAt: record.finishedAt,
  };

  return {
    version: 1,
    games: [...stats.games, record].slice(-MAX_GAME_HISTORY),
    highScores: { ...stats.highScores, [record.difficulty]: entry },
  };
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonNegative(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

export function isGameRecord(value: unknown): value is GameRecord {
  return isRecord(value) &&
    isNonNegative(value.score) &&
    isNonNegative(value.maxTile) &&
    isNonNegative(value.moves) &&
    isNonNegative(value.durationSeconds) &&
    isDifficulty(value.difficulty) &&
    typeof value.won === 'boolean' &&
    typeof value.finishedAt === 'string';
}

function isHighScoreEntry(value: unknown): value is HighScoreEntry {
  return isRecord(value) &&
    isNonNegative(value.bestScore) &&
    isNonNegative(value.bestMaxTile) &&
    isNonNegative(value.gamesPlayed) &&
    isNonNegative(value.gamesWon) &&
    isNonNegative(value.totalMoves) &&
    isNonNegative(value.totalSeconds) &&
    (value.lastPlayedAt === null || typeof value.lastPlayedAt === 'string');
}

/**
 * Validate a parsed stats document. Rows that don't check out are dropped.
 */
export function parseStats(raw: unknown): StatsData {
  const stats = createEmptyStats();
  if (!isRecord(raw)) return stats;

  if (Array.isArray(raw.games)) {
    stats.games = raw.games.filter(isGameRecord);
  }
  if (isRecord(raw.highScores)) {
    for (const [difficulty, entry] of Object.entries(raw.highScores)) {
      if (isDifficulty(difficulty) && isHighScoreEntry(entry)) {
        stats.highScores[difficulty] = entry;
      }
    }
  }
  return stats;
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

/**
 * JSON-file backed stats. Reads are forgiving (a missing or corrupt file
 * reads as empty stats); writes throw on failure.
 */
export class StatsStore implements SessionRecorder {
  constructor(private readonly path: string = getStatsPath()) {}

  load(): StatsData {
    if (!existsSync(this.path)) return createEmptyStats();
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.path, 'utf-8'));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.warn(`[Stats] Ignoring unreadable stats file ${this.path}: ${reason}`);
      return createEmptyStats();
    }
    if (!isRecord(raw)) {
      console.warn(`[Stats] Ignoring stats file ${this.path}: expected a JSON object`);
      return createEmptyStats();
    }
    return parseStats(raw);
  }

  record(record: GameRecord): void {
    this.save(applyRecord(this.load(), record));
  }

  getHighScores(): StatsData['highScores'] {
    return this.load().highScores;
  }

  /** Most recent first */
  getRecentGames(limit = 10): GameRecord[] {
    if (limit <= 0) return [];
    return this.load().games.slice(-limit).reverse();
  }

  reset(): void {
    this.save(createEmptyStats());
  }

  private save(stats: StatsData): void {
    mkdirSync(dirname(this.path), { recursive: true });
    // Write to a temp file, then rename over the target
    const tmp = `${this.path}.tmp`;
    writeFileSync(tmp, JSON.stringify(stats, null, 2));
    renameSync(tmp, this.path);
  }
}

/**
 * Recorder that keeps everything in memory
 */
export class MemoryRecorder implements SessionRecorder {
  stats: StatsData = createEmptyStats();

  record(record: GameRecord): void {
    this.stats = applyRecord(this.stats, record);
  }
}
