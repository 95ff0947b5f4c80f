import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, readFileSync, existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  MAX_GAME_HISTORY,
  MemoryRecorder,
  StatsStore,
  applyRecord,
  createEmptyStats,
  parseStats,
} from './statsStore';
import type { GameRecord } from '../game/session';

function game(overrides: Partial<GameRecord> = {}): GameRecord {
  return {
    score: 1000,
    maxTile: 128,
    moves: 150,
    durationSeconds: 90,
    difficulty: 'medium',
    won: false,
    finishedAt: '2026-03-01T10:00:00.000Z',
    ...overrides,
  };
}

describe('applyRecord', () => {
  it('appends the game and starts a high-score row', () => {
    const stats = applyRecord(createEmptyStats(), game());
    expect(stats.games).toEqual([game()]);
    expect(stats.highScores.medium).toEqual({
      bestScore: 1000,
      bestMaxTile: 128,
      gamesPlayed: 1,
      gamesWon: 0,
      totalMoves: 150,
      totalSeconds: 90,
      lastPlayedAt: '2026-03-01T10:00:00.000Z',
    });
  });

  it('keeps the best values and sums the totals', () => {
    let stats = applyRecord(createEmptyStats(), game());
    stats = applyRecord(stats, game({
      score: 400,
      maxTile: 2048,
      moves: 50,
      durationSeconds: 10.5,
      won: true,
      finishedAt: '2026-03-02T10:00:00.000Z',
    }));
    expect(stats.highScores.medium).toEqual({
      bestScore: 1000,
      bestMaxTile: 2048,
      gamesPlayed: 2,
      gamesWon: 1,
      totalMoves: 200,
      totalSeconds: 100.5,
      lastPlayedAt: '2026-03-02T10:00:00.000Z',
    });
  });

  it('keeps difficulties apart', () => {
    let stats = applyRecord(createEmptyStats(), game());
    stats = applyRecord(stats, game({ difficulty: 'hard', score: 5000 }));
    expect(stats.highScores.medium?.bestScore).toBe(1000);
    expect(stats.highScores.hard?.bestScore).toBe(5000);
    expect(stats.highScores.easy).toBeUndefined();
  });

  it('does not mutate its input', () => {
    const empty = createEmptyStats();
    applyRecord(empty, game());
    expect(empty).toEqual(createEmptyStats());
  });

  it('caps the game history', () => {
    let stats = createEmptyStats();
    for (let i = 0; i < MAX_GAME_HISTORY + 2; i++) {
      stats = applyRecord(stats, game({ score: i }));
    }
    expect(stats.games).toHaveLength(MAX_GAME_HISTORY);
    expect(stats.games[0].score).toBe(2);
    expect(stats.highScores.medium?.gamesPlayed).toBe(MAX_GAME_HISTORY + 2);
  });
});

describe('parseStats', () => {
  it('drops invalid rows and unknown difficulties', () => {
    const stats = parseStats({
      version: 1,
      games: [game(), { score: 'lots' }, game({ score: -1 })],
      highScores: {
        medium: applyRecord(createEmptyStats(), game()).highScores.medium,
        impossible: { bestScore: 1 },
      },
    });
    expect(stats.games).toEqual([game()]);
    expect(Object.keys(stats.highScores)).toEqual(['medium']);
  });

  it('returns empty stats for non-objects', () => {
    expect(parseStats(null)).toEqual(createEmptyStats());
    expect(parseStats([1, 2])).toEqual(createEmptyStats());
  });
});

describe('StatsStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'term-2048-stats-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('reads as empty when the file does not exist', () => {
    const store = new StatsStore(join(dir, 'stats.json'));
    expect(store.load()).toEqual(createEmptyStats());
    expect(store.getHighScores()).toEqual({});
  });

  it('persists recorded games across instances', () => {
    const path = join(dir, 'nested', 'stats.json');
    new StatsStore(path).record(game());
    new StatsStore(path).record(game({ score: 3000, finishedAt: '2026-03-02T10:00:00.000Z' }));

    const store = new StatsStore(path);
    expect(store.getHighScores().medium?.bestScore).toBe(3000);
    expect(store.getHighScores().medium?.gamesPlayed).toBe(2);
    expect(existsSync(`${path}.tmp`)).toBe(false);
  });

  it('lists recent games newest first', () => {
    const store = new StatsStore(join(dir, 'stats.json'));
    store.record(game({ score: 1 }));
    store.record(game({ score: 2 }));
    store.record(game({ score: 3 }));
    expect(store.getRecentGames(2).map(g => g.score)).toEqual([3, 2]);
    expect(store.getRecentGames(0)).toEqual([]);
  });

  it('reset clears both tables', () => {
    const path = join(dir, 'stats.json');
    const store = new StatsStore(path);
    store.record(game());
    store.reset();
    expect(JSON.parse(readFileSync(path, 'utf-8'))).toEqual(createEmptyStats());
  });

  it('warns and starts over on a corrupt file', () => {
    const path = join(dir, 'stats.json');
    writeFileSync(path, '{ not json');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const store = new StatsStore(path);
    expect(store.load()).toEqual(createEmptyStats());
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0])).toMatch(/^\[Stats\] Ignoring unreadable stats file /);

    store.record(game());
    expect(new StatsStore(path).getRecentGames()).toEqual([game()]);
  });
});

describe('StatsStore with a non-object document', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'term-2048-stats-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('warns and reads as empty', () => {
    const path = join(dir, 'stats.json');
    writeFileSync(path, '[]');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(new StatsStore(path).load()).toEqual(createEmptyStats());
    expect(warn).toHaveBeenCalledWith(`[Stats] Ignoring stats file ${path}: expected a JSON object`);
  });
});

describe('MemoryRecorder', () => {
  it('aggregates in memory', () => {
    const recorder = new MemoryRecorder();
    recorder.record(game({ won: true }));
    expect(recorder.stats.games).toHaveLength(1);
    expect(recorder.stats.highScores.medium?.gamesWon).toBe(1);
  });
});
