/**
 * Game session state and the turn step
 *
 * A session owns one board. Each accepted move runs the slide logic,
 * adds the merge score, spawns a tile and re-checks the terminal state.
 * Rejected moves (nothing would change) leave the session untouched.
 */

import { type Board, type Direction, cloneBoard, createBoard, createEmptyBoard, getMaxTile } from './board';
import { move } from './slideLogic';
import { type SpawnResult, spawnTile } from './spawn';
import { type GameStatus, DEFAULT_TARGET, canMakeMove, hasReachedTarget } from './rules';
import { type Difficulty, DIFFICULTIES } from '../config';

export const DEFAULT_MAX_UNDOS = 3;

/**
 * What the session recorder receives when a game ends
 */
export interface GameRecord {
  score: number;
  maxTile: number;
  moves: number;
  durationSeconds: number;
  difficulty: Difficulty;
  won: boolean;
  /** ISO timestamp */
  finishedAt: string;
}

interface Snapshot {
  board: Board;
  score: number;
  moves: number;
  maxTile: number;
  status: GameStatus;
  won: boolean;
  continuedAfterWin: boolean;
}

export interface GameSession {
  board: Board;
  score: number;
  moves: number;
  maxTile: number;
  status: GameStatus;
  /** Target tile reached at some point in this session */
  won: boolean;
  continuedAfterWin: boolean;
  difficulty: Difficulty;
  target: number;
  startedAt: number;
  undoStack: Snapshot[];
  undosRemaining: number;
  maxUndos: number;
  record: GameRecord | null;
  random: () => number;
  now: () => number;
}

export interface SessionOptions {
  difficulty?: Difficulty;
  target?: number;
  maxUndos?: number;
  /** Start from this board instead of two random tiles */
  board?: number[][];
  random?: () => number;
  now?: () => number;
}

export interface TurnResult {
  accepted: boolean;
  scoreDelta: number;
  merged: boolean[][] | null;
  spawn: SpawnResult | null;
  status: GameStatus;
}

function spawnInto(session: GameSession): SpawnResult | null {
  const spawn = spawnTile(session.board, {
    fourProbability: DIFFICULTIES[session.difficulty].fourProbability,
    random: session.random,
  });
  if (spawn) session.board = spawn.board;
  return spawn;
}

function computeStatus(session: GameSession): GameStatus {
  if (!session.continuedAfterWin && hasReachedTarget(session.board, session.target)) return 'won';
  return canMakeMove(session.board) ? 'playing' : 'lost';
}

export function createSession(options: SessionOptions = {}): GameSession {
  const maxUndos = options.maxUndos ?? DEFAULT_MAX_UNDOS;
  const now = options.now ?? Date.now;

  const session: GameSession = {
    board: options.board ? createBoard(options.board) : createEmptyBoard(),
    score: 0,
    moves: 0,
    maxTile: 0,
    status: 'playing',
    won: false,
    continuedAfterWin: false,
    difficulty: options.difficulty ?? 'medium',
    target: options.target ?? DEFAULT_TARGET,
    startedAt: now(),
    undoStack: [],
    undosRemaining: maxUndos,
    maxUndos,
    record: null,
    random: options.random ?? Math.random,
    now,
  };

  if (!options.board) {
    spawnInto(session);
    spawnInto(session);
  }

  session.maxTile = getMaxTile(session.board);
  session.status = computeStatus(session);
  session.won = session.status === 'won';
  return session;
}

/**
 * Whether the session accepts moves right now. A won session must be
 * continued first; a lost or finalized one never does.
 */
export function isAcceptingMoves(session: GameSession): boolean {
  return session.record === null && session.status === 'playing';
}

export function applyMove(session: GameSession, direction: Direction): TurnResult {
  if (!isAcceptingMoves(session)) {
    return { accepted: false, scoreDelta: 0, merged: null, spawn: null, status: session.status };
  }

  const result = move(session.board, direction);
  if (!result.moved) {
    return { accepted: false, scoreDelta: 0, merged: null, spawn: null, status: session.status };
  }

  if (session.maxUndos > 0) {
    if (session.undoStack.length >= session.maxUndos) session.undoStack.shift();
    session.undoStack.push({
      board: cloneBoard(session.board),
      score: session.score,
      moves: session.moves,
      maxTile: session.maxTile,
      status: session.status,
      won: session.won,
      continuedAfterWin: session.continuedAfterWin,
    });
  }

  session.board = result.board;
  session.score += result.scoreDelta;
  session.moves++;

  const spawn = spawnInto(session);
  session.maxTile = Math.max(session.maxTile, getMaxTile(session.board));
  session.status = computeStatus(session);
  if (session.status === 'won') session.won = true;

  return { accepted: true, scoreDelta: result.scoreDelta, merged: result.merged, spawn, status: session.status };
}

/**
 * Keep playing after reaching the target. The target is not
 * reported again for the rest of the session.
 */
export function continueAfterWin(session: GameSession): void {
  if (session.status !== 'won') return;
  session.continuedAfterWin = true;
  session.status = computeStatus(session);
}

export function canUndo(session: GameSession): boolean {
  return session.record === null && session.undoStack.length > 0 && session.undosRemaining > 0;
}

/**
 * Roll back the last accepted move (board, score and counters)
 */
export function undoMove(session: GameSession): boolean {
  if (!canUndo(session)) return false;
  const snapshot = session.undoStack.pop();
  if (!snapshot) return false;

  session.board = snapshot.board;
  session.score = snapshot.score;
  session.moves = snapshot.moves;
  session.maxTile = snapshot.maxTile;
  session.status = snapshot.status;
  session.won = snapshot.won;
  session.continuedAfterWin = snapshot.continuedAfterWin;
  session.undosRemaining--;
  return true;
}

/**
 * Close the session and build its record. Calling it again
 * returns the same record.
 */
export function finalizeSession(session: GameSession): GameRecord {
  if (session.record) return session.record;

  const finishedAt = session.now();
  session.record = {
    score: session.score,
    maxTile: session.maxTile,
    moves: session.moves,
    durationSeconds: Math.max(0, finishedAt - session.startedAt) / 1000,
    difficulty: session.difficulty,
    won: session.won,
    finishedAt: new Date(finishedAt).toISOString(),
  };
  return session.record;
}
