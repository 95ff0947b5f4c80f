/**
 * Pure slide/merge logic for 2048
 *
 * Every move reduces to sliding lines toward index 0: rows for left/right,
 * columns for up/down, reversed when travelling toward the far edge.
 */

import { type Board, type Direction, EMPTY, boardsEqual, cloneBoard } from './board';

export interface SlideResult {
  result: number[];
  merged: boolean[];
  moved: boolean;
  mergeScore: number;
}

export interface MoveResult {
  board: Board;
  /** merged[y][x] is true where a tile was created by a merge this move */
  merged: boolean[][];
  moved: boolean;
  scoreDelta: number;
}

/**
 * Slide and merge a line of tiles toward index 0
 *
 * Tiles merge at most once per slide, pairing from the leading edge:
 * [2, 2, 2, 0] becomes [4, 2, 0, 0].
 */
export function slide(line: number[]): SlideResult {
  const filtered = line.filter(x => x !== EMPTY);
  const result: number[] = [];
  const merged: boolean[] = [];
  let mergeScore = 0;

  let i = 0;
  while (i < filtered.length) {
    if (i + 1 < filtered.length && filtered[i] === filtered[i + 1]) {
      const newVal = filtered[i] * 2;
      result.push(newVal);
      merged.push(true);
      mergeScore += newVal;
      i += 2;
    } else {
      result.push(filtered[i]);
      merged.push(false);
      i++;
    }
  }

  while (result.length < line.length) {
    result.push(EMPTY);
    merged.push(false);
  }

  const moved = line.some((v, idx) => v !== result[idx]);
  return { result, merged, moved, mergeScore };
}

function readLine(board: Board, direction: Direction, index: number): number[] {
  const size = board.length;
  const line: number[] = [];
  for (let i = 0; i < size; i++) {
    switch (direction) {
      case 'left': line.push(board[index][i]); break;
      case 'right': line.push(board[index][size - 1 - i]); break;
      case 'up': line.push(board[i][index]); break;
      case 'down': line.push(board[size - 1 - i][index]); break;
    }
  }
  return line;
}

function writeLine<T>(grid: T[][], direction: Direction, index: number, line: T[]): void {
  const size = grid.length;
  for (let i = 0; i < size; i++) {
    switch (direction) {
      case 'left': grid[index][i] = line[i]; break;
      case 'right': grid[index][size - 1 - i] = line[i]; break;
      case 'up': grid[i][index] = line[i]; break;
      case 'down': grid[size - 1 - i][index] = line[i]; break;
    }
  }
}

/**
 * Apply a move to the whole board. The input board is left untouched.
 *
 * A move that leaves the board unchanged reports moved = false and a
 * zero score delta.
 */
export function move(board: Board, direction: Direction): MoveResult {
  const next = cloneBoard(board);
  const merged = board.map(row => row.map(() => false));
  let scoreDelta = 0;

  for (let index = 0; index < board.length; index++) {
    const { result, merged: lineMerged, mergeScore } = slide(readLine(board, direction, index));
    writeLine(next, direction, index, result);
    writeLine(merged, direction, index, lineMerged);
    scoreDelta += mergeScore;
  }

  const moved = !boardsEqual(board, next);
  return { board: next, merged, moved, scoreDelta: moved ? scoreDelta : 0 };
}
