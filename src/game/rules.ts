/**
 * Terminal-state checks: win when a tile reaches the target,
 * loss when no move can change the board.
 */

import { type Board, EMPTY } from './board';

export const DEFAULT_TARGET = 2048;

export type GameStatus = 'playing' | 'won' | 'lost';

/**
 * Check if any move is possible on the board
 *
 * Adjacency scan: equivalent to asking whether any of the four
 * directions would change the board.
 */
export function canMakeMove(board: Board): boolean {
  const size = board.length;

  for (let y = 0; y < size; y++) {
    for (let x = 0; x < size; x++) {
      if (board[y][x] === EMPTY) return true;
    }
  }

  for (let y = 0; y < size; y++) {
    for (let x = 0; x < size; x++) {
      const val = board[y][x];
      if (x < size - 1 && board[y][x + 1] === val) return true;
      if (y < size - 1 && board[y + 1][x] === val) return true;
    }
  }

  return false;
}

/**
 * Check if the board contains a tile at or above the target
 */
export function hasReachedTarget(board: Board, target: number = DEFAULT_TARGET): boolean {
  for (const row of board) {
    for (const cell of row) {
      if (cell >= target) return true;
    }
  }
  return false;
}

export function getGameStatus(board: Board, target: number = DEFAULT_TARGET): GameStatus {
  if (hasReachedTarget(board, target)) return 'won';
  if (!canMakeMove(board)) return 'lost';
  return 'playing';
}
