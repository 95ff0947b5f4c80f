/**
 * Board model for 2048
 *
 * A board is a 4x4 grid of tile values, rows top to bottom.
 * Empty cells hold 0; every other cell holds a power of two >= 2.
 */

export const BOARD_SIZE = 4;
export const EMPTY = 0;

export type Board = number[][];

export type Direction = 'up' | 'down' | 'left' | 'right';

export const DIRECTIONS: readonly Direction[] = ['up', 'down', 'left', 'right'];

/** Grid coordinate as [x, y] (column, row) */
export type Cell = [number, number];

/**
 * Raised when a board is built from malformed input
 */
export class BoardError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BoardError';
  }
}

export function isPowerOfTwo(n: number): boolean {
  return Number.isInteger(n) && n >= 2 && Number.isInteger(Math.log2(n));
}

/**
 * Build a board from raw rows, checking shape and tile values.
 * The rows are copied; the caller's arrays are never shared.
 */
export function createBoard(rows: number[][]): Board {
  if (rows.length !== BOARD_SIZE) {
    throw new BoardError(`Expected ${BOARD_SIZE} rows, got ${rows.length}`);
  }
  rows.forEach((row, y) => {
    if (row.length !== BOARD_SIZE) {
      throw new BoardError(`Row ${y} has ${row.length} cells, expected ${BOARD_SIZE}`);
    }
    row.forEach((value, x) => {
      if (value !== EMPTY && !isPowerOfTwo(value)) {
        throw new BoardError(`Invalid tile ${value} at (${x}, ${y})`);
      }
    });
  });
  return cloneBoard(rows);
}

export function createEmptyBoard(): Board {
  return Array.from({ length: BOARD_SIZE }, () => Array<number>(BOARD_SIZE).fill(EMPTY));
}

export function cloneBoard(board: Board): Board {
  return board.map(row => [...row]);
}

export function boardsEqual(a: Board, b: Board): boolean {
  if (a.length !== b.length) return false;
  for (let y = 0; y < a.length; y++) {
    if (a[y].length !== b[y].length) return false;
    for (let x = 0; x < a[y].length; x++) {
      if (a[y][x] !== b[y][x]) return false;
    }
  }
  return true;
}

/**
 * Empty cells in row-major order
 */
export function getEmptyCells(board: Board): Cell[] {
  const empty: Cell[] = [];
  for (let y = 0; y < board.length; y++) {
    for (let x = 0; x < board[y].length; x++) {
      if (board[y][x] === EMPTY) {
        empty.push([x, y]);
      }
    }
  }
  return empty;
}

export function countTiles(board: Board): number {
  let count = 0;
  for (const row of board) {
    for (const cell of row) {
      if (cell !== EMPTY) count++;
    }
  }
  return count;
}

export function getMaxTile(board: Board): number {
  let max = EMPTY;
  for (const row of board) {
    for (const cell of row) {
      if (cell > max) max = cell;
    }
  }
  return max;
}
