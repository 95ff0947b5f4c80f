import { type Board, type Cell, cloneBoard, getEmptyCells } from './board';

export interface SpawnOptions {
  /** Chance that a spawned tile is a 4 rather than a 2 */
  fourProbability?: number;
  random?: () => number;
}

export interface SpawnResult {
  board: Board;
  cell: Cell;
  value: 2 | 4;
}

export const DEFAULT_FOUR_PROBABILITY = 0.1;

/**
 * Place a 2 or 4 in a uniformly chosen empty cell.
 * Returns null when the board is full.
 */
export function spawnTile(board: Board, options: SpawnOptions = {}): SpawnResult | null {
  const { fourProbability = DEFAULT_FOUR_PROBABILITY, random = Math.random } = options;
  const empty = getEmptyCells(board);
  if (empty.length === 0) return null;

  const index = Math.min(empty.length - 1, Math.floor(random() * empty.length));
  const [x, y] = empty[index];
  const value = random() < fourProbability ? 4 : 2;

  const next = cloneBoard(board);
  next[y][x] = value;
  return { board: next, cell: [x, y], value };
}
