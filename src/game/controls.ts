import type { Direction } from './board';

const KEY_DIRECTIONS = new Map<string, Direction>([
  ['ArrowUp', 'up'],
  ['ArrowDown', 'down'],
  ['ArrowLeft', 'left'],
  ['ArrowRight', 'right'],
  ['w', 'up'],
  ['s', 'down'],
  ['a', 'left'],
  ['d', 'right'],
]);

/**
 * Map a key name (DOM KeyboardEvent.key style) to a slide direction
 */
export function parseDirection(key: string): Direction | null {
  const direct = KEY_DIRECTIONS.get(key);
  if (direct) return direct;
  return key.length === 1 ? KEY_DIRECTIONS.get(key.toLowerCase()) ?? null : null;
}
