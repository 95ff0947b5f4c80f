/**
 * Frame rendering for the 2048 runner
 *
 * renderFrame() is pure: same view and size, same ANSI string.
 * The runner calls it on every tick and writes the result.
 */

import type { Board } from './board';
import { type PhosphorMode, getAnsiColor, getTileStyle } from '../themes';
import {
  type SimpleMenuItem,
  GAME_OVER_MENU_ITEMS,
  PAUSE_MENU_ITEMS,
  WIN_MENU_ITEMS,
  renderSimpleMenu,
} from './shared/menu';

export type Screen = 'start' | 'playing' | 'paused' | 'won' | 'over';

/**
 * Floating "+N" over a merged tile, in board character coordinates
 */
export interface ScorePopup {
  x: number;
  y: number;
  text: string;
  frames: number;
}

export interface FrameView {
  screen: Screen;
  board: Board;
  score: number;
  highScore: number;
  undosRemaining: number;
  maxUndos: number;
  target: number;
  difficultyLabel: string;
  theme: PhosphorMode;
  menuSelection: number;
  popups: ScorePopup[];
  /** One-line message under the board, e.g. a save failure */
  notice: string | null;
}

export const TILE_WIDTH = 8;
export const TILE_HEIGHT = 3;
const GRID_SIZE = 4;
export const GAME_WIDTH = GRID_SIZE * TILE_WIDTH + 2;
export const GAME_HEIGHT = GRID_SIZE * TILE_HEIGHT + 2;
export const MIN_COLS = 42;
export const MIN_ROWS = 24;

const title = [
  '█▀█ █▀█ █ █ █▀█',
  '▄▀  █ █ ▀▀█ █▀█',
  '█▄▄ █▄█   █ █▄█',
];

function at(row: number, col: number): string {
  return `\x1b[${row};${col}H`;
}

function centered(cols: number, text: string): number {
  return Math.max(1, Math.floor((cols - text.length) / 2));
}

export function renderTile(value: number, screenX: number, screenY: number, theme: PhosphorMode): string {
  let output = '';

  if (value === 0) {
    for (let row = 0; row < TILE_HEIGHT; row++) {
      output += `${at(screenY + row, screenX)}\x1b[38;5;238m${'░'.repeat(TILE_WIDTH)}\x1b[0m`;
    }
    return output;
  }

  const { fg, bg } = getTileStyle(theme, value);
  const text = value.toString();
  const padding = Math.floor((TILE_WIDTH - text.length) / 2);

  output += `${at(screenY, screenX)}${bg}${fg}${' '.repeat(TILE_WIDTH)}\x1b[0m`;
  output += `${at(screenY + 1, screenX)}${bg}${fg}\x1b[1m`;
  output += ' '.repeat(padding) + text + ' '.repeat(TILE_WIDTH - padding - text.length);
  output += '\x1b[0m';
  output += `${at(screenY + 2, screenX)}${bg}${fg}${' '.repeat(TILE_WIDTH)}\x1b[0m`;

  return output;
}

export function renderTooSmall(cols: number, rows: number, accent: string): string {
  const msg1 = 'Terminal too small!';
  const needWidth = cols < MIN_COLS;
  const needHeight = rows < MIN_ROWS;
  const hint = needWidth && needHeight ? 'Make window larger'
    : needWidth ? 'Make window wider ->' : 'Make window taller v';
  const msg2 = `Need: ${MIN_COLS}x${MIN_ROWS}  Have: ${cols}x${rows}`;
  const centerY = Math.floor(rows / 2);

  let output = '\x1b[2J\x1b[H';
  output += `${at(centerY - 1, centered(cols, msg1))}${accent}${msg1}\x1b[0m`;
  output += `${at(centerY + 1, centered(cols, msg2))}\x1b[2m${msg2}\x1b[0m`;
  output += `${at(centerY + 3, centered(cols, hint))}\x1b[1m${accent}${hint}\x1b[0m`;
  return output;
}

export function formatStats(view: Pick<FrameView, 'score' | 'highScore' | 'undosRemaining' | 'maxUndos'>): string {
  return `SCORE: ${view.score.toString().padStart(6, '0')}  BEST: ${view.highScore.toString().padStart(6, '0')}  UNDO: ${view.undosRemaining}/${view.maxUndos}`;
}

function overlayItems(screen: Screen): SimpleMenuItem[] | null {
  switch (screen) {
    case 'paused': return PAUSE_MENU_ITEMS;
    case 'won': return WIN_MENU_ITEMS;
    case 'over': return GAME_OVER_MENU_ITEMS;
    default: return null;
  }
}

function overlayTitle(view: FrameView): string {
  switch (view.screen) {
    case 'paused': return '══ PAUSED ══';
    case 'won': return `══ ${view.target} REACHED! ══`;
    default: return '══ GAME OVER ══';
  }
}

export function renderFrame(view: FrameView, cols: number, rows: number): string {
  const accent = getAnsiColor(view.theme);

  if (cols < MIN_COLS || rows < MIN_ROWS) {
    return renderTooSmall(cols, rows, accent);
  }

  let output = '\x1b[2J\x1b[H';

  const gameLeft = Math.max(2, Math.floor((cols - GAME_WIDTH) / 2));
  const gameTop = Math.max(6, Math.floor((rows - GAME_HEIGHT - 6) / 2) + 4);

  title.forEach((line, i) => {
    output += `${at(i + 1, centered(cols, line))}${accent}\x1b[1m${line}\x1b[0m`;
  });

  const stats = formatStats(view);
  output += `${at(gameTop - 1, centered(cols, stats))}${accent}${stats}\x1b[0m`;

  output += `${at(gameTop, gameLeft)}${accent}╔${'═'.repeat(GAME_WIDTH)}╗\x1b[0m`;
  for (let y = 0; y < GAME_HEIGHT - 2; y++) {
    output += `${at(gameTop + 1 + y, gameLeft)}${accent}║\x1b[0m`;
    output += `${at(gameTop + 1 + y, gameLeft + GAME_WIDTH + 1)}${accent}║\x1b[0m`;
  }
  output += `${at(gameTop + GAME_HEIGHT - 1, gameLeft)}${accent}╚${'═'.repeat(GAME_WIDTH)}╝\x1b[0m`;

  for (let gy = 0; gy < view.board.length; gy++) {
    for (let gx = 0; gx < view.board[gy].length; gx++) {
      const value = view.screen === 'start' ? 0 : view.board[gy][gx];
      output += renderTile(value, gameLeft + 2 + gx * TILE_WIDTH, gameTop + 1 + gy * TILE_HEIGHT, view.theme);
    }
  }

  const centerX = Math.floor(cols / 2);
  const middleY = gameTop + Math.floor(GAME_HEIGHT / 2);

  if (view.screen === 'start') {
    const startMsg = '[ PRESS ANY KEY TO PLAY ]';
    output += `${at(middleY - 1, centered(cols, startMsg))}\x1b[5m${accent}${startMsg}\x1b[0m`;
    const goal = `MERGE TILES TO REACH ${view.target}  (${view.difficultyLabel.toUpperCase()})`;
    output += `${at(middleY + 1, centered(cols, goal))}\x1b[2m${accent}${goal}\x1b[0m`;
  } else if (view.screen === 'playing') {
    for (const popup of view.popups) {
      const alpha = popup.frames > 12 ? '\x1b[1m' : '\x1b[2m';
      output += `${at(gameTop + 1 + Math.round(popup.y), gameLeft + 2 + Math.round(popup.x))}${alpha}\x1b[93m${popup.text}\x1b[0m`;
    }
  }

  const items = overlayItems(view.screen);
  if (items) {
    const heading = overlayTitle(view);
    const headingY = middleY - Math.floor(items.length / 2) - 2;
    const headingStyle = view.screen === 'over' ? '\x1b[1;91m' : view.screen === 'won' ? '\x1b[1;92m' : `\x1b[5m${accent}`;
    output += `${at(headingY, centered(cols, heading))}${headingStyle}${heading}\x1b[0m`;
    output += renderSimpleMenu(items, view.menuSelection, { centerX, startY: headingY + 2, accent });
  }

  const hint = view.screen === 'playing'
    ? `Arrows/WASD: SLIDE  U: UNDO(${view.undosRemaining})  ESC: MENU`
    : view.screen === 'start' ? 'Arrows/WASD: SLIDE  U: UNDO  ESC: MENU' : 'Up/Down select   ENTER confirm';
  output += `${at(gameTop + GAME_HEIGHT + 1, centered(cols, hint))}\x1b[2m${accent}${hint}\x1b[0m`;

  if (view.notice) {
    output += `${at(gameTop + GAME_HEIGHT + 3, centered(cols, view.notice))}\x1b[1;91m${view.notice}\x1b[0m`;
  }

  return output;
}
