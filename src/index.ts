/**
 * term-2048
 *
 * 2048 for the terminal: a pure move engine, a session model with undo,
 * local stats, and a runner for Node TTYs or xterm.js.
 *
 * Library usage (xterm.js):
 *   import { run2048Game, fromXterm } from 'term-2048';
 *   const controller = run2048Game(fromXterm(terminal), { config: { theme: 'amber' } });
 *
 * CLI usage:
 *   npx term-2048
 */

export {
  // Board
  BOARD_SIZE,
  EMPTY,
  DIRECTIONS,
  BoardError,
  createBoard,
  createEmptyBoard,
  cloneBoard,
  boardsEqual,
  getEmptyCells,
  countTiles,
  getMaxTile,
  isPowerOfTwo,
  type Board,
  type Cell,
  type Direction,
} from './game/board';

export { slide, move, type SlideResult, type MoveResult } from './game/slideLogic';
export { spawnTile, DEFAULT_FOUR_PROBABILITY, type SpawnOptions, type SpawnResult } from './game/spawn';
export { canMakeMove, hasReachedTarget, getGameStatus, DEFAULT_TARGET, type GameStatus } from './game/rules';

export {
  createSession,
  applyMove,
  continueAfterWin,
  undoMove,
  canUndo,
  isAcceptingMoves,
  finalizeSession,
  DEFAULT_MAX_UNDOS,
  type GameSession,
  type GameRecord,
  type SessionOptions,
  type TurnResult,
} from './game/session';

// Runner
export { run2048Game, type Game2048Controller, type Game2048Options } from './game';
export { renderFrame, type FrameView, type Screen } from './game/render';
export { parseDirection } from './game/controls';
export {
  createNodeTerminal,
  fromXterm,
  parseKey,
  type GameTerminal,
  type NodeTerminal,
  type KeyEvent,
  type KeyInput,
} from './terminal';

// Stats
export {
  StatsStore,
  MemoryRecorder,
  applyRecord,
  parseStats,
  createEmptyStats,
  getStatsPath,
  type SessionRecorder,
  type StatsData,
  type HighScoreEntry,
} from './stats/statsStore';

// Config & themes
export {
  DEFAULT_CONFIG,
  DIFFICULTIES,
  loadConfig,
  saveConfig,
  parseConfig,
  getConfigPath,
  type GameConfig,
  type Difficulty,
} from './config';
export { themes, getThemeModes, isValidThemeMode, type PhosphorMode } from './themes';
