/**
 * Terminal 2048
 *
 * Runs one game session at a time on a GameTerminal: reads keys, drives
 * the session, redraws, and hands finished sessions to the recorder.
 */

import type { GameTerminal, KeyEvent } from '../terminal';
import { type GameConfig, DEFAULT_CONFIG, DIFFICULTIES } from '../config';
import type { SessionRecorder } from '../stats/statsStore';
import {
  type GameSession,
  type SessionOptions,
  applyMove,
  continueAfterWin,
  createSession,
  finalizeSession,
  undoMove,
} from './session';
import { type Screen, type ScorePopup, TILE_HEIGHT, TILE_WIDTH, renderFrame } from './render';
import {
  type SimpleMenuItem,
  GAME_OVER_MENU_ITEMS,
  PAUSE_MENU_ITEMS,
  WIN_MENU_ITEMS,
  checkShortcut,
  navigateMenu,
} from './shared/menu';
import { parseDirection } from './controls';

/**
 * 2048 Game Controller
 */
export interface Game2048Controller {
  stop: () => void;
  isRunning: boolean;
}

export interface Game2048Options {
  config?: Partial<GameConfig>;
  /** Receives each finished session with at least one accepted move */
  recorder?: SessionRecorder;
  /** Best score so far, shown beside the live score */
  highScore?: number;
  onQuit?: () => void;
  onRecordError?: (err: unknown) => void;
  /** Seed the session (fixed board, random source, clock) */
  session?: Pick<SessionOptions, 'board' | 'random' | 'now'>;
}

const TICK_MS = 50;
const POPUP_FRAMES = 20;

export function run2048Game(terminal: GameTerminal, options: Game2048Options = {}): Game2048Controller {
  const config: GameConfig = { ...DEFAULT_CONFIG, ...options.config };

  // -------------------------------------------------------------------------
  // STATE
  // -------------------------------------------------------------------------
  let running = true;
  let screen: Screen = 'start';
  let menuSelection = 0;
  let highScore = options.highScore ?? 0;
  let popups: ScorePopup[] = [];
  let notice: string | null = null;
  let session: GameSession = newSession();

  let tickInterval: ReturnType<typeof setInterval> | null = null;
  let keyListener: { dispose: () => void } | null = null;

  function newSession(): GameSession {
    return createSession({
      difficulty: config.difficulty,
      target: config.target,
      maxUndos: config.undos,
      ...options.session,
    });
  }

  // -------------------------------------------------------------------------
  // CONTROLLER
  // -------------------------------------------------------------------------
  const controller: Game2048Controller = {
    stop: () => {
      if (!running) return;
      running = false;
      if (tickInterval) clearInterval(tickInterval);
      keyListener?.dispose();
      recordSession();
    },
    get isRunning() { return running; },
  };

  // -------------------------------------------------------------------------
  // SESSION LIFECYCLE
  // -------------------------------------------------------------------------

  function recordSession() {
    if (session.record || session.moves === 0) return;
    const record = finalizeSession(session);
    highScore = Math.max(highScore, record.score);
    if (!options.recorder) return;
    try {
      options.recorder.record(record);
    } catch (err) {
      notice = 'STATS NOT SAVED';
      options.onRecordError?.(err);
    }
  }

  function restart() {
    notice = null;
    recordSession();
    session = newSession();
    popups = [];
    screen = 'playing';
  }

  function quit() {
    controller.stop();
    options.onQuit?.();
  }

  function undo(): boolean {
    if (!undoMove(session)) return false;
    popups = [];
    screen = 'playing';
    return true;
  }

  // -------------------------------------------------------------------------
  // MOVE HANDLING
  // -------------------------------------------------------------------------

  function addMergePopups(merged: boolean[][]) {
    for (let y = 0; y < merged.length; y++) {
      for (let x = 0; x < merged[y].length; x++) {
        if (!merged[y][x]) continue;
        const text = `+${session.board[y][x]}`;
        popups.push({
          x: x * TILE_WIDTH + Math.floor((TILE_WIDTH - text.length) / 2),
          y: y * TILE_HEIGHT,
          text,
          frames: POPUP_FRAMES,
        });
      }
    }
  }

  function handlePlayingKey(rawKey: string, key: string) {
    if (key === 'escape') {
      screen = 'paused';
      menuSelection = 0;
      return;
    }
    if (key === 'u') {
      undo();
      return;
    }

    const direction = parseDirection(rawKey);
    if (!direction) return;

    const turn = applyMove(session, direction);
    if (!turn.accepted) return;
    if (turn.merged) addMergePopups(turn.merged);

    if (turn.status === 'won') {
      screen = 'won';
      menuSelection = 0;
    } else if (turn.status === 'lost') {
      screen = 'over';
      menuSelection = 0;
    }
  }

  // -------------------------------------------------------------------------
  // MENUS
  // -------------------------------------------------------------------------

  function menuItems(): SimpleMenuItem[] {
    if (screen === 'paused') return PAUSE_MENU_ITEMS;
    if (screen === 'won') return WIN_MENU_ITEMS;
    return GAME_OVER_MENU_ITEMS;
  }

  function confirmMenu(index: number) {
    if (screen === 'paused') {
      switch (index) {
        case 0: screen = 'playing'; break;
        case 1: restart(); break;
        case 2: undo(); screen = 'playing'; break;
        case 3: quit(); break;
      }
    } else if (screen === 'won') {
      switch (index) {
        case 0:
          continueAfterWin(session);
          screen = session.status === 'lost' ? 'over' : 'playing';
          menuSelection = 0;
          break;
        case 1: restart(); break;
        case 2: quit(); break;
      }
    } else if (screen === 'over') {
      switch (index) {
        case 0: restart(); break;
        case 1: undo(); break;
        case 2: quit(); break;
      }
    }
  }

  function handleMenuKey(rawKey: string, key: string) {
    if (screen === 'paused' && key === 'escape') {
      screen = 'playing';
      return;
    }

    const items = menuItems();
    const shortcut = checkShortcut(items, key);
    if (shortcut !== -1) {
      confirmMenu(shortcut);
      return;
    }

    const { newSelection, confirmed } = navigateMenu(menuSelection, items.length, key, { key: rawKey });
    if (confirmed) {
      confirmMenu(menuSelection);
    } else {
      menuSelection = newSelection;
    }
  }

  function handleKey({ domEvent }: KeyEvent) {
    if (!running) return;

    domEvent.preventDefault();
    domEvent.stopPropagation();

    const key = domEvent.key.toLowerCase();

    if (screen === 'start') {
      if (key === 'q') quit();
      else screen = 'playing';
    } else if (screen === 'playing') {
      handlePlayingKey(domEvent.key, key);
    } else {
      handleMenuKey(domEvent.key, key);
    }

    if (running) render();
  }

  // -------------------------------------------------------------------------
  // LOOP
  // -------------------------------------------------------------------------

  function update() {
    for (let i = popups.length - 1; i >= 0; i--) {
      const popup = popups[i];
      popup.y -= 0.1;
      popup.frames--;
      if (popup.frames <= 0) popups.splice(i, 1);
    }
  }

  function render() {
    terminal.write(renderFrame({
      screen,
      board: session.board,
      score: session.score,
      highScore: Math.max(highScore, session.score),
      undosRemaining: session.undosRemaining,
      maxUndos: session.maxUndos,
      target: session.target,
      difficultyLabel: DIFFICULTIES[session.difficulty].label,
      theme: config.theme,
      menuSelection,
      popups,
      notice,
    }, terminal.cols, terminal.rows));
  }

  setTimeout(() => {
    if (!running) return;

    terminal.write('\x1b[?1049h');
    terminal.write('\x1b[?25l');

    keyListener = terminal.onKey(handleKey);
    tickInterval = setInterval(() => {
      update();
      render();
    }, TICK_MS);
    render();
  }, TICK_MS);

  return controller;
}
