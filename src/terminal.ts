/**
 * Terminal abstraction for the game runner
 *
 * The runner only needs to write ANSI output, know the screen size and
 * receive key presses. A Node adapter maps stdin/stdout onto that; an
 * xterm.js Terminal can be wrapped with fromXterm().
 */

import type { Terminal } from '@xterm/xterm';

export interface KeyInput {
  /** DOM KeyboardEvent.key compatible name */
  key: string;
  preventDefault: () => void;
  stopPropagation: () => void;
}

export interface KeyEvent {
  key: string;
  domEvent: KeyInput;
}

export interface Disposable {
  dispose: () => void;
}

export interface GameTerminal {
  write: (data: string) => void;
  readonly cols: number;
  readonly rows: number;
  onKey: (callback: (event: KeyEvent) => void) => Disposable;
}

export interface NodeTerminal extends GameTerminal {
  /** Leave the alternate screen and restore the tty */
  restore: () => void;
}

/**
 * Parse raw stdin escape sequences into key names
 * compatible with DOM KeyboardEvent.key values
 */
export function parseKey(data: string): string {
  if (data === '\x1b[A' || data === '\x1bOA') return 'ArrowUp';
  if (data === '\x1b[B' || data === '\x1bOB') return 'ArrowDown';
  if (data === '\x1b[C' || data === '\x1bOC') return 'ArrowRight';
  if (data === '\x1b[D' || data === '\x1bOD') return 'ArrowLeft';
  if (data === '\r' || data === '\n') return 'Enter';
  if (data === '\x1b') return 'Escape';
  if (data === '\x7f' || data === '\b') return 'Backspace';
  if (data === '\t') return 'Tab';
  return data;
}

function listenerSet<T>() {
  const listeners: ((value: T) => void)[] = [];
  return {
    emit(value: T) {
      for (const listener of [...listeners]) listener(value);
    },
    add(callback: (value: T) => void): Disposable {
      listeners.push(callback);
      return {
        dispose: () => {
          const idx = listeners.indexOf(callback);
          if (idx !== -1) listeners.splice(idx, 1);
        },
      };
    },
  };
}

// Synchronized output: the terminal batches clear + redraw into one paint.
const SYNC_START = '\x1b[?2026h';
const SYNC_END = '\x1b[?2026l';

/**
 * Wrap process stdin/stdout. Ctrl+C always exits, with the tty restored.
 */
export function createNodeTerminal(
  stdin: NodeJS.ReadStream = process.stdin,
  stdout: NodeJS.WriteStream = process.stdout,
): NodeTerminal {
  const keys = listenerSet<KeyEvent>();
  let restored = false;

  if (stdin.isTTY) stdin.setRawMode(true);
  stdin.resume();
  stdin.setEncoding('utf8');

  function restore() {
    if (restored) return;
    restored = true;
    if (stdin.isTTY) stdin.setRawMode(false);
    stdin.pause();
    stdout.write('\x1b[?1049l');
    stdout.write('\x1b[?25h');
    stdout.write('\x1b[0m');
  }

  stdin.on('data', (data: string) => {
    if (data === '\x03') {
      restore();
      process.exit(0);
    }
    const key = parseKey(data);
    keys.emit({
      key,
      domEvent: { key, preventDefault: () => {}, stopPropagation: () => {} },
    });
  });

  process.on('exit', restore);
  process.on('SIGINT', () => { restore(); process.exit(0); });
  process.on('SIGTERM', () => { restore(); process.exit(0); });

  return {
    write: (data: string) => {
      stdout.write(SYNC_START + data + SYNC_END);
    },
    get cols() { return stdout.columns || 80; },
    get rows() { return stdout.rows || 24; },
    onKey: keys.add,
    restore,
  };
}

/**
 * Adapt an xterm.js Terminal for the game runner
 */
export function fromXterm(terminal: Terminal): GameTerminal {
  return {
    write: (data: string) => terminal.write(data),
    get cols() { return terminal.cols; },
    get rows() { return terminal.rows; },
    onKey: (callback) => terminal.onKey(({ key, domEvent }) => callback({ key, domEvent })),
  };
}
