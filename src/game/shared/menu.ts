/**
 * Menu helpers for the in-game overlays
 *
 * Index-based: callers keep the selection and act on the confirmed index.
 * Arrow keys (or W/S) move, Enter/Space confirms, shortcuts jump directly.
 */

import type { KeyInput } from '../../terminal';

export interface SimpleMenuItem {
  label: string;
  shortcut?: string; // e.g., 'ESC', 'R', 'Q'
}

/**
 * Handle menu navigation
 * Returns new selection index, wrapping at both ends
 */
export function navigateMenu(
  currentSelection: number,
  itemCount: number,
  key: string,
  domEvent: Pick<KeyInput, 'key'>
): { newSelection: number; confirmed: boolean } {
  let newSelection = currentSelection;
  let confirmed = false;

  if (domEvent.key === 'ArrowUp' || key === 'w') {
    newSelection = (currentSelection - 1 + itemCount) % itemCount;
  } else if (domEvent.key === 'ArrowDown' || key === 's') {
    newSelection = (currentSelection + 1) % itemCount;
  } else if (domEvent.key === 'Enter' || domEvent.key === ' ') {
    confirmed = true;
  }

  return { newSelection, confirmed };
}

/**
 * Check if a shortcut key was pressed
 * Returns the index of the matching item, or -1 if no match
 */
export function checkShortcut(
  items: SimpleMenuItem[],
  key: string
): number {
  for (let i = 0; i < items.length; i++) {
    const shortcut = items[i].shortcut;
    if (shortcut && key === shortcut.toLowerCase()) {
      return i;
    }
  }
  return -1;
}

/**
 * Render a menu as ANSI, centered on centerX, one item per row
 */
export function renderSimpleMenu(
  items: SimpleMenuItem[],
  selection: number,
  options: {
    centerX: number;
    startY: number;
    accent: string;
    showShortcuts?: boolean;
  }
): string {
  const { centerX, startY, accent, showShortcuts = true } = options;

  let output = '';

  items.forEach((item, i) => {
    const isSelected = i === selection;

    let displayText = item.label;
    if (showShortcuts && item.shortcut) {
      displayText += ` [${item.shortcut}]`;
    }

    const text = isSelected ? `► ${displayText} ◄` : `  ${displayText}  `;
    const style = isSelected ? '\x1b[1;93m' : `\x1b[2m${accent}`;

    const itemX = Math.max(1, centerX - Math.floor(text.length / 2));
    output += `\x1b[${startY + i};${itemX}H${style}${text}\x1b[0m`;
  });

  return output;
}

export const PAUSE_MENU_ITEMS: SimpleMenuItem[] = [
  { label: 'RESUME', shortcut: 'ESC' },
  { label: 'RESTART', shortcut: 'R' },
  { label: 'UNDO', shortcut: 'U' },
  { label: 'QUIT', shortcut: 'Q' },
];

export const WIN_MENU_ITEMS: SimpleMenuItem[] = [
  { label: 'CONTINUE', shortcut: 'C' },
  { label: 'NEW GAME', shortcut: 'R' },
  { label: 'QUIT', shortcut: 'Q' },
];

export const GAME_OVER_MENU_ITEMS: SimpleMenuItem[] = [
  { label: 'RESTART', shortcut: 'R' },
  { label: 'UNDO', shortcut: 'U' },
  { label: 'QUIT', shortcut: 'Q' },
];
