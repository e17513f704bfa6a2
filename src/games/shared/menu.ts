/**
 * Pause and game-over menus
 *
 * A menu is a list of actions. Keys either move the cursor, confirm the
 * highlighted action, or jump straight to an action through its shortcut.
 */

import { getCurrentThemeColor } from '../utils';

export type MenuAction = 'resume' | 'restart' | 'quit';

export interface MenuItem {
  readonly label: string;
  readonly action: MenuAction;
  /** Shown as `[R]`; matched against the pressed key case-insensitively */
  readonly shortcut?: string;
}

export type Menu = readonly MenuItem[];

export interface MenuKeyResult {
  selection: number;
  /** Action chosen by this key, if any */
  action: MenuAction | null;
}

function defineMenu(items: MenuItem[]): Menu {
  return Object.freeze(items.map(item => Object.freeze(item)));
}

export const PAUSE_MENU = defineMenu([
  { label: 'RESUME', action: 'resume', shortcut: 'ESC' },
  { label: 'RESTART', action: 'restart', shortcut: 'R' },
  { label: 'QUIT', action: 'quit', shortcut: 'Q' },
]);

export const GAME_OVER_MENU = defineMenu([
  { label: 'RESTART', action: 'restart', shortcut: 'R' },
  { label: 'QUIT', action: 'quit', shortcut: 'Q' },
]);

// Shortcut labels whose key name differs from the label
const SHORTCUT_KEY_NAMES = new Map<string, string>([['ESC', 'escape']]);

function shortcutKey(shortcut: string): string {
  return SHORTCUT_KEY_NAMES.get(shortcut) ?? shortcut.toLowerCase();
}

/**
 * Apply one key press to a menu.
 *
 * @param key - KeyboardEvent.key as received (`'ArrowUp'`, `'Escape'`, `'r'`, ...)
 */
export function handleMenuKey(menu: Menu, selection: number, key: string): MenuKeyResult {
  const count = menu.length;
  const pressed = key.toLowerCase();

  switch (pressed) {
    case 'arrowup':
    case 'w':
      return { selection: (selection - 1 + count) % count, action: null };
    case 'arrowdown':
    case 's':
      return { selection: (selection + 1) % count, action: null };
    case 'enter':
    case ' ':
      return { selection, action: menu[selection]?.action ?? null };
  }

  const index = menu.findIndex(item => item.shortcut !== undefined && shortcutKey(item.shortcut) === pressed);
  if (index === -1) return { selection, action: null };
  return { selection: index, action: menu[index].action };
}

/**
 * One item per row from startY, each centred on centerX.
 * The highlighted item is bracketed and bright; the rest are dimmed.
 */
export function renderMenu(
  menu: Menu,
  selection: number,
  placement: { centerX: number; startY: number; showShortcuts?: boolean }
): string {
  const { centerX, startY, showShortcuts = true } = placement;
  const dimmed = `\x1b[2m${getCurrentThemeColor()}`;

  return menu
    .map((item, row) => {
      const label = showShortcuts && item.shortcut ? `${item.label} [${item.shortcut}]` : item.label;
      const selected = row === selection;
      const text = selected ? `► ${label} ◄` : `  ${label}  `;
      const col = centerX - Math.floor(text.length / 2);
      return `\x1b[${startY + row};${col}H${selected ? '\x1b[1;93m' : dimmed}${text}\x1b[0m`;
    })
    .join('');
}
