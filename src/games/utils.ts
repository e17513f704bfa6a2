/**
 * Shared utilities for games
 *
 * Terminal contract, theme selection, alternate-buffer bookkeeping and
 * layout helpers. The theme is configured by the host via setTheme().
 */

import type { IDisposable } from '@xterm/xterm';
import {
  type PhosphorMode,
  getAnsiColor,
  getSubtleColor,
} from '../themes';

// ============================================================================
// Terminal Contract
// ============================================================================

export interface TerminalKeyEvent {
  key: string;
  domEvent: {
    key: string;
    preventDefault: () => void;
    stopPropagation: () => void;
  };
}

/**
 * The slice of a terminal the games use. An xterm.js Terminal satisfies it,
 * as does the stdin/stdout adapter in cli.ts.
 */
export interface GameTerminal {
  readonly cols: number;
  readonly rows: number;
  write(data: string): void;
  onKey(listener: (event: TerminalKeyEvent) => void): IDisposable;
  onResize(listener: (size: { cols: number; rows: number }) => void): IDisposable;
}

// ============================================================================
// Theme Configuration
// ============================================================================

/**
 * Current theme mode - configured by the consuming application
 */
let currentTheme: PhosphorMode = 'cyan';

/**
 * Set the current theme mode
 */
export function setTheme(mode: PhosphorMode): void {
  currentTheme = mode;
}

export function getTheme(): PhosphorMode {
  return currentTheme;
}

/**
 * Get current theme color code
 */
export function getCurrentThemeColor(): string {
  return getAnsiColor(currentTheme);
}

/**
 * Muted color for background detail such as the empty grid
 */
export function getSubtleBackgroundColor(): string {
  return getSubtleColor(currentTheme);
}

// ============================================================================
// Alternate Buffer Management
// ============================================================================

/**
 * Terminals currently in the alternate buffer, with who put them there.
 */
const alternateBufferOwners = new WeakMap<GameTerminal, string>();

/**
 * Enter alternate screen buffer with state tracking.
 * Safe to call twice: the second call logs a warning and does nothing.
 *
 * @param reason - Description of why we're entering (for debugging)
 * @returns true if the buffer was entered
 */
export function enterAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  const owner = alternateBufferOwners.get(terminal);
  if (owner !== undefined) {
    console.warn(`[AlternateBuffer] Already in buffer (entered by: ${owner}), requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049h'); // Enter alternate screen buffer
  terminal.write('\x1b[?25l');   // Hide cursor
  terminal.write('\x1b[2J\x1b[H'); // Clear screen

  alternateBufferOwners.set(terminal, reason);
  return true;
}

/**
 * Exit alternate screen buffer with state tracking.
 *
 * @returns true if the buffer was exited, false if it was not entered
 */
export function exitAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  if (!alternateBufferOwners.has(terminal)) {
    console.warn(`[AlternateBuffer] Not in alternate buffer, exit requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049l'); // Exit alternate screen buffer
  terminal.write('\x1b[?25h');   // Show cursor

  alternateBufferOwners.delete(terminal);
  return true;
}

export function isInAlternateBuffer(terminal: GameTerminal): boolean {
  return alternateBufferOwners.has(terminal);
}

// ============================================================================
// Layout Utilities
// ============================================================================

interface VerticalAnchorOptions {
  headerRows?: number;
  footerRows?: number;
  minTop?: number;
}

/**
 * Compute a vertically-centered top row for content while reserving header/footer space.
 */
export function getVerticalAnchor(
  terminalRows: number,
  contentRows: number,
  options: VerticalAnchorOptions = {}
): number {
  const headerRows = options.headerRows ?? 0;
  const footerRows = options.footerRows ?? 0;
  const minTop = Math.max(1, options.minTop ?? 1);

  const availableRows = terminalRows - headerRows - footerRows;
  const centeredTop = headerRows + Math.floor((availableRows - contentRows) / 2) + 1;

  return Math.max(minTop, centeredTop);
}

// Re-export PhosphorMode type for convenience
export type { PhosphorMode } from '../themes';
