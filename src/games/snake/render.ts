/**
 * Terminal drawing for the snake round
 *
 * Pure string builders, extracted from the game loop for testability.
 * Each grid cell is drawn two columns wide so cells look square.
 */

import { getCurrentThemeColor, getSubtleBackgroundColor, getVerticalAnchor } from '../utils';
import type { Cell } from './grid';
import type { RoundSnapshot } from './roundController';

/** Terminal columns per grid cell */
export const CELL_WIDTH = 2;

/** Rows reserved above the border for title and score */
export const HEADER_ROWS = 3;
/** Rows reserved below the border for hints and status */
export const FOOTER_ROWS = 2;

export interface FieldLayout {
  /** Terminal column of the top-left border corner (1-based) */
  left: number;
  /** Terminal row of the top-left border corner (1-based) */
  top: number;
  gridCols: number;
  gridRows: number;
}

export function fieldWidthChars(gridCols: number): number {
  return gridCols * CELL_WIDTH + 2;
}

export function fieldHeightRows(gridRows: number): number {
  return gridRows + 2;
}

/**
 * Centre the field in the terminal. Returns null when it does not fit.
 */
export function computeLayout(
  termCols: number,
  termRows: number,
  gridCols: number,
  gridRows: number
): FieldLayout | null {
  const width = fieldWidthChars(gridCols);
  const height = fieldHeightRows(gridRows);
  if (termCols < width || termRows < height + HEADER_ROWS + FOOTER_ROWS) return null;

  const left = Math.floor((termCols - width) / 2) + 1;
  const top = getVerticalAnchor(termRows, height, {
    headerRows: HEADER_ROWS,
    footerRows: FOOTER_ROWS,
    minTop: HEADER_ROWS + 1,
  });
  return { left, top, gridCols, gridRows };
}

/**
 * Largest grid that fits the terminal, capped at maxCols x maxRows
 */
export function fitGrid(
  termCols: number,
  termRows: number,
  maxCols: number,
  maxRows: number
): { gridCols: number; gridRows: number } {
  const gridCols = Math.min(maxCols, Math.floor((termCols - 2) / CELL_WIDTH));
  const gridRows = Math.min(maxRows, termRows - 2 - HEADER_ROWS - FOOTER_ROWS);
  return { gridCols: Math.max(0, gridCols), gridRows: Math.max(0, gridRows) };
}

/**
 * Cursor-move escape for a grid cell, or null when the cell is off the field
 */
export function cellCursor(layout: FieldLayout, c: Cell): string | null {
  if (c.col < 0 || c.row < 0 || c.col >= layout.gridCols || c.row >= layout.gridRows) return null;
  const row = layout.top + 1 + c.row;
  const col = layout.left + 1 + c.col * CELL_WIDTH;
  return `\x1b[${row};${col}H`;
}

export function renderBorder(layout: FieldLayout, color: string): string {
  const inner = layout.gridCols * CELL_WIDTH;
  const right = layout.left + inner + 1;
  let output = `\x1b[${layout.top};${layout.left}H${color}╔${'═'.repeat(inner)}╗\x1b[0m`;
  for (let y = 1; y <= layout.gridRows; y++) {
    output += `\x1b[${layout.top + y};${layout.left}H${color}║\x1b[0m`;
    output += `\x1b[${layout.top + y};${right}H${color}║\x1b[0m`;
  }
  output += `\x1b[${layout.top + layout.gridRows + 1};${layout.left}H${color}╚${'═'.repeat(inner)}╝\x1b[0m`;
  return output;
}

/**
 * Faint dots on every other cell so motion is readable on large fields
 */
export function renderGridDots(layout: FieldLayout): string {
  const subtle = getSubtleBackgroundColor();
  let output = '';
  for (let row = 0; row < layout.gridRows; row += 2) {
    for (let col = 0; col < layout.gridCols; col += 2) {
      output += `${cellCursor(layout, { col, row }) ?? ''}${subtle}·\x1b[0m`;
    }
  }
  return output;
}

export const HEAD_GLYPH = '██';
export const BODY_GLYPH = '▓▓';
export const FRUIT_GLYPH = '◆◆';
export const FRUIT_COLOR = '\x1b[1;91m';

/**
 * Fruit first, then the snake tail-to-head so the head wins any overlap
 */
export function renderEntities(snapshot: RoundSnapshot, layout: FieldLayout, flash = false): string {
  const themeColor = getCurrentThemeColor();
  const snakeColor = flash ? '\x1b[1;33m' : themeColor;
  let output = '';

  for (const fruit of snapshot.fruits) {
    const cursor = cellCursor(layout, fruit.cell);
    if (cursor) output += `${cursor}${FRUIT_COLOR}${FRUIT_GLYPH}\x1b[0m`;
  }

  for (let i = snapshot.segments.length - 1; i >= 0; i--) {
    const cursor = cellCursor(layout, snapshot.segments[i]);
    if (!cursor) continue;
    if (i === 0) {
      output += `${cursor}\x1b[1m${snakeColor}${HEAD_GLYPH}\x1b[0m`;
    } else {
      const dim = i < 3 ? '' : '\x1b[2m';
      output += `${cursor}${dim}${snakeColor}${BODY_GLYPH}\x1b[0m`;
    }
  }
  return output;
}

/**
 * Score line: length and fruit eaten, left-aligned over the field
 */
export function renderScore(snapshot: RoundSnapshot, layout: FieldLayout, highlight = false): string {
  const color = highlight ? '\x1b[1;33m' : getCurrentThemeColor();
  const text = `LENGTH: ${snapshot.length.toString().padStart(3, '0')}  FRUIT: ${snapshot.fruitsEaten.toString().padStart(3, '0')}`;
  return `\x1b[${layout.top - 1};${layout.left}H${color}${text}\x1b[0m`;
}

/**
 * Text centred horizontally over the field on the given terminal row
 */
export function centeredText(layout: FieldLayout, row: number, text: string, style: string): string {
  const width = fieldWidthChars(layout.gridCols);
  const col = layout.left + Math.max(0, Math.floor((width - text.length) / 2));
  return `\x1b[${row};${col}H${style}${text}\x1b[0m`;
}
