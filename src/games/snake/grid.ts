/**
 * Grid geometry for the snake simulation
 *
 * Everything that lives on the play field is addressed by an integer Cell.
 * Pixel coordinates only appear at the edges (config, snapshots for renderers).
 */

export interface Cell {
  readonly col: number;
  readonly row: number;
}

export interface Point {
  readonly x: number;
  readonly y: number;
}

/** Axis-aligned box in pixels, top-left origin */
export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

export type Direction = 'up' | 'down' | 'left' | 'right';

export const DIRECTION_VECTORS: Readonly<Record<Direction, { readonly dx: number; readonly dy: number }>> = {
  up: { dx: 0, dy: -1 },
  down: { dx: 0, dy: 1 },
  left: { dx: -1, dy: 0 },
  right: { dx: 1, dy: 0 },
};

const OPPOSITES: Readonly<Record<Direction, Direction>> = {
  up: 'down',
  down: 'up',
  left: 'right',
  right: 'left',
};

export function isOpposite(a: Direction, b: Direction): boolean {
  return OPPOSITES[a] === b;
}

export function cell(col: number, row: number): Cell {
  return Object.freeze({ col, row });
}

export function cellsEqual(a: Cell, b: Cell): boolean {
  return a.col === b.col && a.row === b.row;
}

/**
 * Neighbouring cell one step in the given direction
 */
export function stepCell(from: Cell, direction: Direction): Cell {
  const { dx, dy } = DIRECTION_VECTORS[direction];
  return cell(from.col + dx, from.row + dy);
}

export function cellToPixel(c: Cell, cellSize: number): Point {
  return { x: c.col * cellSize, y: c.row * cellSize };
}

/**
 * Snap a pixel coordinate to the nearest grid line and return its cell.
 * Halfway values round up, matching Math.round.
 */
export function pixelToCell(p: Point, cellSize: number): Cell {
  return cell(Math.round(p.x / cellSize), Math.round(p.y / cellSize));
}

export function cellRect(c: Cell, cellSize: number, size: number = cellSize): Rect {
  return { x: c.col * cellSize, y: c.row * cellSize, width: size, height: size };
}

/**
 * Strict overlap test; boxes that only share an edge do not overlap.
 */
export function rectsOverlap(a: Rect, b: Rect): boolean {
  return a.x < b.x + b.width &&
    b.x < a.x + a.width &&
    a.y < b.y + b.height &&
    b.y < a.y + a.height;
}

/**
 * Whether the box lies entirely inside [0, width) x [0, height)
 */
export function rectInsideField(r: Rect, width: number, height: number): boolean {
  return r.x >= 0 && r.y >= 0 && r.x + r.width <= width && r.y + r.height <= height;
}
