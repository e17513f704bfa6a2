/**
 * Snake body and its movement model
 *
 * Time is accumulated as distance in pixels and converted into whole-cell
 * steps, so the body always rests on the grid no matter how frames are timed.
 */

import { type SnakeConfig, resolveConfig } from './config';
import { GameError } from './errors';
import {
  type Cell,
  type Direction,
  type Point,
  cell,
  cellRect,
  cellToPixel,
  isOpposite,
  rectInsideField,
  rectsOverlap,
  stepCell,
} from './grid';

export type DirectionChange = 'ignored' | 'boosted' | 'turned';

const INITIAL_DIRECTION: Direction = 'down';

export class SnakeBody {
  readonly config: Readonly<SnakeConfig>;

  private body: Cell[] = [];
  private currentDirection: Direction = INITIAL_DIRECTION;
  private currentSpeed: number;
  private accumulator = 0;
  private growth = 0;

  constructor(config: Readonly<SnakeConfig> = resolveConfig()) {
    this.config = config;
    this.currentSpeed = config.speed;
    this.reset();
  }

  /**
   * Initial layout: head centred horizontally on row `initialLength`,
   * the rest of the body stacked above it.
   */
  static initialSegments(config: Readonly<SnakeConfig>): Cell[] {
    const headCol = Math.floor(config.playWidth / 2 / config.cellSize);
    const headRow = config.initialLength;
    const segments: Cell[] = [];
    for (let i = 0; i < config.initialLength; i++) {
      segments.push(cell(headCol, headRow - i));
    }
    return segments;
  }

  get segments(): readonly Cell[] {
    return Object.freeze([...this.body]);
  }

  get head(): Cell {
    const head = this.body[0];
    if (!head) {
      throw new GameError('INVARIANT_VIOLATION', 'snake has no segments');
    }
    return head;
  }

  /** Head position in pixels */
  get headPosition(): Point {
    return cellToPixel(this.head, this.config.cellSize);
  }

  get length(): number {
    return this.body.length;
  }

  get direction(): Direction {
    return this.currentDirection;
  }

  get speed(): number {
    return this.currentSpeed;
  }

  get moveAccumulator(): number {
    return this.accumulator;
  }

  get pendingGrowth(): number {
    return this.growth;
  }

  /**
   * Advance by elapsed time. Returns the number of whole cells moved;
   * a long frame can move several cells at once.
   */
  update(elapsedSeconds: number): number {
    if (!(elapsedSeconds > 0) || !Number.isFinite(elapsedSeconds)) return 0;

    const { cellSize } = this.config;
    const distance = this.accumulator + this.currentSpeed * elapsedSeconds;
    // Past this point subtracting a cell no longer changes the value
    if (!Number.isFinite(distance) || distance - cellSize === distance) {
      throw new GameError(
        'INVARIANT_VIOLATION',
        `movement overflow: ${this.currentSpeed} px/s over ${elapsedSeconds}s`,
        { speed: this.currentSpeed, elapsedSeconds }
      );
    }
    this.accumulator = distance;

    let steps = 0;
    while (this.accumulator >= cellSize) {
      this.body.unshift(stepCell(this.head, this.currentDirection));
      if (this.growth > 0) {
        this.growth--;
      } else {
        this.body.pop();
      }
      this.accumulator -= cellSize;
      steps++;
    }
    return steps;
  }

  /**
   * Reversals are dropped. Repeating the current direction is a boost:
   * one immediate step that ignores the accumulator and pending growth.
   */
  changeDirection(direction: Direction): DirectionChange {
    if (isOpposite(this.currentDirection, direction)) return 'ignored';

    if (direction === this.currentDirection) {
      this.body.unshift(stepCell(this.head, direction));
      this.body.pop();
      return 'boosted';
    }

    this.currentDirection = direction;
    return 'turned';
  }

  grow(count: number = 1): void {
    if (!Number.isInteger(count) || count < 0) {
      throw new GameError('INVARIANT_VIOLATION', `grow count must be a non-negative integer (got ${count})`);
    }
    this.growth += count;
  }

  checkBoundaryCollision(): boolean {
    const { cellSize, playWidth, playHeight } = this.config;
    return !rectInsideField(cellRect(this.head, cellSize), playWidth, playHeight);
  }

  checkSelfCollision(): boolean {
    const { cellSize } = this.config;
    const headBox = cellRect(this.head, cellSize);
    for (let i = 1; i < this.body.length; i++) {
      if (rectsOverlap(headBox, cellRect(this.body[i], cellSize))) return true;
    }
    return false;
  }

  reset(): void {
    this.body = SnakeBody.initialSegments(this.config);
    this.currentDirection = INITIAL_DIRECTION;
    this.currentSpeed = this.config.speed;
    this.accumulator = 0;
    this.growth = 0;
  }
}
