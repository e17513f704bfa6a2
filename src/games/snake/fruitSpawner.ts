/**
 * Timed fruit placement
 *
 * One spawn attempt per interval. Placement is rejection sampling over the
 * grid: draw a random cell, retry while it lands on the snake, give up after
 * spawnRetryLimit draws.
 */

import { type SnakeConfig, gridColumns, gridRows, resolveConfig } from './config';
import { type Cell, cell, cellToPixel, cellsEqual } from './grid';
import { type RandomSource, randomIndex } from './random';

export interface Fruit {
  readonly cell: Cell;
  /** Pixel coordinates of the top-left corner */
  readonly x: number;
  readonly y: number;
  /** Side length in pixels */
  readonly size: number;
}

export interface SpawnSkippedInfo {
  attempts: number;
  snakeLength: number;
}

export interface FruitSpawnerOptions {
  random?: RandomSource;
  /** Called when a spawn cycle is skipped because no free cell was found */
  onSpawnSkipped?: (info: SpawnSkippedInfo) => void;
}

function warnSpawnSkipped(info: SpawnSkippedInfo): void {
  console.warn(`[FruitSpawner] No free cell after ${info.attempts} attempts (snake length ${info.snakeLength}), skipping spawn`);
}

export class FruitSpawner {
  readonly config: Readonly<SnakeConfig>;

  private live: Fruit[] = [];
  private timer: number;
  private readonly random: RandomSource;
  private readonly onSpawnSkipped: (info: SpawnSkippedInfo) => void;

  constructor(config: Readonly<SnakeConfig> = resolveConfig(), options: FruitSpawnerOptions = {}) {
    this.config = config;
    this.timer = config.spawnInterval;
    this.random = options.random ?? Math.random;
    this.onSpawnSkipped = options.onSpawnSkipped ?? warnSpawnSkipped;
  }

  get fruits(): readonly Fruit[] {
    return Object.freeze([...this.live]);
  }

  /** Seconds until the next spawn attempt */
  get countdown(): number {
    return this.timer;
  }

  get interval(): number {
    return this.config.spawnInterval;
  }

  /**
   * Count down and run a spawn cycle when the timer runs out.
   * Returns the fruit placed this call, if any.
   */
  update(elapsedSeconds: number, snakeCells: readonly Cell[]): Fruit | null {
    if (!(elapsedSeconds > 0) || !Number.isFinite(elapsedSeconds)) return null;

    this.timer -= elapsedSeconds;
    if (this.timer > 0) return null;

    const fruit = this.spawn(snakeCells);
    this.timer = this.config.spawnInterval;
    return fruit;
  }

  /**
   * One spawn cycle. Only the snake is avoided; fruits may stack.
   */
  spawn(snakeCells: readonly Cell[]): Fruit | null {
    const { cellSize, spawnRetryLimit } = this.config;
    const cols = gridColumns(this.config);
    const rows = gridRows(this.config);

    for (let attempt = 0; attempt < spawnRetryLimit; attempt++) {
      const candidate = cell(randomIndex(this.random, cols), randomIndex(this.random, rows));
      if (snakeCells.some(s => cellsEqual(s, candidate))) continue;

      const { x, y } = cellToPixel(candidate, cellSize);
      const fruit: Fruit = Object.freeze({ cell: candidate, x, y, size: cellSize });
      this.live.push(fruit);
      return fruit;
    }

    this.onSpawnSkipped({ attempts: spawnRetryLimit, snakeLength: snakeCells.length });
    return null;
  }

  /**
   * Remove a fruit by identity, falling back to an equal cell and size.
   */
  remove(fruit: Fruit): boolean {
    let index = this.live.indexOf(fruit);
    if (index === -1) {
      index = this.live.findIndex(f => f.size === fruit.size && cellsEqual(f.cell, fruit.cell));
    }
    if (index === -1) return false;
    this.live.splice(index, 1);
    return true;
  }

  /** Drop every fruit; the countdown keeps running */
  clear(): void {
    this.live = [];
  }

  reset(): void {
    this.live = [];
    this.timer = this.config.spawnInterval;
  }
}
