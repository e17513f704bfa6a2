/**
 * Round state machine
 *
 * Owns one SnakeBody and one FruitSpawner and is the only place where the
 * two are cross-checked. Callers drive it with measured frame times.
 */

import { type SnakeConfig, resolveConfig } from './config';
import { type Fruit, type FruitSpawnerOptions, FruitSpawner } from './fruitSpawner';
import { type Cell, type Direction, cellRect, rectsOverlap } from './grid';
import { type DirectionChange, SnakeBody } from './snakeBody';

export type RoundState = 'idle' | 'running' | 'gameOver';

export type TickOutcome = 'ongoing' | 'fruit-eaten' | 'game-over';

export type CollisionKind = 'wall' | 'self';

export interface TickResult {
  state: RoundState;
  outcome: TickOutcome;
  /** Fruit eaten during this tick */
  consumed: readonly Fruit[];
  /** Fruit placed during this tick */
  spawned: Fruit | null;
  /** What ended the round, on the tick that ended it */
  collision: CollisionKind | null;
}

export interface RoundSnapshot {
  state: RoundState;
  segments: readonly Cell[];
  head: Cell;
  length: number;
  direction: Direction;
  fruits: readonly Fruit[];
  fruitsEaten: number;
  playWidth: number;
  playHeight: number;
  cellSize: number;
}

export type RoundControllerOptions = Partial<SnakeConfig> & FruitSpawnerOptions;

export class RoundController {
  readonly config: Readonly<SnakeConfig>;
  private readonly snake: SnakeBody;
  private readonly spawner: FruitSpawner;

  private roundState: RoundState = 'idle';
  private eaten = 0;

  constructor(options: RoundControllerOptions = {}) {
    const { random, onSpawnSkipped, ...overrides } = options;
    this.config = resolveConfig(overrides);
    this.snake = new SnakeBody(this.config);
    this.spawner = new FruitSpawner(this.config, { random, onSpawnSkipped });
  }

  get state(): RoundState {
    return this.roundState;
  }

  get isGameOver(): boolean {
    return this.roundState === 'gameOver';
  }

  get fruitsEaten(): number {
    return this.eaten;
  }

  start(): void {
    if (this.roundState === 'idle') this.roundState = 'running';
  }

  /**
   * Forwarded to the snake only while the round is running.
   */
  changeDirection(direction: Direction): DirectionChange {
    if (this.roundState !== 'running') return 'ignored';
    return this.snake.changeDirection(direction);
  }

  /**
   * One simulation tick. Collision order is wall, self, fruit; a wall or
   * self hit ends the round before any fruit is eaten.
   */
  advance(elapsedSeconds: number, direction?: Direction): TickResult {
    if (this.roundState !== 'running') {
      return this.result(this.isGameOver ? 'game-over' : 'ongoing', [], null, null);
    }

    if (direction) this.snake.changeDirection(direction);

    this.snake.update(elapsedSeconds);
    const spawned = this.spawner.update(elapsedSeconds, this.snake.segments);

    if (this.snake.checkBoundaryCollision()) {
      this.roundState = 'gameOver';
      return this.result('game-over', [], spawned, 'wall');
    }
    if (this.snake.checkSelfCollision()) {
      this.roundState = 'gameOver';
      return this.result('game-over', [], spawned, 'self');
    }

    const { cellSize } = this.config;
    const headBox = cellRect(this.snake.head, cellSize);
    const consumed = this.spawner.fruits.filter(f =>
      rectsOverlap(headBox, { x: f.x, y: f.y, width: f.size, height: f.size })
    );
    for (const fruit of consumed) {
      this.spawner.remove(fruit);
      this.snake.grow();
    }
    this.eaten += consumed.length;

    return this.result(consumed.length > 0 ? 'fruit-eaten' : 'ongoing', consumed, spawned, null);
  }

  /**
   * Restore the initial snake and an empty field. A finished or running
   * round restarts immediately; an idle round stays idle until start().
   */
  reset(): void {
    this.snake.reset();
    this.spawner.reset();
    this.eaten = 0;
    if (this.roundState !== 'idle') this.roundState = 'running';
  }

  snapshot(): RoundSnapshot {
    return Object.freeze({
      state: this.roundState,
      segments: this.snake.segments,
      head: this.snake.head,
      length: this.snake.length,
      direction: this.snake.direction,
      fruits: this.spawner.fruits,
      fruitsEaten: this.eaten,
      playWidth: this.config.playWidth,
      playHeight: this.config.playHeight,
      cellSize: this.config.cellSize,
    });
  }

  private result(
    outcome: TickOutcome,
    consumed: readonly Fruit[],
    spawned: Fruit | null,
    collision: CollisionKind | null
  ): TickResult {
    return { state: this.roundState, outcome, consumed: Object.freeze([...consumed]), spawned, collision };
  }
}
