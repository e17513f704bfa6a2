/**
 * grid-snake game modules
 *
 * Usage:
 * 1. Set the theme: setTheme('cyan')
 * 2. Run the game: runSnakeGame(terminal)
 * 3. Or drive a RoundController yourself from any render loop
 */

// Re-export utilities
export {
  setTheme,
  getTheme,
  getCurrentThemeColor,
  getSubtleBackgroundColor,
  getVerticalAnchor,
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
} from './utils';

export type { PhosphorMode, GameTerminal, TerminalKeyEvent } from './utils';

// Re-export menu utilities
export {
  handleMenuKey,
  renderMenu,
  PAUSE_MENU,
  GAME_OVER_MENU,
} from './shared/menu';

export type { Menu, MenuAction, MenuItem, MenuKeyResult } from './shared/menu';

export { createFrameClock } from './shared/frameClock';
export type { FrameClock } from './shared/frameClock';

// Snake core
export { runSnakeGame } from './snake';
export type { SnakeController, RunSnakeGameOptions } from './snake';
export { RoundController } from './snake/roundController';
export type {
  RoundControllerOptions,
  RoundSnapshot,
  RoundState,
  TickOutcome,
  TickResult,
  CollisionKind,
} from './snake/roundController';
export { SnakeBody } from './snake/snakeBody';
export type { DirectionChange } from './snake/snakeBody';
export { FruitSpawner } from './snake/fruitSpawner';
export type { Fruit, FruitSpawnerOptions, SpawnSkippedInfo } from './snake/fruitSpawner';
export { DEFAULT_SNAKE_CONFIG, resolveConfig, gridColumns, gridRows } from './snake/config';
export type { SnakeConfig } from './snake/config';
export { GameError } from './snake/errors';
export type { GameErrorCode } from './snake/errors';
export { createRng } from './snake/random';
export type { RandomSource } from './snake/random';
export {
  DIRECTION_VECTORS,
  isOpposite,
  cell,
  cellsEqual,
  stepCell,
  cellToPixel,
  pixelToCell,
  cellRect,
  rectsOverlap,
  rectInsideField,
} from './snake/grid';
export type { Cell, Direction, Point, Rect } from './snake/grid';
