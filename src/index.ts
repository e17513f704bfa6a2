/**
 * grid-snake
 *
 * Grid snake for xterm.js and the terminal. The round simulation
 * (RoundController, SnakeBody, FruitSpawner) has no terminal dependency
 * and can be driven by any render loop.
 *
 * Library usage (xterm.js):
 *   import { runSnakeGame, setTheme } from 'grid-snake';
 *   setTheme('amber');
 *   const controller = runSnakeGame(terminal, { speed: 60 });
 *
 * Simulation only:
 *   const round = new RoundController({ random: createRng(42) });
 *   round.start();
 *   const { outcome } = round.advance(1 / 60);
 *
 * CLI usage:
 *   npx grid-snake
 */

export {
  // Theme utilities
  setTheme,
  getTheme,
  getCurrentThemeColor,
  getSubtleBackgroundColor,
  getVerticalAnchor,
  type PhosphorMode,

  // Terminal contract and buffer management
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
  type GameTerminal,
  type TerminalKeyEvent,

  // Menu system
  handleMenuKey,
  renderMenu,
  PAUSE_MENU,
  GAME_OVER_MENU,
  type Menu,
  type MenuAction,
  type MenuItem,
  type MenuKeyResult,

  // Frame timing
  createFrameClock,
  type FrameClock,

  // Terminal game
  runSnakeGame,
  type SnakeController,
  type RunSnakeGameOptions,

  // Round simulation
  RoundController,
  SnakeBody,
  FruitSpawner,
  type RoundControllerOptions,
  type RoundSnapshot,
  type RoundState,
  type TickOutcome,
  type TickResult,
  type CollisionKind,
  type DirectionChange,
  type Fruit,
  type FruitSpawnerOptions,
  type SpawnSkippedInfo,

  // Configuration and errors
  DEFAULT_SNAKE_CONFIG,
  resolveConfig,
  gridColumns,
  gridRows,
  GameError,
  type SnakeConfig,
  type GameErrorCode,

  // Randomness
  createRng,
  type RandomSource,

  // Grid geometry
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
  type Cell,
  type Direction,
  type Point,
  type Rect,
} from './games';

export { getThemeModes, isValidThemeMode, getThemeName } from './themes';
