/**
 * Command-line argument parsing for the grid-snake CLI
 * Kept apart from cli.ts so it can be tested without a TTY
 */

import { type SnakeConfig, DEFAULT_SNAKE_CONFIG } from './games/snake/config';
import { fitGrid } from './games/snake/render';
import { GameError } from './games/snake/errors';
import { type PhosphorMode, getThemeModes, isValidThemeMode } from './themes';

export type CliCommand = 'play' | 'setup' | 'help' | 'list-themes';

export interface CliOptions {
  command: CliCommand;
  theme: PhosphorMode;
  seed: number | null;
  overrides: Partial<SnakeConfig>;
}

const NUMBER_FLAGS = new Map<string, keyof SnakeConfig>([
  ['--width', 'playWidth'],
  ['--height', 'playHeight'],
  ['--cell', 'cellSize'],
  ['--length', 'initialLength'],
  ['--speed', 'speed'],
  ['--interval', 'spawnInterval'],
  ['--retries', 'spawnRetryLimit'],
]);

function parseNumber(flag: string, raw: string | undefined): number {
  if (raw === undefined || raw.startsWith('--')) {
    throw new GameError('INVALID_CONFIG', `${flag} needs a value`, { flag });
  }
  const value = Number(raw);
  if (raw.trim() === '' || Number.isNaN(value)) {
    throw new GameError('INVALID_CONFIG', `${flag} expects a number (got "${raw}")`, { flag, value: raw });
  }
  return value;
}

/**
 * @throws GameError with code INVALID_CONFIG on unknown flags or bad values
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { command: 'play', theme: 'cyan', seed: null, overrides: {} };
  const args = [...argv];

  if (args[0] === 'setup') {
    options.command = 'setup';
    args.shift();
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const field = NUMBER_FLAGS.get(arg);
    if (field) {
      options.overrides[field] = parseNumber(arg, args[i + 1]);
      i++;
      continue;
    }

    switch (arg) {
      case '--help':
      case '-h':
        options.command = 'help';
        break;
      case '--list-themes':
        options.command = 'list-themes';
        break;
      case '--seed':
        options.seed = parseNumber(arg, args[i + 1]);
        i++;
        break;
      case '--theme': {
        const theme = args[i + 1];
        if (theme === undefined || !isValidThemeMode(theme)) {
          throw new GameError('INVALID_CONFIG', `Unknown theme: ${theme ?? '(none)'}. Available: ${getThemeModes().join(', ')}`, { flag: arg });
        }
        options.theme = theme;
        i++;
        break;
      }
      default:
        throw new GameError('INVALID_CONFIG', `Unknown argument: ${arg}`, { flag: arg });
    }
  }

  return options;
}

/**
 * Fill in a play field that fits the terminal unless one was given.
 * The default field is the upper bound.
 */
export function fitToTerminal(
  overrides: Partial<SnakeConfig>,
  termCols: number,
  termRows: number
): Partial<SnakeConfig> {
  if (overrides.playWidth !== undefined && overrides.playHeight !== undefined) return overrides;

  const cellSize = overrides.cellSize ?? DEFAULT_SNAKE_CONFIG.cellSize;
  const maxCols = DEFAULT_SNAKE_CONFIG.playWidth / DEFAULT_SNAKE_CONFIG.cellSize;
  const maxRows = DEFAULT_SNAKE_CONFIG.playHeight / DEFAULT_SNAKE_CONFIG.cellSize;
  const { gridCols, gridRows } = fitGrid(termCols, termRows, maxCols, maxRows);

  return {
    ...overrides,
    playWidth: overrides.playWidth ?? gridCols * cellSize,
    playHeight: overrides.playHeight ?? gridRows * cellSize,
  };
}

export function formatHelp(): string {
  const d = DEFAULT_SNAKE_CONFIG;
  return `
  grid-snake: Snake on a grid, in your terminal

  Usage:
    grid-snake                   Play with a field sized to the terminal
    grid-snake setup             Choose settings interactively, then play
    grid-snake --theme <theme>   Set color theme
    grid-snake --list-themes     List color themes
    grid-snake --help            Show this help

  Options:
    --width <px>       Play-field width, multiple of the cell size (fitted to the terminal, at most ${d.playWidth}, when omitted)
    --height <px>      Play-field height, multiple of the cell size (fitted to the terminal, at most ${d.playHeight}, when omitted)
    --cell <px>        Cell size (default ${d.cellSize})
    --length <n>       Initial snake length (default ${d.initialLength})
    --speed <px/s>     Snake speed (default ${d.speed})
    --interval <s>     Seconds between fruit spawns (default ${d.spawnInterval})
    --retries <n>      Placement attempts per spawn (default ${d.spawnRetryLimit})
    --seed <n>         Seed fruit placement for a repeatable round

  Controls:
    Arrow keys / WASD    Turn; press the current direction again to boost
    ESC                  Pause menu
    R                    Restart after game over
    Q                    Quit
`;
}
