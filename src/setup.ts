/**
 * `grid-snake setup`: interactive round configuration
 *
 * Walks through theme and field settings with clack prompts, validates the
 * result the same way the game does, and hands back options to launch with.
 */

import * as p from '@clack/prompts';
import { type CliOptions, fitToTerminal } from './cliArgs';
import { resolveConfig, type SnakeConfig } from './games/snake/config';
import { GameError } from './games/snake/errors';
import { getThemeModes, getThemeName } from './themes';

function positiveNumber(value: string | undefined): string | undefined {
  const trimmed = (value ?? '').trim();
  if (trimmed === '') return undefined; // keep default
  const n = Number(trimmed);
  if (Number.isNaN(n) || n <= 0) return 'Enter a positive number, or leave blank for the default';
  return undefined;
}

function optionalInteger(value: string | undefined): string | undefined {
  const trimmed = (value ?? '').trim();
  if (trimmed === '') return undefined;
  if (!Number.isInteger(Number(trimmed))) return 'Enter a whole number, or leave blank';
  return undefined;
}

async function askNumber(message: string, current: number): Promise<number | null> {
  const answer = await p.text({
    message,
    placeholder: String(current),
    validate: positiveNumber,
  });
  if (p.isCancel(answer)) return null;
  const trimmed = answer.trim();
  return trimmed === '' ? current : Number(trimmed);
}

/**
 * Returns options to play with, or null if the player backed out.
 */
export async function setupCommand(base: CliOptions): Promise<CliOptions | null> {
  p.intro('grid-snake setup');

  const theme = await p.select({
    message: 'Color theme',
    initialValue: base.theme,
    options: getThemeModes().map(mode => ({ value: mode, label: getThemeName(mode), hint: mode })),
  });
  if (p.isCancel(theme)) {
    p.cancel('Setup cancelled.');
    return null;
  }

  const cols = process.stdout.columns || 80;
  const rows = process.stdout.rows || 24;
  const fitted = resolveConfig(fitToTerminal(base.overrides, cols, rows));

  const prompts: [keyof SnakeConfig, string][] = [
    ['playWidth', `Play-field width in px (fits terminal: ${fitted.playWidth})`],
    ['playHeight', `Play-field height in px (fits terminal: ${fitted.playHeight})`],
    ['speed', 'Snake speed in px/s'],
    ['spawnInterval', 'Seconds between fruit'],
  ];

  const overrides: Partial<SnakeConfig> = { ...base.overrides };
  for (const [field, message] of prompts) {
    const value = await askNumber(message, fitted[field]);
    if (value === null) {
      p.cancel('Setup cancelled.');
      return null;
    }
    overrides[field] = value;
  }

  const seedAnswer = await p.text({
    message: 'Seed for fruit placement (blank for random)',
    placeholder: base.seed === null ? '' : String(base.seed),
    validate: optionalInteger,
  });
  if (p.isCancel(seedAnswer)) {
    p.cancel('Setup cancelled.');
    return null;
  }
  const seed = seedAnswer.trim() === '' ? base.seed : Number(seedAnswer.trim());

  let config: Readonly<SnakeConfig>;
  try {
    config = resolveConfig(overrides);
  } catch (err) {
    if (err instanceof GameError) {
      p.cancel(err.message);
      return null;
    }
    throw err;
  }

  p.note(
    [
      `Field   ${config.playWidth}×${config.playHeight} px (${config.cellSize} px cells)`,
      `Speed   ${config.speed} px/s`,
      `Fruit   every ${config.spawnInterval}s`,
      `Seed    ${seed ?? 'random'}`,
    ].join('\n'),
    'Round settings'
  );

  const confirmed = await p.confirm({ message: 'Start the round?' });
  if (p.isCancel(confirmed) || !confirmed) {
    p.outro(`Run \`grid-snake --width ${config.playWidth} --height ${config.playHeight}\` to skip setup next time.`);
    return null;
  }

  p.outro('Starting round...');
  return { command: 'play', theme, seed, overrides };
}
