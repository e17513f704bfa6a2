/**
 * Snake round configuration
 *
 * Every constant the simulation depends on, with defaults. Overrides are
 * validated up front; nothing is clamped.
 */

import { GameError } from './errors';

export interface SnakeConfig {
  /** Play-field width in pixels, a multiple of cellSize */
  playWidth: number;
  /** Play-field height in pixels, a multiple of cellSize */
  playHeight: number;
  /** Side length of one grid cell in pixels */
  cellSize: number;
  /** Segments at round start */
  initialLength: number;
  /** Pixels per second */
  speed: number;
  /** Seconds between fruit spawn attempts */
  spawnInterval: number;
  /** Placement draws per spawn attempt before the cycle is skipped */
  spawnRetryLimit: number;
}

export const DEFAULT_SNAKE_CONFIG: Readonly<SnakeConfig> = Object.freeze({
  playWidth: 800,
  playHeight: 800,
  cellSize: 20,
  initialLength: 3,
  speed: 20,
  spawnInterval: 5.0,
  spawnRetryLimit: 100,
});

function invalid(field: keyof SnakeConfig, value: number, reason: string): GameError {
  return new GameError('INVALID_CONFIG', `${field} ${reason} (got ${value})`, { field, value });
}

function requirePositiveInteger(config: SnakeConfig, field: keyof SnakeConfig): void {
  const value = config[field];
  if (!Number.isInteger(value) || value <= 0) {
    throw invalid(field, value, 'must be a positive integer');
  }
}

function requirePositiveFinite(config: SnakeConfig, field: keyof SnakeConfig): void {
  const value = config[field];
  if (!Number.isFinite(value) || value <= 0) {
    throw invalid(field, value, 'must be a positive number');
  }
}

/**
 * Merge overrides onto the defaults and validate the result.
 *
 * @throws GameError with code INVALID_CONFIG naming the offending field
 */
export function resolveConfig(overrides: Partial<SnakeConfig> = {}): Readonly<SnakeConfig> {
  const config: SnakeConfig = { ...DEFAULT_SNAKE_CONFIG };
  for (const key of Object.keys(overrides) as (keyof SnakeConfig)[]) {
    const value = overrides[key];
    if (value !== undefined) config[key] = value;
  }

  requirePositiveInteger(config, 'cellSize');
  requirePositiveInteger(config, 'playWidth');
  requirePositiveInteger(config, 'playHeight');
  requirePositiveInteger(config, 'initialLength');
  requirePositiveInteger(config, 'spawnRetryLimit');
  requirePositiveFinite(config, 'speed');
  requirePositiveFinite(config, 'spawnInterval');

  if (config.playWidth % config.cellSize !== 0) {
    throw invalid('playWidth', config.playWidth, `must be a multiple of cellSize ${config.cellSize}`);
  }
  if (config.playHeight % config.cellSize !== 0) {
    throw invalid('playHeight', config.playHeight, `must be a multiple of cellSize ${config.cellSize}`);
  }

  // Head starts on row initialLength, so the field needs initialLength + 1 rows
  const rows = config.playHeight / config.cellSize;
  if (rows < config.initialLength + 1) {
    throw invalid('initialLength', config.initialLength, `does not fit in ${rows} rows`);
  }

  return Object.freeze(config);
}

export function gridColumns(config: Readonly<SnakeConfig>): number {
  return config.playWidth / config.cellSize;
}

export function gridRows(config: Readonly<SnakeConfig>): number {
  return config.playHeight / config.cellSize;
}
