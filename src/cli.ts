/**
 * CLI entry point for grid-snake
 *
 * Provides a Node.js terminal adapter that maps stdin/stdout onto the
 * GameTerminal contract, so the game runs directly in any terminal emulator.
 */

import { runSnakeGame, setTheme, GameError, createRng, type GameTerminal, type TerminalKeyEvent } from './games';
import { type CliOptions, fitToTerminal, formatHelp, parseCliArgs } from './cliArgs';
import { getThemeModes, getThemeName } from './themes';

// ---------------------------------------------------------------------------
// Node Terminal Adapter
// ---------------------------------------------------------------------------

interface Disposable {
  dispose: () => void;
}

/**
 * Parse raw stdin escape sequences into key names
 * compatible with DOM KeyboardEvent.key values
 */
function parseKey(data: string): string {
  if (data === '\x1b[A' || data === '\x1bOA') return 'ArrowUp';
  if (data === '\x1b[B' || data === '\x1bOB') return 'ArrowDown';
  if (data === '\x1b[C' || data === '\x1bOC') return 'ArrowRight';
  if (data === '\x1b[D' || data === '\x1bOD') return 'ArrowLeft';
  if (data === '\r' || data === '\n') return 'Enter';
  if (data === '\x1b') return 'Escape';
  if (data === '\x7f' || data === '\b') return 'Backspace';
  if (data === '\t') return 'Tab';
  return data;
}

function listen<T>(listeners: ((value: T) => void)[], callback: (value: T) => void): Disposable {
  listeners.push(callback);
  return {
    dispose: () => {
      const idx = listeners.indexOf(callback);
      if (idx !== -1) listeners.splice(idx, 1);
    },
  };
}

function restoreTerminal() {
  if (process.stdin.isTTY) {
    process.stdin.setRawMode(false);
  }
  process.stdin.pause();
  process.stdout.write('\x1b[?1049l');
  process.stdout.write('\x1b[?25h');
  process.stdout.write('\x1b[0m');
}

function createNodeTerminal(): GameTerminal {
  const keyListeners: ((event: TerminalKeyEvent) => void)[] = [];
  const resizeListeners: ((size: { cols: number; rows: number }) => void)[] = [];

  if (process.stdin.isTTY) {
    process.stdin.setRawMode(true);
  }
  process.stdin.resume();
  process.stdin.setEncoding('utf8');

  process.stdin.on('data', (data: string) => {
    if (data === '\x03') {
      restoreTerminal();
      process.exit(0);
    }

    const key = parseKey(data);
    const event: TerminalKeyEvent = {
      key: data,
      domEvent: { key, preventDefault: () => {}, stopPropagation: () => {} },
    };
    for (const listener of [...keyListeners]) {
      listener(event);
    }
  });

  process.stdout.on('resize', () => {
    const size = { cols: process.stdout.columns || 80, rows: process.stdout.rows || 24 };
    for (const listener of [...resizeListeners]) {
      listener(size);
    }
  });

  // Synchronized output: wrap writes with DEC sync sequences so the
  // terminal batches clear + redraw into a single atomic paint.
  const SYNC_START = '\x1b[?2026h';
  const SYNC_END = '\x1b[?2026l';

  process.on('exit', restoreTerminal);
  process.on('SIGINT', () => { restoreTerminal(); process.exit(0); });
  process.on('SIGTERM', () => { restoreTerminal(); process.exit(0); });

  return {
    write: (data: string) => {
      process.stdout.write(SYNC_START + data + SYNC_END);
    },
    get cols() { return process.stdout.columns || 80; },
    get rows() { return process.stdout.rows || 24; },
    onKey: (callback) => listen(keyListeners, callback),
    onResize: (callback) => listen(resizeListeners, callback),
  };
}

// ---------------------------------------------------------------------------
// Game lifecycle
// ---------------------------------------------------------------------------

function launch(options: CliOptions): void {
  setTheme(options.theme);

  const cols = process.stdout.columns || 80;
  const rows = process.stdout.rows || 24;
  const overrides = fitToTerminal(options.overrides, cols, rows);
  const random = options.seed === null ? undefined : createRng(options.seed);

  const terminal = createNodeTerminal();
  try {
    runSnakeGame(terminal, {
      ...overrides,
      random,
      onQuit: () => process.exit(0),
    });
  } catch (err) {
    restoreTerminal();
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

function reportAndExit(err: unknown): never {
  if (err instanceof GameError) {
    console.error(`grid-snake: ${err.message}`);
    process.exit(1);
  }
  throw err;
}

function main() {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    reportAndExit(err);
  }

  switch (options.command) {
    case 'help':
      console.log(formatHelp());
      return;
    case 'list-themes':
      for (const mode of getThemeModes()) {
        console.log(`  ${mode.padEnd(10)} ${getThemeName(mode)}`);
      }
      return;
    case 'setup':
      import('./setup')
        .then(m => m.setupCommand(options))
        .then(chosen => {
          if (chosen) launch(chosen);
        })
        .catch(reportAndExit);
      return;
    case 'play':
      try {
        launch(options);
      } catch (err) {
        reportAndExit(err);
      }
      return;
  }
}

main();
