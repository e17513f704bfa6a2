/**
 * Grid Snake
 *
 * Terminal front end for RoundController: start screen, pre-game countdown,
 * play field, pause menu, game over screen and an FPS readout. All game
 * rules live in the round controller; this file only maps keys and time
 * onto it and draws the snapshot.
 */

import { getCurrentThemeColor, enterAlternateBuffer, exitAlternateBuffer, type GameTerminal } from '../utils';
import { type Menu, type MenuAction, PAUSE_MENU, GAME_OVER_MENU, handleMenuKey, renderMenu } from '../shared/menu';
import { createFrameClock } from '../shared/frameClock';
import { type RoundControllerOptions, RoundController } from './roundController';
import type { Direction } from './grid';
import { gridColumns, gridRows } from './config';
import {
  computeLayout,
  centeredText,
  renderBorder,
  renderEntities,
  renderGridDots,
  renderScore,
} from './render';

/**
 * Snake Game Controller
 */
export interface SnakeController {
  stop: () => void;
  isRunning: boolean;
  /** The round being played, for hosts that want to read its state */
  round: RoundController;
}

export interface RunSnakeGameOptions extends RoundControllerOptions {
  /** Called after the player quits and the game has stopped */
  onQuit?: () => void;
  /** Seconds of countdown between the start screen and the first move */
  countdownSeconds?: number;
}

type Phase = 'start' | 'countdown' | 'playing';

const FRAME_MS = 16;

const KEY_TO_DIRECTION = new Map<string, Direction>([
  ['ArrowUp', 'up'],
  ['ArrowDown', 'down'],
  ['ArrowLeft', 'left'],
  ['ArrowRight', 'right'],
  ['w', 'up'],
  ['s', 'down'],
  ['a', 'left'],
  ['d', 'right'],
]);

/**
 * Run a round in the given terminal.
 *
 * @throws GameError when the options describe an invalid play field
 */
export function runSnakeGame(terminal: GameTerminal, options: RunSnakeGameOptions = {}): SnakeController {
  const { onQuit, countdownSeconds = 3, onSpawnSkipped, ...roundOptions } = options;
  const themeColor = getCurrentThemeColor();

  let statusMessage = '';
  let statusFrames = 0;

  const round = new RoundController({
    ...roundOptions,
    onSpawnSkipped: (info) => {
      // Shown in the footer; a console write would tear the frame
      statusMessage = `NO ROOM FOR FRUIT (${info.attempts} TRIES)`;
      statusFrames = 120;
      onSpawnSkipped?.(info);
    },
  });
  const gridCols = gridColumns(round.config);
  const gridRowCount = gridRows(round.config);
  const clock = createFrameClock();

  let running = true;
  let phase: Phase = 'start';
  let countdownRemaining = 0;
  let paused = false;
  let pauseMenuSelection = 0;
  let gameOverSelection = 0;

  // Juicy effects
  let eatFlashFrames = 0;
  let deathFlashFrames = 0;

  let frameInterval: ReturnType<typeof setInterval> | null = null;
  let keyListener: { dispose: () => void } | null = null;
  let resizeListener: { dispose: () => void } | null = null;

  const controller: SnakeController = {
    stop: () => {
      if (!running) return;
      running = false;
      if (frameInterval) clearInterval(frameInterval);
      keyListener?.dispose();
      resizeListener?.dispose();
      exitAlternateBuffer(terminal, 'snake stop');
    },
    get isRunning() { return running; },
    round,
  };

  function quit() {
    controller.stop();
    onQuit?.();
  }

  function restart() {
    round.reset();
    eatFlashFrames = 0;
    deathFlashFrames = 0;
    gameOverSelection = 0;
    paused = false;
  }

  function render() {
    let output = '\x1b[2J\x1b[H';
    const cols = terminal.cols;
    const rows = terminal.rows;

    output += `\x1b[1;1H\x1b[2m${themeColor}FPS: ${Math.round(clock.fps())}\x1b[0m`;

    const layout = computeLayout(cols, rows, gridCols, gridRowCount);
    if (!layout) {
      const msg1 = 'Terminal too small!';
      const msg2 = `Need: ${gridCols * 2 + 2}×${gridRowCount + 7}  Have: ${cols}×${rows}`;
      const centerX = Math.floor(cols / 2);
      const centerY = Math.floor(rows / 2);
      output += `\x1b[${centerY};${Math.max(1, centerX - Math.floor(msg1.length / 2))}H${themeColor}${msg1}\x1b[0m`;
      output += `\x1b[${centerY + 2};${Math.max(1, centerX - Math.floor(msg2.length / 2))}H\x1b[2m${msg2}\x1b[0m`;
      terminal.write(output);
      return;
    }

    const snapshot = round.snapshot();
    const midRow = layout.top + Math.floor(layout.gridRows / 2);
    const centerX = layout.left + layout.gridCols + 1;

    output += centeredText(layout, layout.top - 3, '▓▓ G R I D   S N A K E ▓▓', `\x1b[1m${themeColor}`);
    output += renderScore(snapshot, layout, eatFlashFrames > 0);

    const borderColor = deathFlashFrames > 0 && deathFlashFrames % 4 < 2 ? '\x1b[1;31m' : themeColor;
    output += renderBorder(layout, borderColor);

    if (paused) {
      output += centeredText(layout, midRow - 2, '══ PAUSED ══', `\x1b[5m${themeColor}`);
      output += renderMenu(PAUSE_MENU, pauseMenuSelection, {
        centerX,
        startY: midRow,
        showShortcuts: false,
      });
    } else if (phase === 'start') {
      output += centeredText(layout, midRow, '[ PRESS ANY KEY TO START ]', `\x1b[5m${themeColor}`);
      output += centeredText(layout, midRow + 2, '↑↓←→ MOVE  ESC MENU', `\x1b[2m${themeColor}`);
    } else if (phase === 'countdown') {
      output += renderGridDots(layout);
      output += renderEntities(snapshot, layout);
      output += centeredText(layout, midRow, `${Math.max(1, Math.ceil(countdownRemaining))}`, `\x1b[1m${themeColor}`);
    } else {
      output += renderGridDots(layout);
      output += renderEntities(snapshot, layout, eatFlashFrames > 0);

      if (snapshot.state === 'gameOver') {
        output += centeredText(layout, midRow - 3, '══ GAME OVER ══', '\x1b[1;31m');
        output += centeredText(
          layout,
          midRow - 1,
          `LENGTH ${snapshot.length}  FRUIT ${snapshot.fruitsEaten}`,
          themeColor
        );
        output += renderMenu(GAME_OVER_MENU, gameOverSelection, {
          centerX,
          startY: midRow + 1,
        });
      }
    }

    const footerRow = layout.top + layout.gridRows + 2;
    const hint = phase === 'playing' && !paused && snapshot.state === 'running'
      ? '[ ESC ] MENU   repeat a direction to boost'
      : '';
    output += `\x1b[${footerRow};${layout.left}H\x1b[2m${themeColor}${hint}\x1b[0m`;
    if (statusFrames > 0) {
      output += `\x1b[${footerRow + 1};${layout.left}H\x1b[33m${statusMessage}\x1b[0m`;
    }

    terminal.write(output);
  }

  function frame() {
    const elapsed = clock.tick();

    if (eatFlashFrames > 0) eatFlashFrames--;
    if (deathFlashFrames > 0) deathFlashFrames--;
    if (statusFrames > 0) statusFrames--;

    if (!paused) {
      if (phase === 'countdown') {
        countdownRemaining -= elapsed;
        if (countdownRemaining <= 0) {
          phase = 'playing';
          round.start();
        }
      } else if (phase === 'playing') {
        const result = round.advance(elapsed);
        if (result.outcome === 'fruit-eaten') {
          eatFlashFrames = 8;
        } else if (result.outcome === 'game-over' && result.collision) {
          deathFlashFrames = 30;
        }
      }
    }

    render();
  }

  function runMenuAction(action: MenuAction) {
    switch (action) {
      case 'resume':
        paused = false;
        break;
      case 'restart':
        restart();
        break;
      case 'quit':
        quit();
        break;
    }
  }

  /** Returns the new selection after running whatever the key chose */
  function pressMenuKey(menu: Menu, selection: number, domKey: string): number {
    const result = handleMenuKey(menu, selection, domKey);
    if (result.action) runMenuAction(result.action);
    return result.selection;
  }

  function handleKey(key: string, domKey: string) {
    if (round.state === 'gameOver' && phase === 'playing') {
      gameOverSelection = pressMenuKey(GAME_OVER_MENU, gameOverSelection, domKey);
      return;
    }

    if (paused) {
      pauseMenuSelection = pressMenuKey(PAUSE_MENU, pauseMenuSelection, domKey);
      return;
    }

    if (key === 'escape') {
      paused = true;
      pauseMenuSelection = 0;
      return;
    }

    if (phase === 'start') {
      if (key === 'q') {
        quit();
        return;
      }
      phase = 'countdown';
      countdownRemaining = countdownSeconds;
      return;
    }

    if (phase === 'playing') {
      const direction = KEY_TO_DIRECTION.get(domKey) ?? KEY_TO_DIRECTION.get(key);
      if (direction) round.changeDirection(direction);
    }
  }

  // Start the game loop
  enterAlternateBuffer(terminal, 'snake start');

  frameInterval = setInterval(() => {
    if (!running) return;
    frame();
  }, FRAME_MS);

  keyListener = terminal.onKey(({ domEvent }) => {
    if (!running) return;
    domEvent.preventDefault();
    domEvent.stopPropagation();
    handleKey(domEvent.key.toLowerCase(), domEvent.key);
  });

  resizeListener = terminal.onResize(() => {
    if (running) render();
  });

  render();
  return controller;
}
