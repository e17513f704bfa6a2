import { describe, it, expect, afterEach } from 'vitest';
import {
  cellCursor,
  centeredText,
  computeLayout,
  fitGrid,
  renderBorder,
  renderEntities,
  renderGridDots,
  renderScore,
  type FieldLayout,
} from './render';
import { RoundController } from './roundController';
import { cell } from './grid';
import { setTheme } from '../utils';

// 5x5 grid centred in a 40x20 terminal
const LAYOUT: FieldLayout = { left: 15, top: 8, gridCols: 5, gridRows: 5 };

function smallRound(): RoundController {
  return new RoundController({ playWidth: 100, playHeight: 100, spawnInterval: 0.5, random: () => 0 });
}

afterEach(() => {
  setTheme('cyan');
});

describe('computeLayout', () => {
  it('centres the field below the header', () => {
    expect(computeLayout(40, 20, 5, 5)).toEqual(LAYOUT);
  });

  it('returns null when the field does not fit', () => {
    expect(computeLayout(11, 20, 5, 5)).toBeNull();
    expect(computeLayout(12, 11, 5, 5)).toBeNull();
    expect(computeLayout(80, 24, 40, 40)).toBeNull();
  });

  it('fits exactly, keeping the header clear', () => {
    expect(computeLayout(12, 12, 5, 5)).toEqual({ left: 1, top: 4, gridCols: 5, gridRows: 5 });
  });
});

describe('fitGrid', () => {
  it('takes what the terminal allows', () => {
    expect(fitGrid(80, 24, 40, 40)).toEqual({ gridCols: 39, gridRows: 17 });
  });

  it('caps at the maximum', () => {
    expect(fitGrid(200, 100, 40, 40)).toEqual({ gridCols: 40, gridRows: 40 });
  });

  it('never goes negative', () => {
    expect(fitGrid(1, 3, 40, 40)).toEqual({ gridCols: 0, gridRows: 0 });
  });
});

describe('cellCursor', () => {
  it('maps cells to two-column terminal positions inside the border', () => {
    expect(cellCursor(LAYOUT, cell(0, 0))).toBe('\x1b[9;16H');
    expect(cellCursor(LAYOUT, cell(4, 4))).toBe('\x1b[13;24H');
  });

  it('returns null off the field', () => {
    expect(cellCursor(LAYOUT, cell(-1, 0))).toBeNull();
    expect(cellCursor(LAYOUT, cell(5, 0))).toBeNull();
    expect(cellCursor(LAYOUT, cell(0, 5))).toBeNull();
  });
});

describe('renderBorder', () => {
  it('draws the box around the grid', () => {
    const output = renderBorder(LAYOUT, '\x1b[96m');
    expect(output.startsWith('\x1b[8;15H\x1b[96m╔══════════╗\x1b[0m')).toBe(true);
    expect(output).toContain('\x1b[9;26H\x1b[96m║\x1b[0m');
    expect(output.endsWith('\x1b[14;15H\x1b[96m╚══════════╝\x1b[0m')).toBe(true);
  });
});

describe('renderGridDots', () => {
  it('dots every other cell in the subtle colour', () => {
    const output = renderGridDots(LAYOUT);
    expect(output.split('·')).toHaveLength(10);
    expect(output.startsWith('\x1b[9;16H\x1b[38;5;23m·\x1b[0m')).toBe(true);
  });
});

describe('renderEntities', () => {
  it('draws the body tail first and the head last', () => {
    const output = renderEntities(smallRound().snapshot(), LAYOUT);
    expect(output).toBe(
      '\x1b[10;20H\x1b[96m▓▓\x1b[0m' +
      '\x1b[11;20H\x1b[96m▓▓\x1b[0m' +
      '\x1b[12;20H\x1b[1m\x1b[96m██\x1b[0m'
    );
  });

  it('draws fruit before the snake', () => {
    const round = smallRound();
    round.start();
    round.advance(0.5);
    const output = renderEntities(round.snapshot(), LAYOUT);
    expect(output.startsWith('\x1b[9;16H\x1b[1;91m◆◆\x1b[0m')).toBe(true);
  });

  it('uses the flash colour and the current theme', () => {
    expect(renderEntities(smallRound().snapshot(), LAYOUT, true)).toContain('\x1b[12;20H\x1b[1m\x1b[1;33m██\x1b[0m');

    setTheme('amber');
    expect(renderEntities(smallRound().snapshot(), LAYOUT)).toContain('\x1b[12;20H\x1b[1m\x1b[38;5;214m██\x1b[0m');
  });

  it('dims body segments past the neck', () => {
    const round = new RoundController({ playWidth: 100, playHeight: 100, initialLength: 4 });
    const output = renderEntities(round.snapshot(), LAYOUT);
    expect(output.startsWith('\x1b[10;20H\x1b[2m\x1b[96m▓▓\x1b[0m')).toBe(true);
  });

  it('skips anything outside the field', () => {
    const round = smallRound();
    round.start();
    round.advance(2.0);
    // head is one row below the field
    const output = renderEntities(round.snapshot(), LAYOUT);
    expect(output).not.toContain('██');
  });
});

describe('renderScore', () => {
  it('prints padded length and fruit count above the field', () => {
    expect(renderScore(smallRound().snapshot(), LAYOUT)).toBe('\x1b[7;15H\x1b[96mLENGTH: 003  FRUIT: 000\x1b[0m');
  });

  it('highlights on request', () => {
    expect(renderScore(smallRound().snapshot(), LAYOUT, true)).toBe('\x1b[7;15H\x1b[1;33mLENGTH: 003  FRUIT: 000\x1b[0m');
  });
});

describe('centeredText', () => {
  it('centres over the field width', () => {
    expect(centeredText(LAYOUT, 10, 'AB', '')).toBe('\x1b[10;20HAB\x1b[0m');
  });

  it('falls back to the left edge for long text', () => {
    expect(centeredText(LAYOUT, 3, 'A'.repeat(20), '\x1b[1m')).toBe(`\x1b[3;15H\x1b[1m${'A'.repeat(20)}\x1b[0m`);
  });
});
