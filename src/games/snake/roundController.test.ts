import { describe, it, expect, vi } from 'vitest';
import { RoundController } from './roundController';
import { GameError } from './errors';
import { cell } from './grid';
import type { RandomSource } from './random';

function sequence(values: number[]): RandomSource {
  let i = 0;
  return () => values[i++ % values.length];
}

describe('RoundController state machine', () => {
  it('starts idle and does nothing until started', () => {
    const round = new RoundController();
    expect(round.state).toBe('idle');

    const result = round.advance(5);
    expect(result).toEqual({ state: 'idle', outcome: 'ongoing', consumed: [], spawned: null, collision: null });
    expect(round.snapshot().head).toEqual(cell(20, 3));
    expect(round.changeDirection('left')).toBe('ignored');
  });

  it('moves the snake once running', () => {
    const round = new RoundController();
    round.start();
    expect(round.state).toBe('running');

    const result = round.advance(1.0);
    expect(result.outcome).toBe('ongoing');
    expect(result.state).toBe('running');
    expect(round.snapshot().segments).toEqual([cell(20, 4), cell(20, 3), cell(20, 2)]);
  });

  it('start is a no-op once the round has begun', () => {
    const round = new RoundController({ playWidth: 100, playHeight: 100 });
    round.start();
    round.advance(2.0);
    expect(round.state).toBe('gameOver');
    round.start();
    expect(round.state).toBe('gameOver');
  });

  it('applies a direction passed with the tick before moving', () => {
    const round = new RoundController();
    round.start();
    round.advance(1.0, 'right');
    expect(round.snapshot().head).toEqual(cell(21, 3));
    expect(round.snapshot().direction).toBe('right');
  });

  it('rejects an invalid configuration', () => {
    expect(() => new RoundController({ cellSize: 0 })).toThrow(GameError);
    expect(() => new RoundController({ playWidth: 810 })).toThrow('playWidth must be a multiple of cellSize 20 (got 810)');
  });
});

describe('RoundController collisions', () => {
  it('ends the round when the head leaves the field', () => {
    const round = new RoundController({ playWidth: 100, playHeight: 100 });
    round.start();
    expect(round.advance(1.0).outcome).toBe('ongoing');

    const result = round.advance(1.0);
    expect(result).toEqual({ state: 'gameOver', outcome: 'game-over', consumed: [], spawned: null, collision: 'wall' });
    expect(round.isGameOver).toBe(true);
    expect(round.snapshot().head).toEqual(cell(2, 5));
  });

  it('freezes the round after game over', () => {
    const round = new RoundController({ playWidth: 100, playHeight: 100 });
    round.start();
    round.advance(2.0);

    const result = round.advance(3.0, 'left');
    expect(result).toEqual({ state: 'gameOver', outcome: 'game-over', consumed: [], spawned: null, collision: null });
    expect(round.snapshot().head).toEqual(cell(2, 5));
    expect(round.changeDirection('left')).toBe('ignored');
  });

  it('ends the round when the head runs into the body', () => {
    const round = new RoundController({ initialLength: 5 });
    round.start();
    expect(round.advance(1.0, 'right').outcome).toBe('ongoing');
    expect(round.advance(1.0, 'up').outcome).toBe('ongoing');

    const result = round.advance(1.0, 'left');
    expect(result.outcome).toBe('game-over');
    expect(result.collision).toBe('self');
    expect(round.snapshot().head).toEqual(cell(20, 4));
  });

  it('a boost past the edge is caught on the next tick', () => {
    const round = new RoundController({ playWidth: 100, playHeight: 100 });
    round.start();
    expect(round.changeDirection('down')).toBe('boosted');
    expect(round.changeDirection('down')).toBe('boosted');
    expect(round.snapshot().head).toEqual(cell(2, 5));
    expect(round.state).toBe('running');

    const result = round.advance(0);
    expect(result.collision).toBe('wall');
    expect(round.state).toBe('gameOver');
  });
});

describe('RoundController fruit', () => {
  it('eats every fruit under the head in one tick and grows once per fruit', () => {
    const onSpawnSkipped = vi.fn();
    // Every draw lands on column 20, row 5
    const round = new RoundController({
      spawnInterval: 0.5,
      random: sequence([0.5, 0.125]),
      onSpawnSkipped,
    });
    round.start();

    const first = round.advance(0.5);
    expect(first.spawned?.cell).toEqual(cell(20, 5));
    expect(first.outcome).toBe('ongoing');

    const second = round.advance(1.0);
    expect(second.spawned?.cell).toEqual(cell(20, 5));
    expect(round.snapshot().head).toEqual(cell(20, 4));
    expect(round.snapshot().fruits).toHaveLength(2);

    const third = round.advance(1.0);
    expect(third.outcome).toBe('fruit-eaten');
    expect(third.consumed).toHaveLength(2);
    expect(third.spawned).toBeNull();
    expect(onSpawnSkipped).toHaveBeenCalledWith({ attempts: 100, snakeLength: 3 });
    expect(round.fruitsEaten).toBe(2);
    expect(round.snapshot().fruits).toHaveLength(0);

    round.advance(1.0);
    expect(round.snapshot().length).toBe(4);
    round.advance(1.0);
    expect(round.snapshot().length).toBe(5);
    round.advance(1.0);
    expect(round.snapshot().length).toBe(5);
  });

  it('keeps length constant while nothing is eaten', () => {
    const round = new RoundController({ spawnInterval: 1000 });
    round.start();
    for (let i = 0; i < 30; i++) {
      round.advance(0.1);
      expect(round.snapshot().length).toBe(3);
    }
  });
});

describe('RoundController.reset', () => {
  it('restarts a finished round immediately', () => {
    const round = new RoundController({ playWidth: 100, playHeight: 100, spawnInterval: 0.5, random: () => 0 });
    round.start();
    round.advance(2.0);
    expect(round.state).toBe('gameOver');

    round.reset();
    const snap = round.snapshot();
    expect(snap.state).toBe('running');
    expect(snap.segments).toEqual([cell(2, 3), cell(2, 2), cell(2, 1)]);
    expect(snap.direction).toBe('down');
    expect(snap.fruits).toEqual([]);
    expect(snap.fruitsEaten).toBe(0);
  });

  it('leaves an idle round idle', () => {
    const round = new RoundController();
    round.reset();
    expect(round.state).toBe('idle');
  });
});

describe('RoundController.snapshot', () => {
  it('describes the field for renderers', () => {
    const round = new RoundController({ playWidth: 200, playHeight: 120, cellSize: 10 });
    const snap = round.snapshot();
    expect(Object.isFrozen(snap)).toBe(true);
    expect(snap).toMatchObject({
      state: 'idle',
      head: cell(10, 3),
      length: 3,
      direction: 'down',
      fruitsEaten: 0,
      playWidth: 200,
      playHeight: 120,
      cellSize: 10,
    });
  });

  it('is not affected by later ticks', () => {
    const round = new RoundController();
    round.start();
    const before = round.snapshot();
    round.advance(1.0);
    expect(before.head).toEqual(cell(20, 3));
    expect(before.segments[0]).toEqual(cell(20, 3));
  });
});
