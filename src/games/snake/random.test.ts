import { describe, it, expect } from 'vitest';
import { createRng, randomIndex, toUint32 } from './random';

describe('createRng', () => {
  it('repeats the same sequence for the same seed', () => {
    const a = createRng(42);
    const b = createRng(42);
    for (let i = 0; i < 20; i++) {
      expect(a()).toBe(b());
    }
  });

  it('differs between seeds', () => {
    expect(createRng(1)()).not.toBe(createRng(2)());
  });

  it('treats a zero seed as 1', () => {
    expect(createRng(0)()).toBe(createRng(1)());
  });

  it('stays in [0, 1)', () => {
    const random = createRng(123456);
    for (let i = 0; i < 1000; i++) {
      const value = random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('produces the xorshift32 sequence from seed 1', () => {
    // 1 -> 1 ^ (1 << 13) = 8193 -> 8193 ^ 0 = 8193 -> 8193 ^ (8193 << 5) = 270369
    expect(createRng(1)()).toBe(270369 / 0x100000000);
  });
});

describe('toUint32', () => {
  it('wraps and floors', () => {
    expect(toUint32(-1)).toBe(0xffffffff);
    expect(toUint32(7.9)).toBe(7);
    expect(toUint32(Number.NaN)).toBe(0);
  });
});

describe('randomIndex', () => {
  it('maps [0, 1) onto [0, count)', () => {
    expect(randomIndex(() => 0, 40)).toBe(0);
    expect(randomIndex(() => 0.5, 40)).toBe(20);
    expect(randomIndex(() => 0.999999, 40)).toBe(39);
  });

  it('clamps a source that returns exactly 1', () => {
    expect(randomIndex(() => 1, 40)).toBe(39);
  });
});
