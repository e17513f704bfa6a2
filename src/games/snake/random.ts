/** Random sources for fruit placement. */

/** Random source returning a float in [0, 1). */
export type RandomSource = () => number;

/**
 * Normalize a number into an unsigned 32-bit integer.
 */
export function toUint32(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return (Math.floor(value) >>> 0);
}

/**
 * Create a deterministic xorshift32 source from a seed.
 * A zero seed is replaced with 1 since xorshift never leaves the zero state.
 */
export function createRng(seed: number): RandomSource {
  let state = toUint32(seed) || 1;
  return () => {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    return (state >>> 0) / 0x100000000;
  };
}

/**
 * Uniform integer in [0, count)
 */
export function randomIndex(random: RandomSource, count: number): number {
  const index = Math.floor(random() * count);
  // Guard against sources that can return exactly 1
  return Math.min(index, count - 1);
}
