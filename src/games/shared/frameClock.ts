/**
 * Frame timing for game loops driven by setInterval
 *
 * Measures the real time between ticks (timers drift, so the nominal
 * interval is never trusted) and keeps a short rolling average for an
 * FPS readout.
 */

export interface FrameClock {
  /** Seconds since the previous tick; 0 on the first tick */
  tick(): number;
  /** Average frames per second over the recent window; 0 until two ticks */
  fps(): number;
}

const FPS_WINDOW = 10;

export function createFrameClock(now: () => number = () => performance.now()): FrameClock {
  let last: number | null = null;
  const durations: number[] = [];

  return {
    tick() {
      const current = now();
      const elapsedMs = last === null ? 0 : Math.max(0, current - last);
      if (last !== null) {
        durations.push(elapsedMs);
        if (durations.length > FPS_WINDOW) durations.shift();
      }
      last = current;
      return elapsedMs / 1000;
    },
    fps() {
      const total = durations.reduce((sum, d) => sum + d, 0);
      if (total <= 0) return 0;
      return (durations.length * 1000) / total;
    },
  };
}
