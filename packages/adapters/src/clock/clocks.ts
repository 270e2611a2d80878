import { performance } from 'node:perf_hooks';
import type { ClockPort } from '@pothole-radar/domain';

/** Epoch milliseconds; stamps server receive time on records. */
export class SystemClock implements ClockPort {
  now(): number {
    return Date.now();
  }
}

/** Never goes backwards, unaffected by wall-clock adjustments. */
export class MonotonicClock implements ClockPort {
  now(): number {
    return performance.now();
  }
}

/**
 * Hand-driven clock for tests.
 * Advances by `tickMs` after each call to `now()` starting from `startMs`.
 */
export class ManualClock implements ClockPort {
  private currentMs: number;

  constructor(
    startMs = 0,
    private readonly tickMs: number = 0,
  ) {
    this.currentMs = startMs;
  }

  now(): number {
    const ts = this.currentMs;
    this.currentMs += this.tickMs;
    return ts;
  }

  peek(): number {
    return this.currentMs;
  }

  advance(ms: number): void {
    this.currentMs += ms;
  }
}
