import type { ClockPort } from '@pothole-radar/domain';

const HOUR_MS = 3_600_000;

/** Sliding one-hour hit budget per device. */
export class HitRateLimiter {
  private readonly windows = new Map<string, number[]>();
  private lastSweepMs: number;

  constructor(
    private readonly maxPerHour: number,
    private readonly clock: ClockPort,
  ) {
    this.lastSweepMs = clock.now();
  }

  /** Takes one unit of the device's budget; `false` when it is spent. A limit of 0 never refuses. */
  tryConsume(deviceId: string): boolean {
    if (this.maxPerHour <= 0) return true;

    const now = this.clock.now();
    this.sweep(now);

    const cutoff = now - HOUR_MS;
    const stamps = (this.windows.get(deviceId) ?? []).filter((t) => t > cutoff);
    if (stamps.length >= this.maxPerHour) {
      this.windows.set(deviceId, stamps);
      return false;
    }
    stamps.push(now);
    this.windows.set(deviceId, stamps);
    return true;
  }

  private sweep(now: number): void {
    if (now - this.lastSweepMs < HOUR_MS) return;
    this.lastSweepMs = now;
    const cutoff = now - HOUR_MS;
    for (const [deviceId, stamps] of this.windows) {
      const last = stamps[stamps.length - 1];
      if (last === undefined || last <= cutoff) this.windows.delete(deviceId);
    }
  }
}
