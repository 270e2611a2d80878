import type {
  ClockPort,
  DeviceActivity,
  ReportingMode,
  StatsSnapshot,
} from '@pothole-radar/domain';

export interface ActivityTrackerOptions {
  activeWindowSeconds?: number;
  /** Monotonic source for device last-seen times. */
  clock: ClockPort;
  /** Wall clock for uptime. */
  wallClock: ClockPort;
}

/**
 * In-memory ingestion counters plus a sliding window of active devices.
 *
 * Every method runs to completion without yielding, so each update (and the
 * prune-then-count in `snapshot`) is atomic with respect to concurrent
 * requests on the event loop.
 *
 * A device's most recent reporting mode decides whether it counts as
 * realtime or batch; it is never counted under both.
 */
export class ActivityTracker {
  private readonly activeWindowMs: number;
  private readonly startedAtMs: number;
  private readonly devices = new Map<string, DeviceActivity>();

  private hitsReceived = 0;
  private hitsStored = 0;
  private hitsRejected = 0;
  private bytesReceived = 0;
  private bytesStored = 0;
  private batchesReceived = 0;
  private heartbeatsReceived = 0;
  private storageErrors = 0;
  private queueDepth = 0;
  private queueMaxDepth = 0;

  constructor(private readonly options: ActivityTrackerOptions) {
    this.activeWindowMs = (options.activeWindowSeconds ?? 120) * 1000;
    this.startedAtMs = options.wallClock.now();
  }

  get activeWindowSeconds(): number {
    return this.activeWindowMs / 1000;
  }

  recordHit(deviceId: string, sizeBytes: number): void {
    this.hitsReceived += 1;
    this.bytesReceived += sizeBytes;
    this.touch(deviceId, 'realtime', 1);
  }

  recordBatch(deviceId: string, count: number, sizeBytes: number): void {
    this.hitsReceived += count;
    this.batchesReceived += 1;
    this.bytesReceived += sizeBytes;
    this.touch(deviceId, 'batch', count);
  }

  /** Refreshes last-seen only; a heartbeat alone does not make a device active. */
  recordHeartbeat(deviceId: string): void {
    this.heartbeatsReceived += 1;
    const device = this.devices.get(deviceId);
    if (device) device.lastSeenMs = this.options.clock.now();
  }

  recordStored(count: number, sizeBytes: number): void {
    this.hitsStored += count;
    this.bytesStored += sizeBytes;
  }

  recordRejected(count = 1): void {
    this.hitsRejected += count;
  }

  recordStorageError(): void {
    this.storageErrors += 1;
  }

  updateQueueDepth(depth: number): void {
    this.queueDepth = depth;
    if (depth > this.queueMaxDepth) this.queueMaxDepth = depth;
  }

  snapshot(): StatsSnapshot {
    this.pruneStale(this.options.clock.now());

    let realtime = 0;
    let batch = 0;
    for (const device of this.devices.values()) {
      if (device.mode === 'realtime') realtime++;
      else batch++;
    }

    return {
      uptimeSeconds: Math.round((this.options.wallClock.now() - this.startedAtMs) / 100) / 10,
      hitsReceived: this.hitsReceived,
      hitsStored: this.hitsStored,
      hitsRejected: this.hitsRejected,
      bytesReceived: this.bytesReceived,
      bytesStored: this.bytesStored,
      batchesReceived: this.batchesReceived,
      heartbeatsReceived: this.heartbeatsReceived,
      storageErrors: this.storageErrors,
      queueDepth: this.queueDepth,
      queueMaxDepth: this.queueMaxDepth,
      activeDevices: {
        total: this.devices.size,
        realtime,
        batch,
        windowSeconds: this.activeWindowSeconds,
      },
    };
  }

  private touch(deviceId: string, mode: ReportingMode, hits: number): void {
    const now = this.options.clock.now();
    const device = this.devices.get(deviceId);
    if (device) {
      device.lastSeenMs = now;
      device.mode = mode;
      device.hitsSent += hits;
    } else {
      this.devices.set(deviceId, { lastSeenMs: now, mode, hitsSent: hits });
    }
  }

  /** A device seen exactly one window ago is still active. */
  private pruneStale(now: number): void {
    const cutoff = now - this.activeWindowMs;
    for (const [deviceId, device] of this.devices) {
      if (device.lastSeenMs < cutoff) this.devices.delete(deviceId);
    }
  }
}
