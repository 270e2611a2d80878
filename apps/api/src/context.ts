import {
  BoundedHitQueue,
  FileHitStorage,
  InMemoryHitStorage,
  MonotonicClock,
  PgHitRepository,
  SystemClock,
  getPool,
} from '@pothole-radar/adapters';
import type { ClockPort, HitQueuePort, HitStoragePort } from '@pothole-radar/domain';
import type { AppConfig } from './config/app-config.js';
import { ActivityTracker } from './services/stats/activity-tracker.js';
import { HitProcessor } from './services/ingestion/hit-processor.js';
import { HitRateLimiter } from './services/ingestion/hit-rate-limiter.js';
import { StorageConsumer } from './services/ingestion/storage-consumer.js';
import { PotholeQueryService } from './services/potholes/pothole-query.service.js';

/** Everything a request handler may touch; built once at startup. */
export interface AppContext {
  config: AppConfig;
  tracker: ActivityTracker;
  queue: HitQueuePort;
  storage: HitStoragePort;
  processor: HitProcessor;
  consumer: StorageConsumer;
  potholes: PotholeQueryService;
}

export interface AppContextOverrides {
  queue?: HitQueuePort;
  /** Stamps record server time and measures uptime. */
  wallClock?: ClockPort;
  /** Drives the active-device window and the hourly budget. */
  monotonicClock?: ClockPort;
  firstRecordId?: number;
}

/** Opens the configured store; the postgres table is created if missing. */
export async function openStorage(config: AppConfig): Promise<HitStoragePort> {
  switch (config.storage.backend) {
    case 'postgres': {
      const repo = new PgHitRepository(getPool(config.storage.databaseUrl));
      await repo.ensureSchema();
      return repo;
    }
    case 'memory':
      return new InMemoryHitStorage();
    case 'file':
    default:
      return new FileHitStorage(config.storage.baseDir);
  }
}

/**
 * One past the highest stored id, so a restart does not reuse ids still on disk.
 * No high-water mark is persisted: if the newest records were deleted before a
 * restart, their ids are handed out again. Ids are unique among stored records,
 * not across the whole history of the service.
 */
export async function nextRecordId(storage: HitStoragePort): Promise<number> {
  const records = await storage.readAll();
  return records.reduce((max, r) => Math.max(max, r.recordId), 0) + 1;
}

export function createAppContext(
  config: AppConfig,
  storage: HitStoragePort,
  overrides: AppContextOverrides = {},
): AppContext {
  const wallClock = overrides.wallClock ?? new SystemClock();
  const monotonicClock = overrides.monotonicClock ?? new MonotonicClock();

  const tracker = new ActivityTracker({
    activeWindowSeconds: config.limits.activeWindowSeconds,
    clock: monotonicClock,
    wallClock,
  });
  const queue = overrides.queue ?? new BoundedHitQueue(config.queue.maxSize);
  const processor = new HitProcessor({
    queue,
    tracker,
    clock: wallClock,
    rateLimiter: new HitRateLimiter(config.limits.maxHitsPerDevicePerHour, monotonicClock),
    putTimeoutMs: config.queue.putTimeoutMs,
    firstRecordId: overrides.firstRecordId,
  });

  return {
    config,
    tracker,
    queue,
    storage,
    processor,
    consumer: new StorageConsumer({ queue, storage, tracker }),
    potholes: new PotholeQueryService(storage, config.clustering.radiusM),
  };
}
