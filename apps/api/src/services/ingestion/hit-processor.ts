import { PROTOCOL_TOO_OLD_MARKER, ValidationError } from '@pothole-radar/domain';
import type {
  ClientMessage,
  ClockPort,
  Hit,
  HitIngestionPort,
  HitQueuePort,
  ProcessResult,
  ServerHitRecord,
} from '@pothole-radar/domain';
import type { ActivityTracker } from '../stats/activity-tracker.js';
import type { HitRateLimiter } from './hit-rate-limiter.js';

export const MIN_PROTOCOL_VERSION = 1;

export interface HitProcessorDeps {
  queue: HitQueuePort;
  tracker: ActivityTracker;
  /** Wall clock used to stamp `serverTimestampMs`. */
  clock: ClockPort;
  rateLimiter?: HitRateLimiter;
  /** 0 waits for queue space indefinitely. */
  putTimeoutMs?: number;
  firstRecordId?: number;
}

export function validateMessage(message: ClientMessage): void {
  if (message.protocolVersion < MIN_PROTOCOL_VERSION) {
    throw new ValidationError(
      `protocol_version ${message.protocolVersion} ${PROTOCOL_TOO_OLD_MARKER}, minimum is ${MIN_PROTOCOL_VERSION}`,
    );
  }
  if (!message.deviceId) {
    throw new ValidationError('device_id is required');
  }
}

function collectHits(message: ClientMessage): { hits: readonly Hit[]; isBatch: boolean } {
  if (message.hit) return { hits: [message.hit], isBatch: false };
  if (message.hits && message.hits.length > 0) return { hits: message.hits, isBatch: true };
  return { hits: [], isBatch: false };
}

/**
 * Admits client messages: validates them, records device activity and puts
 * one record per hit on the queue. Persistence happens later in the
 * StorageConsumer, so `storedCount` reports enqueued hits only.
 */
export class HitProcessor implements HitIngestionPort {
  private nextRecordId: number;

  constructor(private readonly deps: HitProcessorDeps) {
    this.nextRecordId = deps.firstRecordId ?? 1;
  }

  async process(message: ClientMessage, sizeBytes: number): Promise<ProcessResult> {
    const { queue, tracker } = this.deps;

    try {
      validateMessage(message);
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      tracker.recordRejected();
      return { accepted: false, error: err.message, storedCount: 0 };
    }

    if (message.heartbeat) {
      tracker.recordHeartbeat(message.deviceId);
      console.debug(
        `[hit-processor] heartbeat from ${message.deviceId.slice(0, 8)} pending=${message.heartbeat.pendingHits}`,
      );
      return { accepted: true, error: '', storedCount: 0 };
    }

    const { hits, isBatch } = collectHits(message);
    if (hits.length === 0) return { accepted: true, error: '', storedCount: 0 };

    if (isBatch) tracker.recordBatch(message.deviceId, hits.length, sizeBytes);
    else tracker.recordHit(message.deviceId, sizeBytes);

    const serverTimestampMs = this.deps.clock.now();
    let stored = 0;
    for (const hit of hits) {
      if (this.deps.rateLimiter && !this.deps.rateLimiter.tryConsume(message.deviceId)) {
        tracker.recordRejected();
        continue;
      }

      const record: ServerHitRecord = {
        recordId: this.nextRecordId++,
        serverTimestampMs,
        protocolVersion: message.protocolVersion,
        deviceId: message.deviceId,
        appVersion: message.appVersion,
        hit,
      };

      try {
        await queue.put(record, this.putSignal());
        stored++;
      } catch (err) {
        console.error(
          `[hit-processor] enqueue failed for record ${record.recordId}`,
          err instanceof Error ? err.message : err,
        );
        tracker.recordRejected();
      }
    }

    tracker.updateQueueDepth(queue.size());
    if (stored < hits.length) {
      console.warn(`[hit-processor] ${message.deviceId.slice(0, 8)}: ${hits.length - stored} of ${hits.length} hit(s) not enqueued`);
    }

    return { accepted: true, error: '', storedCount: stored };
  }

  private putSignal(): AbortSignal | undefined {
    const timeoutMs = this.deps.putTimeoutMs ?? 0;
    return timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined;
  }
}
