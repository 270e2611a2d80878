import { CapacityError } from '@pothole-radar/domain';
import type { HitQueuePort, ServerHitRecord } from '@pothole-radar/domain';

interface PendingPut {
  record: ServerHitRecord;
  resolve: () => void;
  detach: () => void;
}

interface PendingGet {
  resolve: (record: ServerHitRecord) => void;
  detach: () => void;
}

function onAbort(signal: AbortSignal | undefined, listener: (signal: AbortSignal) => void): () => void {
  if (!signal) return () => undefined;
  const handler = () => listener(signal);
  signal.addEventListener('abort', handler, { once: true });
  return () => signal.removeEventListener('abort', handler);
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error('aborted');
}

/**
 * In-process FIFO with a fixed capacity. Producers wait (never drop) while
 * it is full, so a slow store throttles ingestion instead of losing hits.
 */
export class BoundedHitQueue implements HitQueuePort {
  private readonly items: ServerHitRecord[] = [];
  private readonly pendingPuts: PendingPut[] = [];
  private readonly pendingGets: PendingGet[] = [];

  constructor(readonly capacity: number = 10_000) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  size(): number {
    return this.items.length;
  }

  put(record: ServerHitRecord, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new CapacityError(`queue full (capacity ${this.capacity}), put cancelled`));
    }

    // A waiting consumer means the buffer is empty: hand the record over directly.
    const waitingGet = this.pendingGets.shift();
    if (waitingGet) {
      waitingGet.detach();
      waitingGet.resolve(record);
      return Promise.resolve();
    }

    if (this.items.length < this.capacity) {
      this.items.push(record);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const entry: PendingPut = {
        record,
        resolve,
        detach: onAbort(signal, () => {
          const idx = this.pendingPuts.indexOf(entry);
          if (idx !== -1) this.pendingPuts.splice(idx, 1);
          reject(new CapacityError(`queue full (capacity ${this.capacity}), put cancelled`));
        }),
      };
      this.pendingPuts.push(entry);
    });
  }

  get(signal?: AbortSignal): Promise<ServerHitRecord> {
    if (signal?.aborted) return Promise.reject(abortReason(signal));

    const next = this.items.shift();
    if (next !== undefined) {
      const waitingPut = this.pendingPuts.shift();
      if (waitingPut) {
        waitingPut.detach();
        this.items.push(waitingPut.record);
        waitingPut.resolve();
      }
      return Promise.resolve(next);
    }

    return new Promise<ServerHitRecord>((resolve, reject) => {
      const entry: PendingGet = {
        resolve,
        detach: onAbort(signal, (aborted) => {
          const idx = this.pendingGets.indexOf(entry);
          if (idx !== -1) this.pendingGets.splice(idx, 1);
          reject(abortReason(aborted));
        }),
      };
      this.pendingGets.push(entry);
    });
  }
}
