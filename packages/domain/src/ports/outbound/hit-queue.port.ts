import type { ServerHitRecord } from '../../entities/hit-record.js';

/**
 * Capacity-bounded FIFO between request handlers and the storage consumer.
 * `put` suspends while full, `get` suspends while empty; both give up when
 * their signal aborts.
 */
export interface HitQueuePort {
  put(record: ServerHitRecord, signal?: AbortSignal): Promise<void>;
  get(signal?: AbortSignal): Promise<ServerHitRecord>;
  size(): number;
  readonly capacity: number;
}
