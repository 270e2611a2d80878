import type { HitQueuePort, HitStoragePort, ServerHitRecord } from '@pothole-radar/domain';
import type { ActivityTracker } from '../stats/activity-tracker.js';

export interface StorageConsumerDeps {
  queue: HitQueuePort;
  storage: HitStoragePort;
  tracker: ActivityTracker;
}

/**
 * Single background worker that moves records from the queue into the store,
 * one at a time. A failed write is counted and logged and the loop carries
 * on; that record is then missing from storage even though the client was
 * told it was accepted.
 *
 * `stop()` is only observed while waiting on the queue, so a write that has
 * started always completes.
 */
export class StorageConsumer {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(private readonly deps: StorageConsumerDeps) {}

  get running(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal).catch((err) => {
      console.error('[storage-consumer] loop terminated unexpectedly', err);
    });
    console.log('[storage-consumer] started');
  }

  async stop(): Promise<void> {
    if (!this.loop || !this.controller) return;
    this.controller.abort();
    await this.loop;
    this.loop = null;
    this.controller = null;
    console.log('[storage-consumer] stopped');
  }

  /** Writes out everything still buffered. Call after `stop()` on shutdown. */
  async drain(): Promise<number> {
    let written = 0;
    while (this.deps.queue.size() > 0) {
      await this.persist(await this.deps.queue.get());
      written++;
    }
    return written;
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let record: ServerHitRecord;
      try {
        record = await this.deps.queue.get(signal);
      } catch (err) {
        if (signal.aborted) return;
        throw err;
      }
      await this.persist(record);
    }
  }

  private async persist(record: ServerHitRecord): Promise<void> {
    const { storage, tracker, queue } = this.deps;
    try {
      tracker.recordStored(1, await storage.store(record));
      tracker.updateQueueDepth(queue.size());
    } catch (err) {
      tracker.recordStorageError();
      console.error(`[storage-consumer] write failed for record ${record.recordId}`, err);
    }
  }
}
