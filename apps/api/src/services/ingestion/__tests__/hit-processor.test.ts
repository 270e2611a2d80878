import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { BoundedHitQueue, ManualClock } from '@pothole-radar/adapters';
import { CapacityError } from '@pothole-radar/domain';
import type { HitQueuePort, ServerHitRecord } from '@pothole-radar/domain';
import { ActivityTracker } from '../../stats/activity-tracker.js';
import { HitProcessor, MIN_PROTOCOL_VERSION } from '../hit-processor.js';
import { HitRateLimiter } from '../hit-rate-limiter.js';
import { makeHit, makeMessage } from '../../../__tests__/fixtures.js';

const SERVER_NOW = Date.UTC(2024, 5, 1, 8, 0, 0);

let queue: BoundedHitQueue;
let tracker: ActivityTracker;
let processor: HitProcessor;

function drainAll(q: HitQueuePort): Promise<ServerHitRecord[]> {
  return Promise.all(Array.from({ length: q.size() }, () => q.get()));
}

beforeEach(() => {
  jest.spyOn(console, 'debug').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
  queue = new BoundedHitQueue(100);
  tracker = new ActivityTracker({ clock: new ManualClock(), wallClock: new ManualClock(SERVER_NOW) });
  processor = new HitProcessor({ queue, tracker, clock: new ManualClock(SERVER_NOW) });
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('HitProcessor.process()', () => {
  it('accepts a valid single hit and enqueues one stamped record', async () => {
    const hit = makeHit();
    const result = await processor.process(makeMessage({ hit }), 512);

    expect(result).toEqual({ accepted: true, error: '', storedCount: 1 });
    const [record] = await drainAll(queue);
    expect(record).toEqual({
      recordId: 1,
      serverTimestampMs: SERVER_NOW,
      protocolVersion: 1,
      deviceId: 'device-alpha-001',
      appVersion: 3,
      hit,
    });
    expect(tracker.snapshot().activeDevices.realtime).toBe(1);
  });

  it('rejects an empty device id and counts exactly one rejection', async () => {
    const result = await processor.process(makeMessage({ deviceId: '', hit: makeHit() }), 100);

    expect(result).toEqual({ accepted: false, error: 'device_id is required', storedCount: 0 });
    expect(tracker.snapshot().hitsRejected).toBe(1);
    expect(queue.size()).toBe(0);
  });

  it('rejects protocol versions below the minimum with a "too old" error', async () => {
    const result = await processor.process(makeMessage({ protocolVersion: MIN_PROTOCOL_VERSION - 1, hit: makeHit() }), 100);

    expect(result.accepted).toBe(false);
    expect(result.error).toBe('protocol_version 0 too old, minimum is 1');
    expect(result.storedCount).toBe(0);
    expect(tracker.snapshot().hitsRejected).toBe(1);
  });

  it('handles a heartbeat without touching the queue', async () => {
    await processor.process(makeMessage({ hit: makeHit() }), 100);
    await drainAll(queue);

    const result = await processor.process(makeMessage({ heartbeat: { timestampMs: 1, pendingHits: 4 } }), 40);

    expect(result).toEqual({ accepted: true, error: '', storedCount: 0 });
    expect(queue.size()).toBe(0);
    const s = tracker.snapshot();
    expect(s.heartbeatsReceived).toBe(1);
    expect(s.hitsReceived).toBe(1);
  });

  it('treats a message with nothing in it as a no-op', async () => {
    const result = await processor.process(makeMessage(), 20);
    expect(result).toEqual({ accepted: true, error: '', storedCount: 0 });
    expect(tracker.snapshot().hitsReceived).toBe(0);
  });

  it('enqueues every hit of a batch and records batch mode', async () => {
    const result = await processor.process(makeMessage({ hits: [makeHit(), makeHit(), makeHit()] }), 900);

    expect(result.storedCount).toBe(3);
    const s = tracker.snapshot();
    expect(s.batchesReceived).toBe(1);
    expect(s.hitsReceived).toBe(3);
    expect(s.activeDevices).toMatchObject({ total: 1, realtime: 0, batch: 1 });
    expect(s.queueDepth).toBe(3);
  });

  it('reports a device in batch mode after singles followed by a batch', async () => {
    await processor.process(makeMessage({ hit: makeHit() }), 100);
    await processor.process(makeMessage({ hit: makeHit() }), 100);
    await processor.process(makeMessage({ hits: [makeHit(), makeHit()] }), 200);

    expect(tracker.snapshot().activeDevices).toMatchObject({ total: 1, realtime: 0, batch: 1 });
  });

  it('assigns strictly increasing ids with no gaps', async () => {
    await processor.process(makeMessage({ hit: makeHit() }), 100);
    await processor.process(makeMessage({ hits: [makeHit(), makeHit()] }), 100);
    await processor.process(makeMessage({ deviceId: 'other-device', hit: makeHit() }), 100);

    const ids = (await drainAll(queue)).map((r) => r.recordId);
    expect(ids).toEqual([1, 2, 3, 4]);
  });

  it('continues numbering from firstRecordId', async () => {
    const seeded = new HitProcessor({ queue, tracker, clock: new ManualClock(SERVER_NOW), firstRecordId: 501 });
    await seeded.process(makeMessage({ hits: [makeHit(), makeHit()] }), 100);

    expect((await drainAll(queue)).map((r) => r.recordId)).toEqual([501, 502]);
  });

  it('skips a hit whose enqueue fails and keeps going with the batch', async () => {
    const failing: HitQueuePort = {
      capacity: 10,
      size: () => 0,
      get: () => Promise.reject(new Error('unused')),
      put: jest.fn<HitQueuePort['put']>(async (record) => {
        if (record.recordId === 2) throw new CapacityError('queue full');
      }),
    };
    const p = new HitProcessor({ queue: failing, tracker, clock: new ManualClock(SERVER_NOW) });

    const result = await p.process(makeMessage({ hits: [makeHit(), makeHit(), makeHit()] }), 300);

    expect(result).toEqual({ accepted: true, error: '', storedCount: 2 });
    expect(failing.put).toHaveBeenCalledTimes(3);
    expect(tracker.snapshot().hitsRejected).toBe(1);
  });

  it('gives up on a full queue after the put timeout', async () => {
    const full = new BoundedHitQueue(1);
    const p = new HitProcessor({ queue: full, tracker, clock: new ManualClock(SERVER_NOW), putTimeoutMs: 20 });

    const result = await p.process(makeMessage({ hits: [makeHit(), makeHit()] }), 200);

    expect(result.storedCount).toBe(1);
    expect(full.size()).toBe(1);
    expect(tracker.snapshot().hitsRejected).toBe(1);
  });

  it('rejects hits beyond the hourly device budget', async () => {
    const limiter = new HitRateLimiter(2, new ManualClock());
    const p = new HitProcessor({ queue, tracker, clock: new ManualClock(SERVER_NOW), rateLimiter: limiter });

    const result = await p.process(makeMessage({ hits: [makeHit(), makeHit(), makeHit()] }), 300);

    expect(result).toEqual({ accepted: true, error: '', storedCount: 2 });
    expect(tracker.snapshot().hitsRejected).toBe(1);
    expect((await drainAll(queue)).map((r) => r.recordId)).toEqual([1, 2]);
  });
});
