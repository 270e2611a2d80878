// ─── Queue ────────────────────────────────────────────────────────────────────
export { BoundedHitQueue } from './memory/bounded-hit.queue.js';

// ─── Storage ──────────────────────────────────────────────────────────────────
export { InMemoryHitStorage } from './memory/in-memory-hit.storage.js';
export { FileHitStorage, partitionKey, LOG_FILE, INDEX_FILE } from './file/file-hit.storage.js';
export { PgHitRepository } from './postgres/hit.repository.js';
export type { Queryable } from './postgres/hit.repository.js';
export { getPool, closePool } from './postgres/pool.js';

// ─── Wire codec ───────────────────────────────────────────────────────────────
export {
  buildHitWireSchema,
  hitWireSchema,
  serverHitRecordWireSchema,
  encodeHit,
  encodeRecord,
  decodeRecord,
} from './wire/hit.codec.js';
export type { HitWire, HitWireLimits, ServerHitRecordWire } from './wire/hit.codec.js';

// ─── Clocks ───────────────────────────────────────────────────────────────────
export { SystemClock, MonotonicClock, ManualClock } from './clock/clocks.js';
