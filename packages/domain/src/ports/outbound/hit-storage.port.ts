import type { ServerHitRecord } from '../../entities/hit-record.js';

export interface HitStoragePort {
  /** Resolves to the number of bytes written to the backing medium. */
  store(record: ServerHitRecord): Promise<number>;
  /** Sequential `store`; no atomicity across the batch. Resolves to the total bytes written. */
  storeBatch(records: readonly ServerHitRecord[]): Promise<number>;
  /** Every stored, not yet deleted record. Order unspecified. */
  readAll(): Promise<ServerHitRecord[]>;
  /** Removes matching records and returns how many were found. */
  delete(recordIds: ReadonlySet<number>): Promise<number>;
  /** Cheap liveness probe used by the health endpoint. */
  isWritable(): Promise<boolean>;
}
