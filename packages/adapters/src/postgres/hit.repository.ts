import { PersistenceError, toHitSummary } from '@pothole-radar/domain';
import type { HitStoragePort, ServerHitRecord } from '@pothole-radar/domain';
import { decodeRecord, encodeRecord } from '../wire/hit.codec.js';
import { partitionKey } from '../file/file-hit.storage.js';
import { getPool } from './pool.js';
import type { DbPool } from './pool.js';

export type Queryable = Pick<DbPool, 'query'>;

const SCHEMA_SQL = `
  CREATE SCHEMA IF NOT EXISTS pothole;
  CREATE TABLE IF NOT EXISTS pothole.hit_records (
    record_id     BIGINT PRIMARY KEY,
    bucket        TEXT NOT NULL,
    server_ts     TIMESTAMPTZ NOT NULL,
    device_prefix TEXT NOT NULL,
    lat           DOUBLE PRECISION NOT NULL,
    lon           DOUBLE PRECISION NOT NULL,
    severity      INTEGER NOT NULL,
    speed_mps     DOUBLE PRECISION NOT NULL,
    payload       JSONB NOT NULL
  );
  CREATE INDEX IF NOT EXISTS hit_records_bucket_idx ON pothole.hit_records (bucket);
`;

/**
 * Hit store over PostgreSQL. `bucket` carries the same UTC hour partition as
 * the file store and the summary columns play the role of its index file.
 */
export class PgHitRepository implements HitStoragePort {
  constructor(private readonly db: Queryable = getPool()) {}

  async ensureSchema(): Promise<void> {
    await this.db.query(SCHEMA_SQL);
  }

  /** Counts the JSONB payload as the bytes written. */
  async store(record: ServerHitRecord): Promise<number> {
    const summary = toHitSummary(record);
    const payload = JSON.stringify(encodeRecord(record));
    try {
      await this.db.query(
        `INSERT INTO pothole.hit_records
           (record_id, bucket, server_ts, device_prefix, lat, lon, severity, speed_mps, payload)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
        [
          record.recordId,
          partitionKey(record.serverTimestampMs),
          new Date(record.serverTimestampMs),
          summary.device,
          summary.lat,
          summary.lon,
          summary.severity,
          record.hit.speedMps,
          payload,
        ],
      );
    } catch (err) {
      throw new PersistenceError(`failed to insert record ${record.recordId}`, { cause: err });
    }
    return Buffer.byteLength(payload, 'utf8');
  }

  async storeBatch(records: readonly ServerHitRecord[]): Promise<number> {
    let written = 0;
    for (const record of records) {
      written += await this.store(record);
    }
    return written;
  }

  async readAll(): Promise<ServerHitRecord[]> {
    const { rows } = await this.db.query<{ payload: unknown }>('SELECT payload FROM pothole.hit_records');
    const records: ServerHitRecord[] = [];
    for (const row of rows) {
      const record = decodeRecord(row.payload);
      if (record) records.push(record);
      else console.warn('[pg-hits] skipping row with invalid payload');
    }
    return records;
  }

  async delete(recordIds: ReadonlySet<number>): Promise<number> {
    if (recordIds.size === 0) return 0;
    const { rowCount } = await this.db.query('DELETE FROM pothole.hit_records WHERE record_id = ANY($1::bigint[])', [
      [...recordIds],
    ]);
    return rowCount ?? 0;
  }

  async isWritable(): Promise<boolean> {
    try {
      await this.db.query('SELECT 1');
      return true;
    } catch (err) {
      console.warn('[pg-hits] database unreachable', err instanceof Error ? err.message : err);
      return false;
    }
  }
}
