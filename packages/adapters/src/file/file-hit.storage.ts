import { access, appendFile, mkdir, readFile, readdir, rename, writeFile } from 'node:fs/promises';
import { constants } from 'node:fs';
import { join } from 'node:path';
import { PersistenceError, toHitSummary } from '@pothole-radar/domain';
import type { HitStoragePort, ServerHitRecord } from '@pothole-radar/domain';
import { decodeFrames, encodeFrame } from './frame.codec.js';
import { KeyedMutex } from './keyed-mutex.js';

export const LOG_FILE = 'hits.bin';
export const INDEX_FILE = 'hits.jsonl';

const DIGITS = /^\d+$/;

/** `YYYY/MM/DD/HH` of a server timestamp, in UTC. */
export function partitionKey(serverTimestampMs: number): string {
  const d = new Date(serverTimestampMs);
  const pad = (n: number, width = 2) => String(n).padStart(width, '0');
  return [pad(d.getUTCFullYear(), 4), pad(d.getUTCMonth() + 1), pad(d.getUTCDate()), pad(d.getUTCHours())].join('/');
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function indexLine(record: ServerHitRecord): string {
  return `${JSON.stringify(toHitSummary(record))}\n`;
}

/**
 * Hit store over hour-partitioned directories:
 *
 *   baseDir/YYYY/MM/DD/HH/hits.bin    length-prefixed JSON frames (source of truth)
 *   baseDir/YYYY/MM/DD/HH/hits.jsonl  one summary line per record
 *
 * Appends never touch existing bytes. `delete` compacts each affected
 * partition by writing temp files and renaming them into place, holding the
 * same per-partition lock as appends.
 */
export class FileHitStorage implements HitStoragePort {
  private readonly locks = new KeyedMutex();

  constructor(private readonly baseDir: string) {}

  private partitionDir(key: string): string {
    return join(this.baseDir, ...key.split('/'));
  }

  async store(record: ServerHitRecord): Promise<number> {
    const key = partitionKey(record.serverTimestampMs);
    const dir = this.partitionDir(key);
    const frame = encodeFrame(record);
    const line = indexLine(record);
    try {
      await this.locks.run(key, async () => {
        await mkdir(dir, { recursive: true });
        await appendFile(join(dir, LOG_FILE), frame);
        await appendFile(join(dir, INDEX_FILE), line, 'utf8');
      });
    } catch (err) {
      throw new PersistenceError(`failed to append record ${record.recordId} to ${dir}`, { cause: err });
    }
    console.debug(`[file-storage] stored record ${record.recordId} in ${key}`);
    return frame.length + Buffer.byteLength(line, 'utf8');
  }

  async storeBatch(records: readonly ServerHitRecord[]): Promise<number> {
    let written = 0;
    for (const record of records) {
      written += await this.store(record);
    }
    return written;
  }

  async readAll(): Promise<ServerHitRecord[]> {
    const keys = await this.listPartitions();
    const all: ServerHitRecord[] = [];
    for (const key of keys) {
      all.push(...(await this.readPartition(key)));
    }
    return all;
  }

  async delete(recordIds: ReadonlySet<number>): Promise<number> {
    if (recordIds.size === 0) return 0;

    let deleted = 0;
    for (const key of await this.listPartitions()) {
      deleted += await this.locks.run(key, () => this.compactPartition(key, recordIds));
    }
    if (deleted > 0) console.log(`[file-storage] deleted ${deleted} record(s)`);
    return deleted;
  }

  async isWritable(): Promise<boolean> {
    try {
      await mkdir(this.baseDir, { recursive: true });
      await access(this.baseDir, constants.W_OK);
      return true;
    } catch (err) {
      console.warn('[file-storage] base directory not writable', err instanceof Error ? err.message : err);
      return false;
    }
  }

  // ─── Partitions ─────────────────────────────────────────────────────────────

  private async listPartitions(): Promise<string[]> {
    let keys = [''];
    // year / month / day / hour
    for (let depth = 0; depth < 4; depth++) {
      const next: string[] = [];
      for (const prefix of keys) {
        const names = await this.listNumericDirs(prefix === '' ? this.baseDir : this.partitionDir(prefix));
        for (const name of names) next.push(prefix === '' ? name : `${prefix}/${name}`);
      }
      keys = next;
    }
    return keys;
  }

  private async listNumericDirs(dir: string): Promise<string[]> {
    try {
      const entries = await readdir(dir, { withFileTypes: true });
      return entries
        .filter((e) => e.isDirectory() && DIGITS.test(e.name))
        .map((e) => e.name)
        .sort();
    } catch (err) {
      if (isNotFound(err)) return [];
      throw new PersistenceError(`failed to list ${dir}`, { cause: err });
    }
  }

  private async readPartition(key: string): Promise<ServerHitRecord[]> {
    const path = join(this.partitionDir(key), LOG_FILE);
    let data: Buffer;
    try {
      data = await readFile(path);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw new PersistenceError(`failed to read ${path}`, { cause: err });
    }

    const { records, invalid, truncatedBytes } = decodeFrames(data);
    if (invalid > 0 || truncatedBytes > 0) {
      console.warn(`[file-storage] ${key}: skipped ${invalid} invalid frame(s), ${truncatedBytes} trailing byte(s)`);
    }
    return records;
  }

  /** Caller holds the partition lock. */
  private async compactPartition(key: string, recordIds: ReadonlySet<number>): Promise<number> {
    const records = await this.readPartition(key);
    const kept = records.filter((r) => !recordIds.has(r.recordId));
    const removed = records.length - kept.length;
    if (removed === 0) return 0;

    const dir = this.partitionDir(key);
    const log = Buffer.concat(kept.map(encodeFrame));
    const index = kept.map(indexLine).join('');
    try {
      await writeFile(join(dir, `${LOG_FILE}.tmp`), log);
      await writeFile(join(dir, `${INDEX_FILE}.tmp`), index, 'utf8');
      await rename(join(dir, `${LOG_FILE}.tmp`), join(dir, LOG_FILE));
      await rename(join(dir, `${INDEX_FILE}.tmp`), join(dir, INDEX_FILE));
    } catch (err) {
      throw new PersistenceError(`failed to compact partition ${key}`, { cause: err });
    }
    return removed;
  }
}
