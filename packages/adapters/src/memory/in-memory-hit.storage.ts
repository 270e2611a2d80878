import type { HitStoragePort, ServerHitRecord } from '@pothole-radar/domain';

/** Process-local store; contents are lost on restart. */
export class InMemoryHitStorage implements HitStoragePort {
  private readonly records = new Map<number, ServerHitRecord>();

  /** Nothing reaches a disk, so every write counts as 0 bytes. */
  async store(record: ServerHitRecord): Promise<number> {
    this.records.set(record.recordId, record);
    return 0;
  }

  async storeBatch(records: readonly ServerHitRecord[]): Promise<number> {
    for (const record of records) {
      await this.store(record);
    }
    return 0;
  }

  async readAll(): Promise<ServerHitRecord[]> {
    return [...this.records.values()];
  }

  async delete(recordIds: ReadonlySet<number>): Promise<number> {
    let deleted = 0;
    for (const id of recordIds) {
      if (this.records.delete(id)) deleted++;
    }
    return deleted;
  }

  async isWritable(): Promise<boolean> {
    return true;
  }
}
