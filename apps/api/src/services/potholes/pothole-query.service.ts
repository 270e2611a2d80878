import { toHitSummary } from '@pothole-radar/domain';
import type {
  HitStoragePort,
  HitSummary,
  PotholeFeatureCollection,
  PotholeQueryPort,
} from '@pothole-radar/domain';
import { clusterHits, clustersToFeatureCollection } from '../clustering/cluster-hits.js';

/** Read side: every call works from a fresh `readAll()`, nothing is cached. */
export class PotholeQueryService implements PotholeQueryPort {
  constructor(
    private readonly storage: HitStoragePort,
    private readonly radiusM: number,
  ) {}

  async getPotholes(): Promise<PotholeFeatureCollection> {
    const records = await this.storage.readAll();
    return clustersToFeatureCollection(clusterHits(records, this.radiusM));
  }

  async listRecentHits(limit: number): Promise<HitSummary[]> {
    const records = await this.storage.readAll();
    return records
      .sort((a, b) => b.serverTimestampMs - a.serverTimestampMs || b.recordId - a.recordId)
      .slice(0, Math.max(0, limit))
      .map(toHitSummary);
  }

  async deleteHits(recordIds: ReadonlySet<number>): Promise<number> {
    const deleted = await this.storage.delete(recordIds);
    console.log(`[pothole-query] delete requested=${recordIds.size} deleted=${deleted}`);
    return deleted;
  }
}
