import type { Feature, FeatureCollection, Point } from 'geojson';
import type { HitSummary } from '../../entities/hit-record.js';

export interface PotholeFeatureProperties {
  hit_count: number;
  severity_avg: number;
  severity_max: number;
  peak_mg_max: number;
  confidence: number;
  devices: number;
  first_seen_ms: number;
  last_seen_ms: number;
  manual_reports: number;
  sources: Record<string, number>;
}

export type PotholeFeature = Feature<Point, PotholeFeatureProperties>;
export type PotholeFeatureCollection = FeatureCollection<Point, PotholeFeatureProperties>;

export interface PotholeQueryPort {
  getPotholes(): Promise<PotholeFeatureCollection>;
  listRecentHits(limit: number): Promise<HitSummary[]>;
  deleteHits(recordIds: ReadonlySet<number>): Promise<number>;
}
