import { isManualSource } from '@pothole-radar/domain';
import type { HitSource, PotholeFeature } from '@pothole-radar/domain';
import type { LatLon } from './geo.js';

export interface ClusterHit extends LatLon {
  severity: number;
  peakMg: number;
  timestampMs: number;
  deviceId: string;
  source: HitSource;
}

const round = (value: number, decimals: number) => {
  const f = 10 ** decimals;
  return Math.round(value * f) / f;
};

/**
 * Running aggregate of the hits believed to be one pothole. Lives only for
 * one clustering pass. The centroid is the mean of every merged hit, kept
 * from running sums.
 */
export class PotholeCluster implements LatLon {
  lat = 0;
  lon = 0;
  hitCount = 0;
  severitySum = 0;
  severityMax = 0;
  peakMgMax = 0;
  firstSeenMs = 0;
  lastSeenMs = 0;
  manualReports = 0;
  readonly devices = new Set<string>();
  readonly sources = new Map<string, number>();

  private latSum = 0;
  private lonSum = 0;

  addHit(hit: ClusterHit): void {
    this.hitCount += 1;
    this.latSum += hit.lat;
    this.lonSum += hit.lon;
    this.lat = this.latSum / this.hitCount;
    this.lon = this.lonSum / this.hitCount;

    this.severitySum += hit.severity;
    this.severityMax = Math.max(this.severityMax, hit.severity);
    this.peakMgMax = Math.max(this.peakMgMax, hit.peakMg);

    if (this.hitCount === 1 || hit.timestampMs < this.firstSeenMs) this.firstSeenMs = hit.timestampMs;
    if (this.hitCount === 1 || hit.timestampMs > this.lastSeenMs) this.lastSeenMs = hit.timestampMs;

    this.devices.add(hit.deviceId);
    this.sources.set(hit.source, (this.sources.get(hit.source) ?? 0) + 1);
    if (isManualSource(hit.source)) this.manualReports += 1;
  }

  get severityAvg(): number {
    return this.hitCount > 0 ? this.severitySum / this.hitCount : 0;
  }

  /**
   * 0–1, two decimals. Distinct devices weigh most (saturating at 3), then
   * volume (saturating at 5 hits), then manual confirmations (at 2).
   */
  get confidence(): number {
    const deviceFactor = Math.min(this.devices.size / 3, 1);
    const countFactor = Math.min(this.hitCount / 5, 1);
    const manualFactor = Math.min(this.manualReports / 2, 1);
    const score = deviceFactor * 0.5 + countFactor * 0.3 + manualFactor * 0.2;
    return round(Math.min(score, 1), 2);
  }

  toGeoJsonFeature(): PotholeFeature {
    return {
      type: 'Feature',
      geometry: {
        type: 'Point',
        coordinates: [round(this.lon, 6), round(this.lat, 6)],
      },
      properties: {
        hit_count: this.hitCount,
        severity_avg: round(this.severityAvg, 1),
        severity_max: this.severityMax,
        peak_mg_max: this.peakMgMax,
        confidence: this.confidence,
        devices: this.devices.size,
        first_seen_ms: this.firstSeenMs,
        last_seen_ms: this.lastSeenMs,
        manual_reports: this.manualReports,
        sources: Object.fromEntries(this.sources),
      },
    };
  }
}
