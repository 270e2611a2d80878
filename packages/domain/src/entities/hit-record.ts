import type { Hit } from './hit.js';
import { toDegrees } from './location.js';

/** A hit stamped by the server; the unit of durable storage. */
export interface ServerHitRecord {
  readonly recordId: number;
  readonly serverTimestampMs: number;
  readonly protocolVersion: number;
  readonly deviceId: string;
  readonly appVersion: number;
  readonly hit: Hit;
}

/** Compact per-record line kept beside the primary log. */
export interface HitSummary {
  readonly id: number;
  readonly server_ts: string;
  readonly ts: string;
  readonly device: string;
  readonly lat: number;
  readonly lon: number;
  readonly severity: number;
  readonly peak_mg: number;
  readonly speed: number;
}

export const DEVICE_PREFIX_LENGTH = 8;

export function toHitSummary(record: ServerHitRecord): HitSummary {
  const { hit } = record;
  return {
    id: record.recordId,
    server_ts: new Date(record.serverTimestampMs).toISOString(),
    ts: new Date(hit.timestampMs).toISOString(),
    device: record.deviceId.slice(0, DEVICE_PREFIX_LENGTH),
    lat: toDegrees(hit.location.latMicrodeg),
    lon: toDegrees(hit.location.lonMicrodeg),
    severity: hit.pattern.severity,
    peak_mg: hit.pattern.peakVerticalMg,
    speed: Math.round(hit.speedMps * 10) / 10,
  };
}
