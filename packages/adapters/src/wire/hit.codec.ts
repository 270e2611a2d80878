import { z } from 'zod';
import { AUTO_SOURCE } from '@pothole-radar/domain';
import type { Hit, ServerHitRecord } from '@pothole-radar/domain';

// ---------------------------------------------------------------------------
// snake_case wire shape shared by the HTTP adapter and the stores
// ---------------------------------------------------------------------------

export interface HitWireLimits {
  /** Upper bound on each waveform array; unbounded when omitted. */
  maxWaveformSamples?: number;
}

function waveformSchema(limits: HitWireLimits) {
  const samples = z.array(z.number().int());
  const bounded = limits.maxWaveformSamples === undefined ? samples : samples.max(limits.maxWaveformSamples);
  return bounded.default([]);
}

export function buildHitWireSchema(limits: HitWireLimits = {}) {
  const locationSchema = z.object({
    lat_microdeg: z.number().int().min(-90_000_000).max(90_000_000).default(0),
    lon_microdeg: z.number().int().min(-180_000_000).max(180_000_000).default(0),
    accuracy_m: z.number().min(0).default(0),
  });

  const patternSchema = z.object({
    severity: z.number().int().min(0).default(0),
    peak_vertical_mg: z.number().int().default(0),
    peak_lateral_mg: z.number().int().default(0),
    duration_ms: z.number().int().min(0).default(0),
    baseline_mg: z.number().int().default(0),
    peak_to_baseline_ratio: z.number().int().default(0),
    waveform_vertical: waveformSchema(limits),
    waveform_lateral: waveformSchema(limits),
  });

  return z
    .object({
      timestamp_ms: z.number().int().min(0).default(0),
      location: locationSchema.default({}),
      speed_mps: z.number().default(0),
      bearing_deg: z.number().default(0),
      bearing_before_deg: z.number().default(0),
      bearing_after_deg: z.number().default(0),
      pattern: patternSchema.default({}),
      source: z.string().min(1).default(AUTO_SOURCE),
    })
    .transform(
      (w): Hit => ({
        timestampMs: w.timestamp_ms,
        location: {
          latMicrodeg: w.location.lat_microdeg,
          lonMicrodeg: w.location.lon_microdeg,
          accuracyM: w.location.accuracy_m,
        },
        speedMps: w.speed_mps,
        bearingDeg: w.bearing_deg,
        bearingBeforeDeg: w.bearing_before_deg,
        bearingAfterDeg: w.bearing_after_deg,
        pattern: {
          severity: w.pattern.severity,
          peakVerticalMg: w.pattern.peak_vertical_mg,
          peakLateralMg: w.pattern.peak_lateral_mg,
          durationMs: w.pattern.duration_ms,
          baselineMg: w.pattern.baseline_mg,
          peakToBaselineRatio: w.pattern.peak_to_baseline_ratio,
          waveformVertical: w.pattern.waveform_vertical,
          waveformLateral: w.pattern.waveform_lateral,
        },
        source: w.source,
      }),
    );
}

export const hitWireSchema = buildHitWireSchema();

export const serverHitRecordWireSchema = z
  .object({
    record_id: z.number().int().positive(),
    server_timestamp_ms: z.number().int(),
    protocol_version: z.number().int(),
    device_id: z.string(),
    app_version: z.number().int(),
    hit: hitWireSchema,
  })
  .transform(
    (w): ServerHitRecord => ({
      recordId: w.record_id,
      serverTimestampMs: w.server_timestamp_ms,
      protocolVersion: w.protocol_version,
      deviceId: w.device_id,
      appVersion: w.app_version,
      hit: w.hit,
    }),
  );

export type HitWire = z.input<typeof hitWireSchema>;
export type ServerHitRecordWire = z.input<typeof serverHitRecordWireSchema>;

export function encodeHit(hit: Hit): HitWire {
  return {
    timestamp_ms: hit.timestampMs,
    location: {
      lat_microdeg: hit.location.latMicrodeg,
      lon_microdeg: hit.location.lonMicrodeg,
      accuracy_m: hit.location.accuracyM,
    },
    speed_mps: hit.speedMps,
    bearing_deg: hit.bearingDeg,
    bearing_before_deg: hit.bearingBeforeDeg,
    bearing_after_deg: hit.bearingAfterDeg,
    pattern: {
      severity: hit.pattern.severity,
      peak_vertical_mg: hit.pattern.peakVerticalMg,
      peak_lateral_mg: hit.pattern.peakLateralMg,
      duration_ms: hit.pattern.durationMs,
      baseline_mg: hit.pattern.baselineMg,
      peak_to_baseline_ratio: hit.pattern.peakToBaselineRatio,
      waveform_vertical: [...hit.pattern.waveformVertical],
      waveform_lateral: [...hit.pattern.waveformLateral],
    },
    source: hit.source,
  };
}

export function encodeRecord(record: ServerHitRecord): ServerHitRecordWire {
  return {
    record_id: record.recordId,
    server_timestamp_ms: record.serverTimestampMs,
    protocol_version: record.protocolVersion,
    device_id: record.deviceId,
    app_version: record.appVersion,
    hit: encodeHit(record.hit),
  };
}

/** Parses a stored record payload; `null` when it does not match the wire shape. */
export function decodeRecord(payload: unknown): ServerHitRecord | null {
  const result = serverHitRecordWireSchema.safeParse(payload);
  return result.success ? result.data : null;
}
