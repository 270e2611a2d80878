import type { Hit, ServerHitRecord } from '@pothole-radar/domain';

export function makeHit(overrides: Partial<Hit> = {}): Hit {
  return {
    timestampMs: Date.UTC(2024, 2, 5, 14, 29, 59),
    location: { latMicrodeg: 45_764_043, lonMicrodeg: 4_835_659, accuracyM: 5 },
    speedMps: 13.46,
    bearingDeg: 270,
    bearingBeforeDeg: 268,
    bearingAfterDeg: 272,
    pattern: {
      severity: 2,
      peakVerticalMg: 4500,
      peakLateralMg: 800,
      durationMs: 120,
      baselineMg: 1050,
      peakToBaselineRatio: 428,
      waveformVertical: [1000, 1200, 2000, 4500, 3000, 1500, 1000],
      waveformLateral: [100, 200, 800, 500, 200, 100, 50],
    },
    source: 'auto',
    ...overrides,
  };
}

export function makeRecord(recordId: number, overrides: Partial<ServerHitRecord> = {}): ServerHitRecord {
  return {
    recordId,
    serverTimestampMs: Date.UTC(2024, 2, 5, 14, 30),
    protocolVersion: 1,
    deviceId: 'device-alpha-001',
    appVersion: 3,
    hit: makeHit(),
    ...overrides,
  };
}
