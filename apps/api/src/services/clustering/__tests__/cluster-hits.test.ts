import { describe, it, expect } from '@jest/globals';
import { clusterHits, clustersToFeatureCollection } from '../cluster-hits.js';
import { haversineMeters } from '../geo.js';
import { hitAt, makeHit, makeRecord } from '../../../__tests__/fixtures.js';

const LAT = 45_764_000;
const LON = 4_835_000;

const withSeverity = (severity: number, peakVerticalMg = 4500) => ({
  pattern: { ...makeHit().pattern, severity, peakVerticalMg },
});

describe('haversineMeters', () => {
  it('measures 0.00009 degrees of latitude as about 10 m', () => {
    expect(haversineMeters({ lat: 45.764, lon: 4.835 }, { lat: 45.76409, lon: 4.835 })).toBeCloseTo(10.007, 2);
  });

  it('is zero for the same point', () => {
    expect(haversineMeters({ lat: 45.764, lon: 4.835 }, { lat: 45.764, lon: 4.835 })).toBe(0);
  });
});

describe('clusterHits', () => {
  it('merges hits about 10 m apart into one pothole at their mean position', () => {
    const clusters = clusterHits([
      makeRecord(1, { hit: hitAt(LAT, LON) }),
      makeRecord(2, { hit: hitAt(LAT + 90, LON) }),
    ]);

    expect(clusters).toHaveLength(1);
    expect(clusters[0]?.hitCount).toBe(2);
    expect(clusters[0]?.lat).toBeCloseTo(45.764045, 9);
    expect(clusters[0]?.lon).toBeCloseTo(4.835, 9);
  });

  it('keeps hits about 20 m apart as separate potholes', () => {
    const clusters = clusterHits([
      makeRecord(1, { hit: hitAt(LAT, LON) }),
      makeRecord(2, { hit: hitAt(LAT + 180, LON) }),
    ]);
    expect(clusters.map((c) => c.hitCount)).toEqual([1, 1]);
  });

  it('skips hits without a GPS fix', () => {
    const clusters = clusterHits([
      makeRecord(1, { hit: hitAt(0, 0) }),
      makeRecord(2, { hit: hitAt(LAT, LON) }),
    ]);
    expect(clusters).toHaveLength(1);
    expect(clusters[0]?.hitCount).toBe(1);
  });

  it('gives an equidistant hit to the cluster created first', () => {
    // A and B are ~22 m apart; the third hit sits exactly between them
    const clusters = clusterHits([
      makeRecord(1, { hit: hitAt(100, LON) }),
      makeRecord(2, { hit: hitAt(-100, LON) }),
      makeRecord(3, { hit: hitAt(0, LON) }),
    ]);
    expect(clusters.map((c) => c.hitCount)).toEqual([2, 1]);
  });

  it('honours a custom radius', () => {
    const records = [makeRecord(1, { hit: hitAt(LAT, LON) }), makeRecord(2, { hit: hitAt(LAT + 180, LON) })];
    expect(clusterHits(records, 25)).toHaveLength(1);
    expect(clusterHits(records, 5)).toHaveLength(2);
  });

  it('produces the same clusters on repeated runs', () => {
    const records = [
      makeRecord(1, { hit: hitAt(LAT, LON) }),
      makeRecord(2, { hit: hitAt(LAT + 60, LON) }),
      makeRecord(3, { hit: hitAt(LAT + 400, LON) }),
    ];
    const first = clustersToFeatureCollection(clusterHits(records));
    const second = clustersToFeatureCollection(clusterHits(records));
    expect(second).toEqual(first);
  });

  it('returns no clusters for no records', () => {
    expect(clustersToFeatureCollection(clusterHits([]))).toEqual({ type: 'FeatureCollection', features: [] });
  });
});

describe('PotholeCluster feature', () => {
  it('aggregates severity, peaks, devices, time range and sources', () => {
    const [cluster] = clusterHits([
      makeRecord(1, { deviceId: 'dev-a', hit: hitAt(LAT, LON, { timestampMs: 2000, ...withSeverity(2, 4000) }) }),
      makeRecord(2, { deviceId: 'dev-b', hit: hitAt(LAT + 10, LON, { timestampMs: 1000, ...withSeverity(3, 6200) }) }),
      makeRecord(3, { deviceId: 'dev-a', hit: hitAt(LAT + 20, LON, { timestampMs: 3000, source: 'voice', ...withSeverity(1, 3000) }) }),
    ]);

    const props = cluster?.toGeoJsonFeature().properties;
    expect(props).toEqual({
      hit_count: 3,
      severity_avg: 2,
      severity_max: 3,
      peak_mg_max: 6200,
      // devices 2/3 * 0.5 + hits 3/5 * 0.3 + manual 1/2 * 0.2
      confidence: 0.61,
      devices: 2,
      first_seen_ms: 1000,
      last_seen_ms: 3000,
      manual_reports: 1,
      sources: { auto: 2, voice: 1 },
    });
  });

  it('puts longitude first in the point coordinates', () => {
    const [cluster] = clusterHits([makeRecord(1, { hit: hitAt(LAT, LON) })]);
    expect(cluster?.toGeoJsonFeature().geometry).toEqual({ type: 'Point', coordinates: [4.835, 45.764] });
  });

  it('scores a single automatic hit from one device at 0.23', () => {
    const [cluster] = clusterHits([makeRecord(1, { hit: hitAt(LAT, LON) })]);
    expect(cluster?.confidence).toBe(0.23);
  });

  it('caps confidence at 1 for three devices, five hits and two manual reports', () => {
    const records = ['dev-a', 'dev-b', 'dev-c', 'dev-a', 'dev-b'].map((deviceId, i) =>
      makeRecord(i + 1, { deviceId, hit: hitAt(LAT + i, LON, { source: i < 2 ? 'manual' : 'auto' }) }),
    );
    const [cluster] = clusterHits(records);
    expect(cluster?.hitCount).toBe(5);
    expect(cluster?.confidence).toBe(1);
  });
});
