import { hasFix, toDegrees } from '@pothole-radar/domain';
import type { PotholeFeatureCollection, ServerHitRecord } from '@pothole-radar/domain';
import { haversineMeters } from './geo.js';
import { PotholeCluster } from './pothole-cluster.js';
import type { ClusterHit } from './pothole-cluster.js';

/** Two hits closer than this are taken to be the same pothole. */
export const CLUSTER_RADIUS_M = 15;

function toClusterHit(record: ServerHitRecord): ClusterHit {
  const { hit } = record;
  return {
    lat: toDegrees(hit.location.latMicrodeg),
    lon: toDegrees(hit.location.lonMicrodeg),
    severity: hit.pattern.severity,
    peakMg: hit.pattern.peakVerticalMg,
    timestampMs: hit.timestampMs,
    deviceId: record.deviceId,
    source: hit.source,
  };
}

/**
 * Greedy single pass in input order: each hit joins the cluster whose
 * centroid is nearest, if within `radiusM`, or starts a new one. On equal
 * distances the earliest-created cluster wins. Hits without a fix are
 * skipped. O(hits × clusters).
 */
export function clusterHits(records: readonly ServerHitRecord[], radiusM = CLUSTER_RADIUS_M): PotholeCluster[] {
  const clusters: PotholeCluster[] = [];

  for (const record of records) {
    if (!hasFix(record.hit.location)) continue;
    const hit = toClusterHit(record);

    let best: PotholeCluster | null = null;
    let bestDist = Number.POSITIVE_INFINITY;
    for (const cluster of clusters) {
      const d = haversineMeters(hit, cluster);
      if (d < bestDist) {
        bestDist = d;
        best = cluster;
      }
    }

    if (best && bestDist <= radiusM) {
      best.addHit(hit);
    } else {
      const cluster = new PotholeCluster();
      cluster.addHit(hit);
      clusters.push(cluster);
    }
  }

  return clusters;
}

export function clustersToFeatureCollection(clusters: readonly PotholeCluster[]): PotholeFeatureCollection {
  return {
    type: 'FeatureCollection',
    features: clusters.map((c) => c.toGeoJsonFeature()),
  };
}
