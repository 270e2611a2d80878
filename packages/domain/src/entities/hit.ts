import type { Location } from './location.js';
import type { ImpactPattern } from './impact-pattern.js';

/** Label carried by hits produced by the on-device accelerometer detector. */
export const AUTO_SOURCE = 'auto';

export type HitSource = typeof AUTO_SOURCE | 'manual' | 'voice' | (string & {});

export interface Hit {
  readonly timestampMs: number; // client clock, epoch ms
  readonly location: Location;
  readonly speedMps: number;
  readonly bearingDeg: number;
  readonly bearingBeforeDeg: number;
  readonly bearingAfterDeg: number;
  readonly pattern: ImpactPattern;
  readonly source: HitSource;
}

export function isManualSource(source: HitSource): boolean {
  return source !== AUTO_SOURCE;
}
