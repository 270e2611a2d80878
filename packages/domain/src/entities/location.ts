/** Fixed-point position as sent over the wire (1 unit = 1e-6 degree). */
export interface Location {
  readonly latMicrodeg: number;
  readonly lonMicrodeg: number;
  readonly accuracyM: number;
}

export const MICRODEGREES_PER_DEGREE = 1_000_000;

export function toDegrees(microdeg: number): number {
  return microdeg / MICRODEGREES_PER_DEGREE;
}

/** (0, 0) is what clients send when they have no GPS fix. */
export function hasFix(location: Location): boolean {
  return location.latMicrodeg !== 0 || location.lonMicrodeg !== 0;
}
