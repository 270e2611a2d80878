export interface ImpactPattern {
  readonly severity: number;
  readonly peakVerticalMg: number;
  readonly peakLateralMg: number;
  readonly durationMs: number;
  readonly baselineMg: number;
  readonly peakToBaselineRatio: number; // peak / baseline × 100
  readonly waveformVertical: readonly number[];
  readonly waveformLateral: readonly number[];
}
