export interface ClockPort {
  /** Milliseconds; epoch-based for wall clocks, arbitrary origin for monotonic ones. */
  now(): number;
}
