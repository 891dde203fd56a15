/** Monotonic millisecond clock. */
export interface Clock {
  now(): number;
}
