export interface ClockPort {
  /** Epoch milliseconds. */
  nowMs(): number;
}
