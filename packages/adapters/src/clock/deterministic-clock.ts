import type { ClockPort } from '@rail-trace/domain';

/**
 * Deterministic clock for tests and scripted sessions.
 * Each call to `nowMs()` returns the current instant and then advances by `tickMs`.
 */
export class DeterministicClock implements ClockPort {
  private currentMs: number;

  constructor(
    epochMs: number,
    private readonly tickMs: number = 1_000,
  ) {
    this.currentMs = epochMs;
  }

  nowMs(): number {
    const ts = this.currentMs;
    this.currentMs += this.tickMs;
    return ts;
  }

  peek(): number {
    return this.currentMs;
  }

  advance(ms: number): void {
    this.currentMs += ms;
  }
}

/** Wall-clock implementation for live sessions. */
export const systemClock: ClockPort = {
  nowMs: () => Date.now(),
};
