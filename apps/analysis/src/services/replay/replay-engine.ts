import { colorFromHex } from '@rail-trace/domain';
import type { DrawSurfacePort, ReplayControlPort, ReplayStatus } from '@rail-trace/domain';
import type { VehicleHistory } from '../history/vehicle-history.js';

export const BACKGROUND_COLOR = colorFromHex(0x9e9e9e);

/** Tick interval in wall-clock ms for the replay loop */
export const DEFAULT_TICK_INTERVAL_MS = 20;

export interface ReplayEngineOptions {
  history: VehicleHistory;
  surface: DrawSurfacePort;
  tickIntervalMs?: number;
  /** Fixed wrap bound. Derived from the longest timeline when omitted. */
  frameBound?: number;
}

/** Next frame index, wrapping to 0 at `bound`. */
export function advanceFrame(frameIndex: number, bound: number): number {
  const next = frameIndex + 1;
  return next >= bound ? 0 : next;
}

/** Clears the surface and draws every vehicle's sample at `frameIndex`. */
export function drawFrame(history: VehicleHistory, frameIndex: number, surface: DrawSurfacePort): number {
  surface.clearBackground(BACKGROUND_COLOR);
  return history.render(frameIndex, surface);
}

/**
 * Round-robin playback over logical frames. Frame `i` shows each vehicle's
 * `i`-th recorded sample, independent of wall-clock and feed timestamps.
 */
export class ReplayEngine implements ReplayControlPort {
  private readonly history: VehicleHistory;
  private readonly surface: DrawSurfacePort;
  private readonly tickIntervalMs: number;
  private readonly fixedBound: number | undefined;
  private tickTimer: ReturnType<typeof setInterval> | null = null;
  private frameIndex = 0;
  private paused = false;
  private drawing = false;

  constructor(options: ReplayEngineOptions) {
    this.history = options.history;
    this.surface = options.surface;
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.fixedBound = options.frameBound;
  }

  get frameBound(): number {
    return this.fixedBound ?? Math.max(1, this.history.longestTimeline());
  }

  start(): void {
    this.stop();
    this.frameIndex = 0;
    this.tickTimer = setInterval(() => {
      if (this.paused || this.drawing) return;
      this.step().catch((err) => console.error('[replay-engine] frame error', err));
    }, this.tickIntervalMs);

    console.log(`[replay-engine] started: ${this.history.size} vehicles, ${this.frameBound} frames`);
  }

  pause(): void {
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
  }

  stop(): void {
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = null;
    }
    this.paused = false;
  }

  /** Draws the current frame, waits for it to be presented, then advances. */
  async step(): Promise<void> {
    this.drawing = true;
    try {
      drawFrame(this.history, this.frameIndex, this.surface);
      await this.surface.nextFrame();
      this.frameIndex = advanceFrame(this.frameIndex, this.frameBound);
    } finally {
      this.drawing = false;
    }
  }

  status(): ReplayStatus {
    return {
      running: this.tickTimer !== null,
      paused: this.paused,
      frameIndex: this.frameIndex,
      frameBound: this.frameBound,
      vehicles: this.history.size,
    };
  }
}
