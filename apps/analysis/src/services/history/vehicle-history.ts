import type { DrawSurfacePort, PositionRecord, Vehicle } from '@rail-trace/domain';
import { projectToScreen } from '../replay/projection.js';

/** Radius of a vehicle marker, in surface units */
export const VEHICLE_RADIUS = 5;

interface Timeline {
  readonly vehicleNumber: string;
  readonly records: PositionRecord[];
}

/**
 * Per-vehicle timelines in arrival order. Grows for the lifetime of an
 * analysis run and never evicts; a long-running service would need a window.
 */
export class VehicleHistory {
  private readonly timelines = new Map<string, Timeline>();

  insert(record: PositionRecord): void {
    const timeline = this.timelines.get(record.vehicleNumber);
    if (timeline) {
      timeline.records.push(record);
    } else {
      this.timelines.set(record.vehicleNumber, { vehicleNumber: record.vehicleNumber, records: [record] });
    }
  }

  get(vehicleNumber: string): Vehicle | undefined {
    return this.timelines.get(vehicleNumber);
  }

  get size(): number {
    return this.timelines.size;
  }

  list(): Vehicle[] {
    return [...this.timelines.values()];
  }

  longestTimeline(): number {
    let longest = 0;
    for (const { records } of this.timelines.values()) longest = Math.max(longest, records.length);
    return longest;
  }

  /**
   * Draws every vehicle that has a sample at `frameIndex`; shorter timelines
   * are skipped. Returns how many vehicles were drawn.
   */
  render(frameIndex: number, surface: DrawSurfacePort): number {
    let drawn = 0;
    for (const { records } of this.timelines.values()) {
      const record = records[frameIndex];
      if (!record) continue;
      const { x, y } = projectToScreen(record.position, surface.width, surface.height);
      surface.drawCircle(x, y, VEHICLE_RADIUS, record.lineColor);
      drawn += 1;
    }
    return drawn;
  }
}
