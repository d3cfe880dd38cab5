import type { Coordinate } from './coordinate.js';
import type { RgbaColor } from './color.js';

export type RideState = 'DRIVING' | 'BOARDING';

/** Minimal sample of one vehicle at one moment, used for replay. */
export interface PositionRecord {
  readonly timestamp: number;
  readonly position: Coordinate;
  readonly lineName: string;
  readonly lineColor: RgbaColor;
  readonly rideState: RideState;
  readonly vehicleNumber: string;
  readonly trainNumber: number;
}

export function toRideState(state: string): RideState {
  return state === 'DRIVING' ? 'DRIVING' : 'BOARDING';
}
