import type { PositionRecord } from './position-record.js';

// Identity is the vehicle number; records are kept in arrival order
export interface Vehicle {
  readonly vehicleNumber: string;
  readonly records: readonly PositionRecord[];
}
