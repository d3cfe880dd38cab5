import type { Coordinate } from './coordinate.js';
import type { Line } from './line.js';

/** Full property set of a trajectory feature, used for statistics. */
export interface Train {
  readonly delay?: string;
  readonly hasJourney: boolean;
  readonly hasRealtime: boolean;
  readonly hasRealtimeJourney: boolean;
  readonly line?: Line;
  readonly operatorProvidesRealtimeJourney: string;
  readonly originalLine?: string;
  readonly originalRake?: string;
  readonly rake?: string;
  readonly rawCoordinates?: Coordinate;
  readonly rideState?: string;
  readonly state?: string;
  readonly tenant: string; // "sbm" for the Munich S-Bahn
  readonly trainId: string;
  readonly trainNumber?: number;
  readonly transmittingVehicle?: string;
  readonly vehicleNumber?: string;
}
