import type { Coordinate } from '@rail-trace/domain';

export interface GeoBounds {
  readonly minLongitude: number;
  readonly maxLongitude: number;
  readonly minLatitude: number;
  readonly maxLatitude: number;
}

/** Viewport around Munich */
export const MUNICH_BOUNDS: GeoBounds = {
  minLongitude: 11.0,
  maxLongitude: 12.0,
  minLatitude: 47.5,
  maxLatitude: 48.5,
};

/** Linear map of `value` from [aMin, aMax] onto [bMin, bMax]. */
export function mapRange(value: number, aMin: number, aMax: number, bMin: number, bMax: number): number {
  return bMin + ((value - aMin) / (aMax - aMin)) * (bMax - bMin);
}

/** Screen position of a coordinate; the vertical axis is flipped. */
export function projectToScreen(
  position: Coordinate,
  width: number,
  height: number,
  bounds: GeoBounds = MUNICH_BOUNDS,
): { x: number; y: number } {
  return {
    x: mapRange(position.longitude, bounds.minLongitude, bounds.maxLongitude, 0, width),
    y: mapRange(position.latitude, bounds.minLatitude, bounds.maxLatitude, height, 0),
  };
}
