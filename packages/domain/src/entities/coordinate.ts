export interface Coordinate {
  readonly latitude: number;
  readonly longitude: number;
}
