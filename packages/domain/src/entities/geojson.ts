// Minimal GeoJSON model: only what the feed actually sends is typed strictly.

export type GeometryType =
  | 'Point'
  | 'MultiPoint'
  | 'LineString'
  | 'MultiLineString'
  | 'Polygon'
  | 'MultiPolygon'
  | 'GeometryCollection';

export interface Geometry {
  readonly type: GeometryType;
  readonly coordinates?: unknown;
  readonly geometries?: readonly unknown[];
}

export type FeatureProperties = Readonly<Record<string, unknown>>;

export interface GeoFeature {
  readonly type: 'Feature';
  readonly id?: string | number;
  readonly geometry: Geometry | null;
  readonly properties: FeatureProperties | null;
}

export interface GeoFeatureCollection {
  readonly type: 'FeatureCollection';
  readonly features: readonly GeoFeature[];
}

export type GeoJson = GeoFeature | GeoFeatureCollection | Geometry;

export function isGeoFeature(value: GeoJson): value is GeoFeature {
  return value.type === 'Feature';
}
