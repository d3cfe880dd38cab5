import { z } from 'zod';

// ─── GeoJSON ──────────────────────────────────────────────────────────────────

const geometrySchema = z.object({
  type: z.enum([
    'Point',
    'MultiPoint',
    'LineString',
    'MultiLineString',
    'Polygon',
    'MultiPolygon',
    'GeometryCollection',
  ]),
  coordinates: z.unknown().optional(),
  geometries: z.array(z.unknown()).optional(),
});

const featureSchema = z.object({
  type: z.literal('Feature'),
  id: z.union([z.string(), z.number()]).optional(),
  geometry: geometrySchema.nullable().default(null),
  properties: z.record(z.unknown()).nullable().default(null),
});

const featureCollectionSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(featureSchema),
});

export const geoJsonSchema = z.union([featureSchema, featureCollectionSchema, geometrySchema]);

// ─── Other topics ─────────────────────────────────────────────────────────────

/** Topics whose content is an optional vehicle/geometry id. */
export const optionalIdSchema = z.string().nullable().default(null);

export const websocketSchema = z.union([z.object({ status: z.string() }), z.string()]);

export const extraGeomsSchema = z
  .object({
    type: z.string(),
    properties: z.object({ ref: z.string() }),
  })
  .nullable()
  .default(null);

export const healthCheckSchema = z.object({
  service: z.string(),
  healthy: z.boolean(),
  tenant: z.string().nullable().optional(),
});

export const newsTickerSchema = z.object({
  incident_program: z.boolean().nullable().optional(),
  messages: z.array(
    z.object({
      title: z.string(),
      lines: z.array(z.string()),
      content: z.string(),
      updated: z.string(),
    }),
  ),
});

// ─── Envelope ─────────────────────────────────────────────────────────────────

export const wireEnvelopeSchema = z.object({
  source: z.string(),
  content: z.unknown(),
  timestamp: z.number(),
  client_reference: z.number().int().min(-128).max(127).nullish(),
});
