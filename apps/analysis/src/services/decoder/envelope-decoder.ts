import type { ZodError, ZodTypeAny, z } from 'zod';
import { DecodeError, fail, ok } from '@rail-trace/domain';
import type { Content, Envelope, Result } from '@rail-trace/domain';
import {
  extraGeomsSchema,
  geoJsonSchema,
  healthCheckSchema,
  newsTickerSchema,
  optionalIdSchema,
  websocketSchema,
  wireEnvelopeSchema,
} from './envelope.schema.js';

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');
}

function parseContent<S extends ZodTypeAny>(source: string, schema: S, raw: unknown): z.output<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw DecodeError.parse(`invalid '${source}' content: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

function decodeContent(source: string, raw: unknown): Content {
  switch (source) {
    case 'trajectory_schematic':
      return { source, content: parseContent(source, geoJsonSchema, raw) };
    case 'trajectory':
      return { source, content: parseContent(source, geoJsonSchema, raw) };
    case 'station_schematic':
      return { source, content: parseContent(source, geoJsonSchema, raw) };
    case 'station':
      return { source, content: parseContent(source, geoJsonSchema, raw) };
    case 'deleted_vehicles_schematic':
      return { source, content: parseContent(source, optionalIdSchema, raw) };
    case 'deleted_vehicles':
      return { source, content: parseContent(source, optionalIdSchema, raw) };
    case 'websocket':
      return { source, content: parseContent(source, websocketSchema, raw) };
    case 'extra_geoms':
      return { source, content: parseContent(source, extraGeomsSchema, raw) };
    case 'healthcheck':
      return { source, content: parseContent(source, healthCheckSchema, raw) };
    case 'sbm_newsticker':
      return { source, content: parseContent(source, newsTickerSchema, raw) };
    default:
      // Unknown topics are kept, not rejected, so upstream additions do not break a scan
      return { source: 'unrecognized', topic: source, content: raw };
  }
}

/**
 * Stage 1: one raw log line to an Envelope. Fails with a `parse` DecodeError
 * on malformed JSON, a malformed envelope, or content that does not match
 * its source.
 */
export function decodeEnvelope(line: string): Result<Envelope, DecodeError> {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (err) {
    return fail(DecodeError.parse(err instanceof Error ? err.message : String(err)));
  }

  const wire = wireEnvelopeSchema.safeParse(json);
  if (!wire.success) return fail(DecodeError.parse(describeIssues(wire.error)));

  try {
    return ok({
      payload: decodeContent(wire.data.source, wire.data.content),
      timestamp: wire.data.timestamp,
      clientReference: wire.data.client_reference ?? null,
    });
  } catch (err) {
    if (err instanceof DecodeError) return fail(err);
    throw err;
  }
}

/** Serialises an Envelope back into its wire shape. */
export function encodeEnvelope(envelope: Envelope): string {
  const { payload } = envelope;
  const source = payload.source === 'unrecognized' ? payload.topic : payload.source;
  return JSON.stringify({
    source,
    content: payload.content,
    timestamp: envelope.timestamp,
    client_reference: envelope.clientReference,
  });
}
