import type { GeoJson } from './geojson.js';

/** Topics the recorder subscribes to, in subscription order. */
export const FEED_TOPICS = [
  'extra_geoms',
  'healthcheck',
  'sbm_newsticker',
  'station_schematic',
  'deleted_vehicles_schematic',
  'trajectory_schematic',
  'station',
  'deleted_vehicles',
  'trajectory',
] as const;

export type FeedTopic = (typeof FEED_TOPICS)[number];

export type WebsocketStatus = { readonly status: string } | string;

export interface HealthCheck {
  readonly service: string;
  readonly healthy: boolean;
  readonly tenant?: string | null;
}

export interface ExtraGeoms {
  readonly type: string;
  readonly properties: { readonly ref: string };
}

export interface NewsTickerMessage {
  readonly title: string;
  readonly lines: readonly string[];
  readonly content: string;
  readonly updated: string;
}

export interface NewsTicker {
  readonly incident_program?: boolean | null;
  readonly messages: readonly NewsTickerMessage[];
}

export type Content =
  | { readonly source: 'trajectory_schematic'; readonly content: GeoJson }
  | { readonly source: 'trajectory'; readonly content: GeoJson }
  | { readonly source: 'station_schematic'; readonly content: GeoJson }
  | { readonly source: 'station'; readonly content: GeoJson }
  | { readonly source: 'deleted_vehicles_schematic'; readonly content: string | null }
  | { readonly source: 'deleted_vehicles'; readonly content: string | null }
  | { readonly source: 'websocket'; readonly content: WebsocketStatus }
  | { readonly source: 'extra_geoms'; readonly content: ExtraGeoms | null }
  | { readonly source: 'healthcheck'; readonly content: HealthCheck }
  | { readonly source: 'sbm_newsticker'; readonly content: NewsTicker }
  | { readonly source: 'unrecognized'; readonly topic: string; readonly content: unknown };

/** One decoded feed message. */
export interface Envelope {
  readonly payload: Content;
  /** Epoch milliseconds; may carry a fractional part. */
  readonly timestamp: number;
  readonly clientReference: number | null;
}
