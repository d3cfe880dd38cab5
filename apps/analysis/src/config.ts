import { z } from 'zod';

/**
 * Analysis configuration, read from the environment.
 *
 * Env vars:
 *   RAW_LOG_PATH       : NDJSON log to replay (default: s-bahn-munich-live-map.jsonl)
 *   PORT               : HTTP/WebSocket port (default: 3002)
 *   REPLAY_TICK_MS     : delay between replay frames (default: 20)
 *   REPLAY_FRAME_BOUND : fixed wrap bound; derived from the longest timeline when unset
 *   SURFACE_WIDTH      : virtual draw surface width (default: 1280)
 *   SURFACE_HEIGHT     : virtual draw surface height (default: 720)
 *   CORS_ORIGIN        : allowed origin (default: *)
 */
const envSchema = z.object({
  RAW_LOG_PATH: z.string().min(1).default('s-bahn-munich-live-map.jsonl'),
  PORT: z.coerce.number().int().min(0).max(65_535).default(3002),
  REPLAY_TICK_MS: z.coerce.number().int().positive().default(20),
  REPLAY_FRAME_BOUND: z.coerce.number().int().positive().optional(),
  SURFACE_WIDTH: z.coerce.number().int().positive().default(1280),
  SURFACE_HEIGHT: z.coerce.number().int().positive().default(720),
  CORS_ORIGIN: z.string().default('*'),
});

export interface AnalysisConfig {
  readonly rawLogPath: string;
  readonly port: number;
  readonly tickIntervalMs: number;
  readonly frameBound?: number;
  readonly surface: { readonly width: number; readonly height: number };
  readonly corsOrigin: string;
}

export function loadAnalysisConfig(env: NodeJS.ProcessEnv = process.env): AnalysisConfig {
  const parsed = envSchema.parse(env);
  return {
    rawLogPath: parsed.RAW_LOG_PATH,
    port: parsed.PORT,
    tickIntervalMs: parsed.REPLAY_TICK_MS,
    frameBound: parsed.REPLAY_FRAME_BOUND,
    surface: { width: parsed.SURFACE_WIDTH, height: parsed.SURFACE_HEIGHT },
    corsOrigin: parsed.CORS_ORIGIN,
  };
}
