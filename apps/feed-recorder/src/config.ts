import { z } from 'zod';

/**
 * Recorder configuration, read from the environment.
 *
 * Env vars:
 *   API_KEY               : geOps realtime API key (required)
 *   FEED_BASE_URL         : WebSocket endpoint (default: wss://api.geops.io/realtime-ws/v1/)
 *   RAW_LOG_PATH          : NDJSON log to append to (default: s-bahn-munich-live-map.jsonl)
 *   HEARTBEAT_INTERVAL_MS : minimum spacing between PINGs (default: 10000)
 *   RECONNECT_DELAY_MS    : pause before reconnecting (default: 0)
 */
const envSchema = z.object({
  API_KEY: z.string().min(1, 'API_KEY is required'),
  FEED_BASE_URL: z.string().url().default('wss://api.geops.io/realtime-ws/v1/'),
  RAW_LOG_PATH: z.string().min(1).default('s-bahn-munich-live-map.jsonl'),
  HEARTBEAT_INTERVAL_MS: z.coerce.number().int().positive().default(10_000),
  RECONNECT_DELAY_MS: z.coerce.number().int().min(0).default(0),
});

export interface RecorderConfig {
  readonly feedUrl: string;
  readonly rawLogPath: string;
  readonly heartbeatIntervalMs: number;
  readonly reconnectDelayMs: number;
}

export function buildFeedUrl(baseUrl: string, apiKey: string): string {
  const url = new URL(baseUrl);
  url.searchParams.set('key', apiKey);
  return url.toString();
}

export function loadRecorderConfig(env: NodeJS.ProcessEnv = process.env): RecorderConfig {
  const parsed = envSchema.parse(env);
  return {
    feedUrl: buildFeedUrl(parsed.FEED_BASE_URL, parsed.API_KEY),
    rawLogPath: parsed.RAW_LOG_PATH,
    heartbeatIntervalMs: parsed.HEARTBEAT_INTERVAL_MS,
    reconnectDelayMs: parsed.RECONNECT_DELAY_MS,
  };
}
