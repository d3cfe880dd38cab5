// ─── Raw Log (JSONL) ──────────────────────────────────────────────────────────
export { JsonlRawLogWriter, JsonlRawLogReader } from './jsonl/jsonl-raw-log.js';

// ─── Feed Transport (WebSocket) ───────────────────────────────────────────────
export { WsFeedConnector } from './ws/ws-feed-connector.js';

// ─── Clock ────────────────────────────────────────────────────────────────────
export { DeterministicClock, systemClock } from './clock/deterministic-clock.js';
