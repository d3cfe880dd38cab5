// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/geojson.js';
export * from './entities/envelope.js';
export * from './entities/coordinate.js';
export * from './entities/line.js';
export * from './entities/color.js';
export * from './entities/train.js';
export * from './entities/position-record.js';
export * from './entities/vehicle.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors/decode-error.js';
export * from './errors/color-conversion-error.js';
export * from './errors/feed-errors.js';
export * from './result.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/replay-control.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/raw-log.port.js';
export * from './ports/outbound/feed-connector.port.js';
export * from './ports/outbound/draw-surface.port.js';
export * from './ports/outbound/clock.port.js';
