// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/cell.js';
export * from './entities/live-aggregate.js';
export * from './entities/baseline.js';
export * from './entities/verdict.js';
export * from './entities/ping.js';
export * from './entities/congestion-event.js';

// ─── Congestion core ──────────────────────────────────────────────────────────
export * from './congestion/bucketing.js';
export * from './congestion/calibration.js';
export * from './congestion/fallback.js';
export * from './congestion/z-score.js';
export * from './congestion/percentile.js';
export * from './congestion/ema.js';
export * from './congestion/area.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/ping-ingestion.port.js';
export * from './ports/inbound/congestion-query.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/ephemeral-store.port.js';
export * from './ports/outbound/baseline-repository.port.js';
export * from './ports/outbound/bucket-history-repository.port.js';
export * from './ports/outbound/congestion-event-publisher.port.js';
export * from './ports/outbound/cell-indexer.port.js';
export * from './ports/outbound/clock.port.js';
