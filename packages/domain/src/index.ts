// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/location.js';
export * from './entities/impact-pattern.js';
export * from './entities/hit.js';
export * from './entities/client-message.js';
export * from './entities/hit-record.js';
export * from './entities/device-activity.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/hit-ingestion.port.js';
export * from './ports/inbound/pothole-query.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/hit-queue.port.js';
export * from './ports/outbound/hit-storage.port.js';
export * from './ports/outbound/clock.port.js';
