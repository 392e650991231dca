// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/track-point.js';
export * from './entities/photo-record.js';
export * from './entities/photo-metadata.js';

// ─── Services ─────────────────────────────────────────────────────────────────
export * from './services/interpolator.js';
export * from './services/batch-matcher.js';
export * from './services/photo-status.js';
export * from './services/track-points.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/geotag-usecase.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/track-log-reader.port.js';
export * from './ports/outbound/photo-metadata.port.js';
export * from './ports/outbound/photo-library.port.js';
