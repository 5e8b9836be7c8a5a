// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/stop.js';
export * from './entities/route.js';
export * from './entities/shuttle.js';
export * from './entities/booking.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors/booking-error.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/booking-command.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/stop-repository.port.js';
export * from './ports/outbound/route-repository.port.js';
export * from './ports/outbound/shuttle-repository.port.js';
export * from './ports/outbound/booking-repository.port.js';
export * from './ports/outbound/boarding-token-signer.port.js';
export * from './ports/outbound/clock.port.js';
export * from './ports/outbound/store-health.port.js';
