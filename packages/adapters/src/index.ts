// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export { getPool, closePool, runQuery, type Queryable } from './postgres/pool.js';
export { applySchema, PgStoreHealth } from './postgres/schema.js';
export { PgStopRepository } from './postgres/stop.repository.js';
export { PgRouteRepository } from './postgres/route.repository.js';
export { PgShuttleRepository } from './postgres/shuttle.repository.js';
export { PgBookingRepository } from './postgres/booking.repository.js';

// ─── In-memory Adapters ───────────────────────────────────────────────────────
export { InMemoryStore } from './memory/in-memory-store.js';
export { InMemoryStopRepository } from './memory/stop.repository.js';
export { InMemoryRouteRepository } from './memory/route.repository.js';
export { InMemoryShuttleRepository } from './memory/shuttle.repository.js';
export { InMemoryBookingRepository } from './memory/booking.repository.js';

// ─── Boarding tokens ──────────────────────────────────────────────────────────
export { HmacBoardingTokenSigner, boardingMessage } from './crypto/hmac-boarding-token-signer.js';

// ─── Clock ────────────────────────────────────────────────────────────────────
export { SystemClock, FixedClock } from './clock/clock.js';
