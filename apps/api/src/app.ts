import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';

import type { ApiDependencies } from './container.js';
import { createStopsRouter } from './controllers/stops.controller.js';
import { createRoutesRouter } from './controllers/routes.controller.js';
import { createShuttlesRouter } from './controllers/shuttles.controller.js';
import { createBookingsRouter } from './controllers/bookings.controller.js';
import { errorHandler } from './middleware/error-handler.js';

export interface AppOptions {
  corsOrigin?: string;
  /** morgan format; 'off' disables request logging. */
  httpLogFormat?: string;
}

export function buildApp(deps: ApiDependencies, opts: AppOptions = {}): ReturnType<typeof express> {
  const app = express();
  const logFormat = opts.httpLogFormat ?? 'combined';

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: opts.corsOrigin ?? '*' }));
  if (logFormat !== 'off') app.use(morgan(logFormat));
  app.use(express.json({ limit: '100kb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/stops', createStopsRouter(deps));
  app.use('/api/routes', createRoutesRouter(deps));
  app.use('/api/shuttles', createShuttlesRouter(deps));
  app.use('/api/bookings', createBookingsRouter(deps));

  app.get('/', (_req, res) => {
    res.json({ message: 'Campus shuttle API running' });
  });

  app.get('/healthz', async (_req, res) => {
    const ts = new Date().toISOString();
    try {
      await deps.storeHealth.ping();
      res.json({ status: 'ok', ts, store: deps.storeHealth.driver });
    } catch (err) {
      console.warn('[api] health check: store ping failed', err);
      res.status(503).json({ status: 'degraded', ts, store: deps.storeHealth.driver });
    }
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
