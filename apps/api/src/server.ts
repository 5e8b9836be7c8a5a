import 'dotenv/config';
import { createServer } from 'http';
import { applySchema, closePool, getPool } from '@campus-shuttle/adapters';
import { buildApp } from './app.js';
import { loadConfig } from './config/env.js';
import {
  createMemoryDependencies,
  createPostgresDependencies,
  type ApiDependencies,
} from './container.js';

async function main() {
  const config = loadConfig();

  if (config.usingDevSecret) {
    console.warn('[server] BOARDING_TOKEN_SECRET not set; signing boarding tokens with the development secret');
  }

  let deps: ApiDependencies;
  if (config.store.driver === 'postgres') {
    const pool = getPool(config.store.databaseUrl);
    await pool.query('SELECT 1');
    console.log('[server] database connected');
    await applySchema(pool);
    deps = createPostgresDependencies(pool, { boardingTokenSecret: config.boardingTokenSecret });
  } else {
    console.log('[server] using in-memory store; data is lost on restart');
    deps = createMemoryDependencies({ boardingTokenSecret: config.boardingTokenSecret });
  }

  const app = buildApp(deps, {
    corsOrigin: config.corsOrigin,
    httpLogFormat: config.httpLogFormat,
  });
  const httpServer = createServer(app);

  httpServer.listen(config.port, () => {
    console.log(`[server] listening on http://0.0.0.0:${config.port}`);
  });

  const shutdown = async () => {
    console.log('[server] shutting down...');
    httpServer.close();
    await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[server] shutdown failed', err);
      process.exit(1);
    });
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
