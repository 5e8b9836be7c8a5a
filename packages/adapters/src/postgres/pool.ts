import pg from 'pg';
import { StoreUnavailableError } from '@campus-shuttle/domain';

const { Pool } = pg;

/** Anything that can run a parameterised query: the pool or a checked-out client. */
export interface Queryable {
  query<R extends pg.QueryResultRow = pg.QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<pg.QueryResult<R>>;
}

let _pool: pg.Pool | null = null;

export function getPool(connectionString: string): pg.Pool {
  if (!_pool) {
    _pool = new Pool({
      connectionString,
      max: 20,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
      application_name: 'campus-shuttle-api',
    });
    _pool.on('error', (err) => {
      console.error('[pg-pool] unexpected error on idle client', err);
    });
  }
  return _pool;
}

export async function closePool(): Promise<void> {
  if (_pool) {
    await _pool.end();
    _pool = null;
  }
}

/**
 * Runs a query and rethrows driver failures as StoreUnavailableError so the
 * API never reports an outage as a business rejection.
 */
export async function runQuery<R extends pg.QueryResultRow>(
  db: Queryable,
  text: string,
  values: unknown[] = [],
): Promise<R[]> {
  try {
    const { rows } = await db.query<R>(text, values);
    return rows;
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new StoreUnavailableError(`store query failed: ${reason}`, { cause: err });
  }
}

/** RETURNING on an INSERT always yields a row; anything else is a driver fault. */
export function firstRow<R>(rows: R[], what: string): R {
  const row = rows[0];
  if (row === undefined) throw new StoreUnavailableError(`${what} returned no row`);
  return row;
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Ids reach the UUID columns straight from the URL; anything else can never match a row. */
export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}
