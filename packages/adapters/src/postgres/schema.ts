import { readFileSync } from 'fs';
import { resolve } from 'path';
import type { StoreHealthPort } from '@campus-shuttle/domain';
import { runQuery, type Queryable } from './pool.js';

function readSchemaFile(): string {
  // Repo root from src/; the dist layout falls back to the working directory
  const schemaPath = resolve(__dirname, '../../../../db/postgres/schema.sql');
  try {
    return readFileSync(schemaPath, 'utf-8');
  } catch {
    return readFileSync(resolve(process.cwd(), 'db/postgres/schema.sql'), 'utf-8');
  }
}

/** Applies db/postgres/schema.sql. Every statement is IF NOT EXISTS. */
export async function applySchema(db: Queryable): Promise<void> {
  await runQuery(db, readSchemaFile());
  console.log('[pg-schema] schema applied');
}

export class PgStoreHealth implements StoreHealthPort {
  readonly driver = 'postgres';

  constructor(private readonly db: Queryable) {}

  async ping(): Promise<void> {
    await runQuery(this.db, 'SELECT 1');
  }
}
