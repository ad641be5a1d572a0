/**
 * PostgreSQL connection (node-postgres pool + drizzle).
 *
 * Lazy singleton: the pool is not created until first access, so importing
 * modules that depend on the database does not open connections.
 */

import { drizzle } from 'drizzle-orm/node-postgres';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import { appConfig } from '../config.js';
import * as schema from './schema.js';

export type Database = NodePgDatabase<typeof schema>;

let _pool: pg.Pool | null = null;
let _db: Database | null = null;

export function getDb(): Database {
  if (!_db) {
    _pool = new pg.Pool({
      connectionString: appConfig.database.url,
      max: appConfig.database.poolMax,
    });
    _pool.on('error', (err) => {
      console.error('[db] Idle client error:', err.message);
    });
    _db = drizzle(_pool, { schema });
  }
  return _db;
}

/** Close the pool. Called during graceful shutdown. */
export async function closeDb(): Promise<void> {
  if (_pool) {
    await _pool.end();
    _pool = null;
    _db = null;
  }
}
