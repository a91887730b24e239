import pg from 'pg';
import { drizzle, type NodePgDatabase, type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import * as schema from './schema.js';

export type Database = NodePgDatabase<typeof schema>;

/**
 * A database handle or an open transaction
 */
export type DatabaseExecutor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

export interface DatabaseOptions {
  url: string;
  statementTimeoutMs: number;
}

let pool: pg.Pool | null = null;
let db: Database | null = null;

/**
 * Initialize the connection pool and drizzle client
 */
export function initializeDatabase(options: DatabaseOptions): Database {
  if (db) {
    return db;
  }

  pool = new pg.Pool({
    connectionString: options.url,
    statement_timeout: options.statementTimeoutMs,
  });
  db = drizzle(pool, { schema });

  return db;
}

/**
 * Close the connection pool
 */
export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    db = null;
  }
}
