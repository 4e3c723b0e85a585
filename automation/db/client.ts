/**
 * Database client: thin wrapper around node-postgres (pg).
 *
 * Reads DATABASE_URL from environment (or .env).
 * Exports a lazily created pool and typed query helpers.
 */

import pg from 'pg';

const { Pool } = pg;

/** What the persistence code needs from a connection; `query` satisfies it. */
export type QueryFn = (
  text: string,
  params?: unknown[]
) => Promise<{ rows: pg.QueryResultRow[] }>;

// ---------------------------------------------------------------------------
// Pool
// ---------------------------------------------------------------------------

let pool: pg.Pool | null = null;

function getPool(): pg.Pool {
  if (!pool) {
    const connectionString = process.env.DATABASE_URL;
    if (!connectionString) {
      throw new Error(
        'DATABASE_URL is not set. Add it to .env or export it before running.'
      );
    }

    pool = new Pool({
      connectionString,
      // Hosted Postgres providers generally require SSL
      ssl: /sslmode=require/.test(connectionString)
        ? { rejectUnauthorized: false }
        : undefined,
      max: 2,
      idleTimeoutMillis: 30_000,
    });
  }
  return pool;
}

// ---------------------------------------------------------------------------
// Query helpers
// ---------------------------------------------------------------------------

/** Run a parameterised query and return the full result. */
export async function query<T extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<pg.QueryResult<T>> {
  return getPool().query<T>(text, params);
}

// ---------------------------------------------------------------------------
// Connection lifecycle
// ---------------------------------------------------------------------------

/** Shut down the pool (call on process exit). */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
