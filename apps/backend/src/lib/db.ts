// Shared Postgres pool for the worker scripts.
// - One pool per process
// - Cancels long-running statements server-side

import { Pool, type QueryResult, type QueryResultRow } from 'pg';
import { readNumberEnv } from './load-env';

let sharedPool: Pool | null = null;

export function getPool(): Pool {
  if (sharedPool) return sharedPool;

  const pool = new Pool({
    connectionString: process.env.DATABASE_URL,
    max: readNumberEnv('PGPOOL_MAX', 10, 1),
    idleTimeoutMillis: readNumberEnv('PG_IDLE_TIMEOUT_MS', 30_000),
    connectionTimeoutMillis: readNumberEnv('PG_ACQUIRE_TIMEOUT_MS', 8_000),
    keepAlive: true,
    allowExitOnIdle: true,
  });

  pool.on('connect', (client) => {
    // Runs wrap a whole discovery pass in one transaction, so only statements are capped.
    client.query('SET statement_timeout = 20000').catch((error: unknown) => {
      console.error('[db] failed to set statement_timeout', error);
    });
  });

  pool.on('error', (err) => {
    // The pool replaces the client on demand
    console.error('[db] idle client error', err);
  });

  sharedPool = pool;
  return pool;
}

export async function closePool(): Promise<void> {
  if (!sharedPool) return;
  const pool = sharedPool;
  sharedPool = null;
  await pool.end();
}

// Narrow client surface used by sessions (a checked-out PoolClient satisfies it)
export type PgClientLike = {
  query<T extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<T>>;
  release(): void;
};

/**
 * Query through a client, logging slow statements.
 */
export async function timedQuery<T extends QueryResultRow>(
  client: Pick<PgClientLike, 'query'>,
  text: string,
  values: unknown[] = [],
  label?: string
): Promise<QueryResult<T>> {
  const t0 = Date.now();
  try {
    const res = await client.query<T>(text, values);
    const ms = Date.now() - t0;
    if (ms > 500) {
      console.log(`[db] slow ${ms}ms ${label ?? text.slice(0, 60).replace(/\s+/g, ' ')}…`);
    }
    return res;
  } catch (err) {
    console.error('[db] error', { label: label ?? text.slice(0, 60).replace(/\s+/g, ' ') });
    throw err;
  }
}
