import Pool from 'pg-pool';
import type { Client, PoolClient, QueryResultRow, QueryResult } from 'pg';

let pool: Pool<Client> | null = null;

export interface DbConfig {
  connectionString: string;
  max?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
}

/**
 * Initializes the singleton pool. Call once at startup with values from validated env.
 */
export function initPool(config: DbConfig): Pool<Client> {
  if (!pool) {
    pool = new Pool({
      connectionString: config.connectionString,
      max: config.max ?? 10,
      idleTimeoutMillis: config.idleTimeoutMillis ?? 30_000,
      connectionTimeoutMillis: config.connectionTimeoutMillis ?? 5_000,
    });
  }

  return pool;
}

/**
 * Returns the current pool instance.
 * Throws if the pool has not been initialized via initPool() or setPool().
 */
export function getPool(): Pool<Client> {
  if (!pool) {
    throw new Error('Database pool not initialized. Call initPool() or setPool() first.');
  }
  return pool;
}

/**
 * Runs a query on the shared pool.
 */
export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[],
): Promise<QueryResult<T>> {
  return getPool().query<T>(text, params);
}

/**
 * Runs a query on an explicit client (inside a transaction) or on the shared pool.
 */
export async function exec<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params: unknown[],
  client?: PoolClient,
): Promise<QueryResult<T>> {
  if (client) {
    return client.query<T>(text, params);
  }
  return query<T>(text, params);
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

/**
 * Replaces the pool instance, useful for testing with a mock or custom pool.
 */
export function setPool(customPool: Pool<Client>): void {
  pool = customPool;
}
