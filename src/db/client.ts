import { Pool, type QueryResult, type QueryResultRow } from 'pg';
import { logger } from '../utils/logger';

export interface PoolOptions {
  databaseUrl: string;
  /** false disables TLS; managed databases need it on */
  ssl: boolean;
}

/**
 * The part of `pg.PoolClient` the repositories use
 */
export interface SqlClient {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<QueryResult<R>>;
}

export interface SqlPoolClient extends SqlClient {
  release(err?: Error | boolean): void;
}

/**
 * The part of `pg.Pool` the repositories use
 */
export interface SqlPool extends SqlClient {
  connect(): Promise<SqlPoolClient>;
}

function cleanConnectionString(databaseUrl: string): string {
  // Managed DBs often append sslmode=require, which would override the explicit ssl option
  try {
    const url = new URL(databaseUrl);
    const sslParams = ['sslmode', 'ssl', 'sslcert', 'sslkey', 'sslrootcert', 'sslcrl'];
    sslParams.forEach(param => url.searchParams.delete(param));
    return url.toString();
  } catch {
    // Non-URL connection strings are passed through untouched
    return databaseUrl;
  }
}

export function createPool(options: PoolOptions): Pool {
  const pool = new Pool({
    connectionString: cleanConnectionString(options.databaseUrl),
    // rejectUnauthorized: false allows the self-signed certificates of Neon, Supabase, etc.
    ssl: options.ssl ? { rejectUnauthorized: false } : false,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

  pool.on('error', (err) => {
    logger.error('Unexpected error on idle database client', err);
  });

  return pool;
}

export async function closePool(pool: Pool): Promise<void> {
  await pool.end();
}
