import pg from 'pg';
import type { Pool, QueryResult, QueryResultRow } from 'pg';
import type { AppConfig } from '../../config.js';

export type QueryFn = (text: string, params?: unknown[]) => Promise<QueryResult<QueryResultRow>>;

export function createPool(config: AppConfig['database']): Pool {
  return new pg.Pool({
    connectionString: config.connectionString,
    ssl: config.ssl ? { rejectUnauthorized: false } : false,
  });
}

export function createQuery(pool: Pool): QueryFn {
  return async (text, params) => {
    const client = await pool.connect();
    try {
      return await client.query(text, params);
    } finally {
      client.release();
    }
  };
}

export async function closePool(pool: Pool) {
  await pool.end();
}
