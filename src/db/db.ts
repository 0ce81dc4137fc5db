import { Pool } from 'pg';
import { moduleLogger } from '../lib/logger';

const log = moduleLogger('db');

/** The slice of a pg pool the services use. Rows come back unchecked; callers validate them. */
export interface Database {
  query(text: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
  close(): Promise<void>;
}

export function createDatabase(connectionString: string): Database {
  const pool = new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000
  });

  pool.on('error', (err: Error) => {
    log.error({ err: err.message }, 'Unexpected PG client error');
  });

  return {
    query: async (text, params) => {
      const result = await pool.query(text, params);
      return { rows: result.rows };
    },
    close: () => pool.end()
  };
}
