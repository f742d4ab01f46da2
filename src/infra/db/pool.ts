import pg from 'pg';
import { config } from '../config.js';

const { Pool } = pg;

/**
 * Create a connection pool with the service's logging attached.
 */
export function createPool(connectionString: string | undefined): pg.Pool {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('connect', () => {
    console.log('Database connection established');
  });

  pool.on('error', (err) => {
    console.error('Unexpected database error:', err);
  });

  return pool;
}

// Do not throw at import time - allow tests to load without DATABASE_URL
// The pool will fail when actually used if DATABASE_URL is missing
export const pool = createPool(config.DATABASE_URL);
