import { readFile } from 'node:fs/promises';
import pg from 'pg';
import type { DatabaseConfig } from './config/database.js';
import { logger } from './logger.js';

const SCHEMA_FILE = new URL('../../db/schema.sql', import.meta.url);

/**
 * Create the connection pool. Idle-client errors are logged rather than
 * crashing the process; the next checkout gets a fresh connection.
 */
export function createPool(config: DatabaseConfig): pg.Pool {
  const pool = new pg.Pool({
    connectionString: config.connectionString,
    max: config.poolMax,
  });

  pool.on('error', (err: Error) => {
    logger.error({ err }, 'Idle database client error');
  });

  return pool;
}

/**
 * Apply db/schema.sql. Safe to run on every start-up.
 */
export async function ensureSchema(pool: pg.Pool): Promise<void> {
  const sql = await readFile(SCHEMA_FILE, 'utf8');
  await pool.query(sql);
  logger.info('Database schema is up to date');
}
