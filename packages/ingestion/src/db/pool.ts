import pg from 'pg';
import type { Logger } from '../logger.js';

export type Pool = pg.Pool;

export function createPool(databaseUrl: string, maxConnections: number, logger: Logger): Pool {
  const pool = new pg.Pool({
    connectionString: databaseUrl,
    max: maxConnections,
  });

  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected pool error');
  });

  return pool;
}
