import pg from 'pg';
import type { DatabaseConfig } from '../config/config.js';
import type { Logger } from '../logging/logger.js';

const { Pool } = pg;

/**
 * Connection pool sized from configuration.
 * Nothing connects until the first query, so startup does not need the database.
 */
export function createPool(db: DatabaseConfig, logger: Logger): pg.Pool {
  const pool = new Pool({
    connectionString: db.addr,
    max: db.maxOpenConns,
    // pg has no cap on idle clients; maxIdleConns is validated and logged only
    idleTimeoutMillis: db.maxIdleTimeMs,
    connectionTimeoutMillis: db.connectTimeoutMs,
  });

  pool.on('connect', () => {
    logger.debug('Database connection established');
  });

  pool.on('error', (err) => {
    logger.error({ err }, 'Idle database client error');
  });

  return pool;
}
