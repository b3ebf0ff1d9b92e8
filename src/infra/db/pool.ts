import pg from 'pg';
import type { DatabaseConfig } from '../config.js';
import { errorMeta, type Logger } from '../logger.js';

const { Pool } = pg;

/**
 * Build the connection pool. Nothing connects until the first query, so the
 * pool can be created even when the database is not up yet.
 */
export function createPool(config: DatabaseConfig, logger: Logger): pg.Pool {
  const connection: pg.PoolConfig = config.connectionString
    ? { connectionString: config.connectionString }
    : {
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database: config.database,
        ssl: config.sslMode === 'disable' ? false : { rejectUnauthorized: config.sslMode === 'verify-full' },
      };

  const pool = new Pool({
    ...connection,
    options: `-c TimeZone=${config.timezone}`,
    statement_timeout: config.statementTimeoutMs > 0 ? config.statementTimeoutMs : undefined,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('connect', () => {
    logger.debug('Database connection established');
  });

  pool.on('error', (err) => {
    logger.error('Unexpected database error', errorMeta(err));
  });

  return pool;
}

/**
 * Cheap liveness query used by the readiness probe.
 */
export async function pingDatabase(pool: pg.Pool): Promise<void> {
  await pool.query('SELECT 1');
}
