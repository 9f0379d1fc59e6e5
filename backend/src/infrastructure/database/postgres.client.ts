/**
 * node-postgres pool
 * Source of truth for users, posts and comments
 */

import pg from 'pg';
import type { QueryResultRow } from 'pg';
import type { Config } from '../../config/index.js';
import { StoreQueryFailedError } from '../../application/errors.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('postgres-client');

const SLOW_QUERY_MS = 100;

export type PgPool = pg.Pool;

export function createPgPool(config: Config): PgPool {
  const pool = new pg.Pool({
    connectionString: config.postgres.url,
    max: config.postgres.poolSize,
    connectionTimeoutMillis: 10000,
    idleTimeoutMillis: 30000,
  });

  pool.on('error', (error: Error) => {
    logger.error({ message: error.message }, 'PostgreSQL idle client error');
  });

  return pool;
}

export async function closePgPool(pool: PgPool): Promise<void> {
  await pool.end();
  logger.info('PostgreSQL closed');
}

/**
 * Runs a parameterized query. Driver errors surface as StoreQueryFailedError.
 */
export async function runQuery<R extends QueryResultRow>(
  pool: PgPool,
  operation: string,
  text: string,
  values: readonly unknown[] = []
): Promise<R[]> {
  const startedAt = Date.now();
  try {
    const result = await pool.query<R>(text, [...values]);
    const duration = Date.now() - startedAt;
    if (process.env['NODE_ENV'] !== 'production' && duration > SLOW_QUERY_MS) {
      logger.warn({ operation, query: text.substring(0, 100), duration }, 'Slow query');
    }
    return result.rows;
  } catch (error) {
    logger.error({
      operation,
      error: error instanceof Error ? error.message : String(error),
    }, 'Query failed');
    throw new StoreQueryFailedError(operation, error);
  }
}
