/**
 * PostgreSQL Connection Configuration
 *
 * Manages the connection pool for pgvector similarity queries over regulatory
 * document chunks.
 */

import { Pool, type PoolConfig, type QueryResultRow } from 'pg';
import { validateEnv } from './env.js';
import { logger } from '../utils/logger.js';
import { retryWithBackoff } from '../utils/retry.js';
import { withTimeout } from '../utils/withTimeout.js';

let pool: Pool | null = null;

/**
 * Get PostgreSQL connection pool
 *
 * Creates a singleton pool instance if it doesn't exist.
 */
export function getPostgresPool(): Pool {
  if (pool) {
    return pool;
  }

  const env = validateEnv();

  const config: PoolConfig = {
    host: env.POSTGRES_HOST,
    port: env.POSTGRES_PORT,
    database: env.POSTGRES_DB,
    user: env.POSTGRES_USER,
    password: env.POSTGRES_PASSWORD,
    max: env.POSTGRES_POOL_MAX,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
    keepAlive: true,
  };

  const created = new Pool(config);

  created.on('error', err => {
    logger.error({ error: err }, 'Unexpected error on idle PostgreSQL client');
  });

  created.on('connect', () => {
    logger.debug('PostgreSQL client connected to pool');
  });

  logger.info(
    { host: config.host, port: config.port, database: config.database, user: config.user },
    'PostgreSQL connection pool created'
  );

  pool = created;
  return created;
}

/**
 * Close PostgreSQL connection pool
 *
 * Should be called during application shutdown.
 */
export async function closePostgresPool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info('PostgreSQL connection pool closed');
  }
}

const RETRYABLE_POSTGRES_CODES = new Set([
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  '57P01', // Admin shutdown
  '57P02', // Crash shutdown
  '57P03', // Cannot connect now
  '08003', // Connection does not exist
  '08006', // Connection failure
  '08001', // Unable to establish connection
]);

/**
 * Check if a PostgreSQL error is retryable (transient connection error)
 */
export function isRetryablePostgresError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  const code: unknown = Reflect.get(error, 'code');
  if (typeof code === 'string' && RETRYABLE_POSTGRES_CODES.has(code)) {
    return true;
  }

  const message = error.message.toLowerCase();
  return ['connection terminated', 'timeout', 'econnreset', 'socket', 'not connected'].some(pattern =>
    message.includes(pattern)
  );
}

/**
 * Execute a query, retrying transient connection failures
 */
export async function queryPostgres<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<T[]> {
  const activePool = getPostgresPool();

  return retryWithBackoff(
    async () => {
      try {
        const result = await activePool.query<T>(text, params);
        return result.rows;
      } catch (error) {
        const code: unknown = error instanceof Error ? Reflect.get(error, 'code') : undefined;
        if (code === '28P01') {
          logger.error({ code }, 'PostgreSQL authentication failed. Check POSTGRES_USER and POSTGRES_PASSWORD.');
        } else if (code === '3D000') {
          logger.error({ code, database: validateEnv().POSTGRES_DB }, 'PostgreSQL database does not exist');
        }
        throw error;
      }
    },
    {
      maxAttempts: 2,
      initialDelay: 1000,
      maxDelay: 10000,
      isRetryable: isRetryablePostgresError,
    },
    `PostgreSQL query: ${text.substring(0, 50)}${text.length > 50 ? '...' : ''}`
  );
}

/**
 * Check PostgreSQL connection health by performing a ping
 */
export async function checkPostgresHealth(
  timeoutMs: number = 5000
): Promise<{ healthy: boolean; latency?: number; error?: string }> {
  if (!pool) {
    return { healthy: false, error: 'PostgreSQL pool not initialized' };
  }

  const startTime = Date.now();
  try {
    await withTimeout(pool.query('SELECT 1'), timeoutMs, 'PostgreSQL health check');
    return { healthy: true, latency: Date.now() - startTime };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.warn({ error: errorMessage }, 'PostgreSQL health check failed');
    return { healthy: false, error: errorMessage, latency: Date.now() - startTime };
  }
}
