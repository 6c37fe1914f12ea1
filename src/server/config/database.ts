import { MongoClient, Db, type MongoClientOptions } from 'mongodb';

// Re-export Db type for use in other modules
export type { Db };
import { logger } from '../utils/logger.js';
import { retryWithBackoff } from '../utils/retry.js';
import { withTimeout } from '../utils/withTimeout.js';
import { getEnv } from './env.js';

let client: MongoClient | null = null;
let db: Db | null = null;
let isConnected = false;

/**
 * Mask credentials before a URI reaches the logs
 */
function redactUri(uri: string): string {
  return uri.replace(/\/\/([^:/@]+):([^@]+)@/, '//$1:****@');
}

async function connectWithRetry(): Promise<Db> {
  const env = getEnv();
  const clientOptions: MongoClientOptions = {
    maxPoolSize: env.DB_MAX_POOL_SIZE,
    connectTimeoutMS: env.DB_CONNECT_TIMEOUT_MS,
    serverSelectionTimeoutMS: env.DB_SERVER_SELECTION_TIMEOUT_MS,
    writeConcern: { w: 'majority' },
  };

  return retryWithBackoff(
    async () => {
      const candidate = new MongoClient(env.MONGODB_URI, clientOptions);
      try {
        await candidate.connect();
        const database = candidate.db(env.DB_NAME);
        await database.command({ ping: 1 });

        candidate.on('serverHeartbeatFailed', () => {
          if (isConnected) {
            logger.warn('MongoDB heartbeat failed, connection marked as lost');
          }
          isConnected = false;
        });
        candidate.on('serverHeartbeatSucceeded', () => {
          isConnected = true;
        });

        client = candidate;
        isConnected = true;
        logger.info({ uri: redactUri(env.MONGODB_URI), database: env.DB_NAME }, 'Connected to MongoDB');
        return database;
      } catch (error) {
        await candidate.close().catch(closeError => {
          logger.debug({ error: closeError }, 'Failed to close MongoDB client after failed connect');
        });
        throw error;
      }
    },
    { maxAttempts: 5, initialDelay: 1000, maxDelay: 10000 },
    'MongoDB connect'
  );
}

export async function connectDB(): Promise<Db> {
  if (db) {
    return db;
  }
  db = await connectWithRetry();
  return db;
}

/**
 * Get database instance
 *
 * @throws {Error} If database is not initialized. Call connectDB() first.
 */
export function getDB(): Db {
  if (!db) {
    throw new Error('Database not initialized. Call connectDB() first.');
  }
  return db;
}

export async function closeDB(): Promise<void> {
  try {
    if (client) {
      await client.close();
    }
    logger.info('MongoDB connection closed');
  } catch (error) {
    logger.error({ error }, 'Error closing MongoDB connection');
    throw error;
  } finally {
    client = null;
    db = null;
    isConnected = false;
  }
}

/**
 * Check database health by performing a ping
 * Uses a timeout to prevent hanging when the connection pool is exhausted
 */
export async function checkDatabaseHealth(
  timeoutMs: number = 5000
): Promise<{ healthy: boolean; latency?: number; error?: string }> {
  if (!db) {
    return { healthy: false, error: 'Database not initialized' };
  }

  const startTime = Date.now();
  try {
    await withTimeout(db.command({ ping: 1 }), timeoutMs, 'MongoDB ping');
    return { healthy: true, latency: Date.now() - startTime };
  } catch (error) {
    return {
      healthy: false,
      latency: Date.now() - startTime,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}
