import pg from 'pg';
import type { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { pino } from 'pino';
import { HistoryError, PersistenceUnavailableError } from '../errors.js';
import type { DatabaseConfig } from '../types/index.js';

const logger = pino({ name: 'price-history-db', level: process.env.LOG_LEVEL ?? 'info' });

const SLOW_QUERY_MS = 1000;

export function createPool(config: DatabaseConfig): Pool {
  const ssl = config.ssl ?? (config.connectionString.includes('sslmode=require')
    ? { rejectUnauthorized: false }
    : false);

  const pool = new pg.Pool({
    connectionString: config.connectionString,
    ssl,
    max: config.max ?? 4,
    idleTimeoutMillis: config.idleTimeoutMillis ?? 30000,
    connectionTimeoutMillis: config.connectionTimeoutMillis ?? 5000,
  });

  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected database pool error');
  });

  return pool;
}

/**
 * Run one statement, logging slow queries.
 */
export async function query<T extends QueryResultRow = QueryResultRow>(
  client: PoolClient,
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  const start = Date.now();

  try {
    const result = await client.query<T>(text, params);
    const duration = Date.now() - start;

    if (duration > SLOW_QUERY_MS) {
      logger.warn({ duration, query: text.slice(0, 100) }, 'Slow query detected');
    }

    return result;
  } catch (error) {
    logger.error({ err: error, query: text.slice(0, 100) }, 'Query error');
    throw error;
  }
}

/**
 * Check out a client, run `fn` between BEGIN and COMMIT, and release the
 * client on every path. Driver failures surface as PersistenceUnavailableError;
 * store-level errors thrown by `fn` pass through after the rollback.
 */
export async function withTransaction<T>(
  pool: Pool,
  operation: string,
  fn: (client: PoolClient) => Promise<T>
): Promise<T> {
  let client: PoolClient;
  try {
    client = await pool.connect();
  } catch (error) {
    throw new PersistenceUnavailableError(operation, { cause: error });
  }

  let releaseError: Error | undefined;
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      logger.error({ err: rollbackError, operation }, 'Rollback failed, discarding connection');
      releaseError = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
    }
    if (error instanceof HistoryError) {
      throw error;
    }
    throw new PersistenceUnavailableError(operation, { cause: error });
  } finally {
    client.release(releaseError);
  }
}

export async function closePool(pool: Pool): Promise<void> {
  await pool.end();
  logger.debug('Database pool closed');
}
