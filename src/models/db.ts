/**
 * Database Configuration
 *
 * One connection pool per process. Every request borrows a single client
 * through `withTransaction`, runs all of its statements on it inside
 * BEGIN/COMMIT, and gives it back, whatever happens.
 */

import fs from 'fs';
import path from 'path';
import { Pool, PoolConfig, QueryResult, types } from 'pg';
import dotenv from 'dotenv';
import { logDebug, logInfo, logSystemError } from '../utils/logger.utils';

dotenv.config();

// DATE (1082) and TIMESTAMP without time zone (1114) stay as the strings
// Postgres sends; otherwise pg shifts them through the local time zone.
types.setTypeParser(1082, (value: string) => value);
types.setTypeParser(1114, (value: string) => value);

const dbConfig: PoolConfig = {
  host: process.env.DB_HOST || 'localhost',
  port: parseInt(process.env.DB_PORT || '5432', 10),
  database: process.env.DB_NAME || 'clinic_records',
  user: process.env.DB_USER || 'postgres',
  password: process.env.DB_PASSWORD,

  max: 20,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 2000,
};

// Lazy: nothing connects until the first query
const pool = new Pool(dbConfig);

pool.on('error', (err) => {
  logSystemError('db.pool_error', 'Unexpected database pool error', err);
});

/**
 * Anything statements can run on: a pool client inside a transaction
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryResult>;
}

export interface TransactionClient extends Queryable {
  release(err?: Error | boolean): void;
}

export interface ClientSource {
  connect(): Promise<TransactionClient>;
}

/**
 * Execute a parameterized query
 * @param text - SQL with $1, $2... placeholders (never concatenate input!)
 */
export async function query<T>(
  db: Queryable,
  text: string,
  params?: unknown[]
): Promise<{ rows: T[]; rowCount: number }> {
  const start = Date.now();
  const result = await db.query(text, params);
  const duration = Date.now() - start;

  if (duration > 100) {
    logDebug('db.slow_query', 'Slow query', undefined, { duration: `${duration}ms`, rows: result.rowCount });
  }

  return { rows: result.rows, rowCount: result.rowCount ?? 0 };
}

/**
 * Run `work` inside one transaction on one client.
 * Commits when it resolves, rolls back when it throws, always releases.
 */
export async function withTransaction<T>(
  work: (tx: Queryable) => Promise<T>,
  source: ClientSource = pool
): Promise<T> {
  const client = await source.connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    client.release();
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
      client.release();
    } catch (rollbackError) {
      logSystemError('db.rollback_failed', 'Rollback failed, discarding client', rollbackError);
      client.release(true);
    }
    throw error;
  }
}

/**
 * Apply database/schema.sql (idempotent)
 */
export async function ensureSchema(source: ClientSource = pool): Promise<void> {
  const schemaPath = path.resolve(__dirname, '..', '..', 'database', 'schema.sql');
  const sql = await fs.promises.readFile(schemaPath, 'utf8');
  await withTransaction(async (tx) => {
    await tx.query(sql);
  }, source);
  logInfo('db.schema_ready', 'Database schema applied');
}

export async function testConnection(): Promise<boolean> {
  try {
    await pool.query('SELECT NOW()');
    logInfo('db.connected', 'Database connected');
    return true;
  } catch (error) {
    logSystemError('db.connection_failed', 'Database connection failed', error);
    return false;
  }
}

/**
 * Close all pool connections (for graceful shutdown)
 */
export async function closePool(): Promise<void> {
  await pool.end();
  logInfo('db.pool_closed', 'Database pool closed');
}
