/**
 * Database Configuration
 *
 * We use a "connection pool" instead of single connections: the pool keeps
 * connections open and hands one out per query or transaction.
 *
 * Every query carries a timeout. A timed-out query surfaces as
 * PersistenceTimeoutError instead of hanging the request.
 */

import { Pool, PoolClient, PoolConfig, types } from 'pg';
import type { DatabaseConfig } from '../config';
import {
  AppError,
  ConflictError,
  DuplicateActiveRequestError,
  PersistenceTimeoutError,
  datasetNameTakenError,
  usernameTakenError,
} from '../utils/errors.utils';
import { logDebug, logSystemError } from '../utils/logger.utils';

// BIGINT (oid 20) columns such as audit_logs.seq come back as numbers
types.setTypeParser(20, (value: string) => parseInt(value, 10));

let pool: Pool | null = null;

/**
 * Create the pool (doesn't connect yet - lazy connection)
 */
export function initPool(config: DatabaseConfig): Pool {
  const poolConfig: PoolConfig = {
    connectionString: config.connectionString,
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,

    // Pool settings
    max: 20, // Maximum connections in pool
    idleTimeoutMillis: 30000, // Close idle connections after 30s
    connectionTimeoutMillis: 2000, // Timeout if can't connect in 2s
    statement_timeout: config.queryTimeoutMs || undefined,
    query_timeout: config.queryTimeoutMs || undefined,
  };

  pool = new Pool(poolConfig);

  // Log pool errors (connection issues, etc.)
  pool.on('error', (err) => {
    logSystemError('db.pool_error', 'Unexpected database pool error', err);
  });

  return pool;
}

function getPool(): Pool {
  if (!pool) {
    throw new Error('Database pool not initialised. Call initPool() first.');
  }
  return pool;
}

/**
 * Recognise the timeouts pg reports: statement_timeout (57014),
 * lock_timeout (55P03), query_timeout and connection timeouts.
 */
export function isTimeoutError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if ('code' in error && (error.code === '57014' || error.code === '55P03')) {
    return true;
  }
  return /query read timeout|timeout exceeded when trying to connect|connection timeout/i.test(error.message);
}

// unique_violation (23505), keyed by constraint name
const UNIQUE_CONSTRAINTS: Record<string, () => AppError> = {
  users_username_key: usernameTakenError,
  datasets_name_key: datasetNameTakenError,
  ux_approval_pending: () => new DuplicateActiveRequestError(),
};

function uniqueViolation(error: unknown): AppError | null {
  if (!(error instanceof Error) || !('code' in error) || error.code !== '23505') {
    return null;
  }
  const constraint = 'constraint' in error && typeof error.constraint === 'string' ? error.constraint : '';
  const known = UNIQUE_CONSTRAINTS[constraint];
  return known ? known() : new ConflictError('This record already exists.', 'DUPLICATE_RECORD');
}

/**
 * Map driver errors onto the error kinds callers handle
 */
export function translateDbError(error: unknown): unknown {
  if (isTimeoutError(error)) {
    return new PersistenceTimeoutError(error);
  }
  return uniqueViolation(error) ?? error;
}

export interface QueryResultRows<T> {
  rows: T[];
  rowCount: number;
}

/**
 * Execute a query
 * @param text - SQL query string
 * @param params - Query parameters (prevents SQL injection!)
 * @param client - Run on this transaction client instead of the pool
 */
export async function query<T = unknown>(
  text: string,
  params?: unknown[],
  client?: PoolClient
): Promise<QueryResultRows<T>> {
  const start = Date.now();
  try {
    const result = client ? await client.query(text, params) : await getPool().query(text, params);
    const duration = Date.now() - start;

    // Log slow queries in development
    if (duration > 100) {
      logDebug('db.slow_query', 'Slow query', undefined, { duration: `${duration}ms`, rows: result.rowCount });
    }

    return { rows: result.rows as T[], rowCount: result.rowCount ?? 0 };
  } catch (error) {
    throw translateDbError(error);
  }
}

/**
 * Get a client from the pool for transactions
 * Remember to release() when done!
 */
export async function getClient(): Promise<PoolClient> {
  try {
    return await getPool().connect();
  } catch (error) {
    throw translateDbError(error);
  }
}

/**
 * Run `fn` inside BEGIN/COMMIT, rolling back on any error.
 * Nothing `fn` writes is visible to other connections until it returns.
 */
export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await getClient();
  try {
    await query('BEGIN', [], client);
    const value = await fn(client);
    await query('COMMIT', [], client);
    return value;
  } catch (error) {
    await client.query('ROLLBACK').catch((rollbackError: unknown) => {
      logSystemError('db.rollback_failed', 'Transaction rollback failed', rollbackError);
    });
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Serialize transactions on a key (released at COMMIT/ROLLBACK)
 */
export async function lockKey(client: PoolClient, key: string): Promise<void> {
  await query('SELECT pg_advisory_xact_lock(hashtext($1))', [key], client);
}

/**
 * Test database connection
 */
export async function testConnection(): Promise<boolean> {
  try {
    await query('SELECT 1');
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
  if (pool) {
    await pool.end();
    pool = null;
  }
}
