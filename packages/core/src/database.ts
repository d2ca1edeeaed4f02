/**
 * Database Client Factory
 * Provides a small database client interface for use with repositories
 *
 * Repositories acquire one pooled connection per logical operation and
 * release it before returning; nothing spans multiple store calls.
 */

import pg from 'pg';
import { createLogger, type Logger } from './logger.js';
import { DatabaseConnectionError, toError } from './errors.js';

/**
 * Database query result type
 */
export interface QueryResult<T = Record<string, unknown>> {
  rows: T[];
  rowCount: number | null;
}

/**
 * Database client interface
 * Compatible with pg.Pool and pg.PoolClient
 */
export interface DatabaseClient {
  query<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<QueryResult<T>>;
}

/**
 * Database pool interface for connection management
 */
export interface DatabasePool extends DatabaseClient {
  connect(): Promise<PoolClient>;
  end(): Promise<void>;
}

/**
 * Pool client interface (acquired connection)
 */
export interface PoolClient extends DatabaseClient {
  release(): void;
}

export interface DatabaseConfig {
  connectionString: string;
  maxConnections?: number;
  idleTimeoutMs?: number;
  connectionTimeoutMs?: number;
  /** TLS without certificate checks outside production (DATABASE_SSL) */
  ssl?: boolean;
}

/**
 * Resolve SSL settings: strict in production, optional elsewhere
 */
function resolveSsl(requested: boolean | undefined): { rejectUnauthorized: boolean } | undefined {
  if (process.env.NODE_ENV === 'production') {
    return { rejectUnauthorized: true };
  }
  return requested === true ? { rejectUnauthorized: false } : undefined;
}

/**
 * PostgreSQL database pool wrapper
 */
class PostgresPool implements DatabasePool {
  private readonly pool: pg.Pool;
  private readonly logger: Logger;

  constructor(config: DatabaseConfig) {
    this.logger = createLogger({ name: 'database' });
    const ssl = resolveSsl(config.ssl);
    this.pool = new pg.Pool({
      connectionString: config.connectionString,
      max: config.maxConnections ?? 10,
      idleTimeoutMillis: config.idleTimeoutMs ?? 30000,
      connectionTimeoutMillis: config.connectionTimeoutMs ?? 5000,
      ...(ssl && { ssl }),
    });
    this.pool.on('error', (error) => {
      this.logger.error({ err: error }, 'Idle database client error');
    });
  }

  async query<T = Record<string, unknown>>(
    sql: string,
    params?: unknown[]
  ): Promise<QueryResult<T>> {
    const result = await this.pool.query(sql, params);
    return { rows: result.rows, rowCount: result.rowCount };
  }

  async connect(): Promise<PoolClient> {
    let client: pg.PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      this.logger.error({ err: error }, 'Failed to acquire database connection');
      throw new DatabaseConnectionError(toError(error).message);
    }

    return {
      query: async <T = Record<string, unknown>>(
        sql: string,
        params?: unknown[]
      ): Promise<QueryResult<T>> => {
        const result = await client.query(sql, params);
        return { rows: result.rows, rowCount: result.rowCount };
      },
      release: () => client.release(),
    };
  }

  async end(): Promise<void> {
    await this.pool.end();
    this.logger.info('Database pool closed');
  }
}

/**
 * Create a database pool
 *
 * @param connectionString - PostgreSQL connection string (optional, uses DATABASE_URL env var)
 *
 * @example
 * ```typescript
 * const db = createDatabaseClient();
 * const result = await db.query('SELECT * FROM medicines WHERE id = $1', [medicineId]);
 * ```
 */
export function createDatabaseClient(
  connectionString?: string,
  options: Omit<DatabaseConfig, 'connectionString'> = {}
): DatabasePool {
  const connString = connectionString ?? process.env.DATABASE_URL;

  if (!connString) {
    throw new DatabaseConnectionError('DATABASE_URL is not configured');
  }

  return new PostgresPool({ ...options, connectionString: connString });
}

// =============================================================================
// TRANSACTION MANAGEMENT
// =============================================================================

/**
 * Transaction isolation levels
 */
export enum IsolationLevel {
  READ_COMMITTED = 'READ COMMITTED',
  REPEATABLE_READ = 'REPEATABLE READ',
  SERIALIZABLE = 'SERIALIZABLE',
}

export interface TransactionOptions {
  /** Isolation level for the transaction */
  isolationLevel?: IsolationLevel;
  /** Statement timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
}

/**
 * Transaction client interface with row locking
 */
export interface TransactionClient extends DatabaseClient {
  /**
   * Acquire a row lock using SELECT FOR UPDATE
   * Prevents concurrent modifications to the same row
   */
  selectForUpdate<T = Record<string, unknown>>(
    sql: string,
    params?: unknown[]
  ): Promise<QueryResult<T>>;
}

const DEFAULT_TRANSACTION_TIMEOUT = 30000;

/**
 * Execute a function within a database transaction
 *
 * BEGIN/COMMIT/ROLLBACK are managed here; the statements issued by `fn`
 * either all commit or all roll back. Failures are not retried.
 *
 * @example
 * ```typescript
 * await withTransaction(db, async (tx) => {
 *   await tx.query('UPDATE medicines SET current_stock = $1 WHERE id = $2', [50, id]);
 *   await tx.query('INSERT INTO stock_history (medicine_id, old_stock, new_stock) VALUES ($1, $2, $3)', [id, 80, 50]);
 * });
 * ```
 */
export async function withTransaction<T>(
  pool: DatabasePool,
  fn: (client: TransactionClient) => Promise<T>,
  options: TransactionOptions = {}
): Promise<T> {
  const {
    isolationLevel = IsolationLevel.READ_COMMITTED,
    timeoutMs = DEFAULT_TRANSACTION_TIMEOUT,
  } = options;

  const logger = createLogger({ name: 'transaction' });
  const client = await pool.connect();

  try {
    await client.query(`BEGIN ISOLATION LEVEL ${isolationLevel}`);
    await client.query(`SET LOCAL statement_timeout = ${Math.trunc(timeoutMs)}`);

    const txClient: TransactionClient = {
      query: client.query.bind(client),

      selectForUpdate: async <R = Record<string, unknown>>(
        sql: string,
        params?: unknown[]
      ): Promise<QueryResult<R>> => {
        const lockingSql = sql.trim().toLowerCase().endsWith('for update')
          ? sql
          : `${sql.trim()} FOR UPDATE`;
        return client.query<R>(lockingSql, params);
      },
    };

    const result = await fn(txClient);
    await client.query('COMMIT');
    return result;
  } catch (error: unknown) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      logger.error({ err: rollbackError }, 'Transaction rollback failed');
    }
    throw error;
  } finally {
    client.release();
  }
}
