/**
 * Database Unit Tests
 *
 * Tests for transaction management:
 * - BEGIN/COMMIT/ROLLBACK flow
 * - Isolation levels
 * - Row locking helper
 * - Client release on every path
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  type DatabasePool,
  type PoolClient,
  IsolationLevel,
  withTransaction,
  createDatabaseClient,
} from '../database.js';
import { DatabaseConnectionError } from '../errors.js';

const poolOptions = vi.hoisted(() => {
  const seen: Array<Record<string, unknown>> = [];
  return seen;
});

vi.mock('pg', () => {
  class MockPool {
    constructor(options: Record<string, unknown>) {
      poolOptions.push(options);
    }
    on() {
      return this;
    }
    end() {
      return Promise.resolve();
    }
  }
  return { default: { Pool: MockPool } };
});

interface RecordedQuery {
  query: string;
  params?: unknown[];
}

/**
 * Mock database pool for testing
 */
function createMockPool(failOn?: string): DatabasePool & {
  mockClient: PoolClient;
  queries: RecordedQuery[];
} {
  const queries: RecordedQuery[] = [];

  const mockClient: PoolClient = {
    query: vi.fn().mockImplementation(async (sql: string, params?: unknown[]) => {
      queries.push(params !== undefined ? { query: sql, params } : { query: sql });
      if (failOn && sql.includes(failOn)) {
        throw new Error(`${failOn} failed`);
      }
      return { rows: [], rowCount: 0 };
    }),
    release: vi.fn(),
  };

  return {
    mockClient,
    queries,
    query: vi.fn().mockResolvedValue({ rows: [], rowCount: 0 }),
    connect: vi.fn().mockResolvedValue(mockClient),
    end: vi.fn().mockResolvedValue(undefined),
  };
}

describe('withTransaction', () => {
  let mockPool: ReturnType<typeof createMockPool>;

  beforeEach(() => {
    mockPool = createMockPool();
  });

  describe('Basic Transaction Flow', () => {
    it('should execute BEGIN, statement timeout and COMMIT in order', async () => {
      await withTransaction(mockPool, async (tx) => {
        await tx.query('SELECT 1');
        return 'success';
      });

      expect(mockPool.queries.map((q) => q.query)).toEqual([
        'BEGIN ISOLATION LEVEL READ COMMITTED',
        'SET LOCAL statement_timeout = 30000',
        'SELECT 1',
        'COMMIT',
      ]);
    });

    it('should return the result from the transaction function', async () => {
      const result = await withTransaction(mockPool, async () => {
        return { value: 42 };
      });

      expect(result).toEqual({ value: 42 });
    });

    it('should release the client after transaction', async () => {
      await withTransaction(mockPool, async () => 'done');

      expect(mockPool.mockClient.release).toHaveBeenCalledTimes(1);
    });

    it('should apply a custom statement timeout', async () => {
      await withTransaction(mockPool, async () => 'done', { timeoutMs: 5000 });

      expect(mockPool.queries[1]?.query).toBe('SET LOCAL statement_timeout = 5000');
    });
  });

  describe('Isolation Levels', () => {
    it('should use specified isolation level', async () => {
      await withTransaction(mockPool, async () => 'done', {
        isolationLevel: IsolationLevel.SERIALIZABLE,
      });

      expect(mockPool.queries[0]?.query).toBe('BEGIN ISOLATION LEVEL SERIALIZABLE');
    });
  });

  describe('Row Locking', () => {
    it('should append FOR UPDATE to select statements', async () => {
      await withTransaction(mockPool, async (tx) => {
        await tx.selectForUpdate('SELECT current_stock FROM medicines WHERE id = $1', [7]);
      });

      expect(mockPool.queries[2]).toEqual({
        query: 'SELECT current_stock FROM medicines WHERE id = $1 FOR UPDATE',
        params: [7],
      });
    });

    it('should not duplicate an existing FOR UPDATE clause', async () => {
      await withTransaction(mockPool, async (tx) => {
        await tx.selectForUpdate('SELECT 1 FOR UPDATE');
      });

      expect(mockPool.queries[2]?.query).toBe('SELECT 1 FOR UPDATE');
    });
  });

  describe('Error Handling', () => {
    it('should ROLLBACK and rethrow on error', async () => {
      const errorPool = createMockPool('INSERT');

      await expect(
        withTransaction(errorPool, async (tx) => {
          await tx.query('INSERT INTO stock_history VALUES (1)');
        })
      ).rejects.toThrow('INSERT failed');

      const statements = errorPool.queries.map((q) => q.query);
      expect(statements).toContain('ROLLBACK');
      expect(statements).not.toContain('COMMIT');
    });

    it('should release client even on error', async () => {
      const errorPool = createMockPool('INSERT');

      await expect(
        withTransaction(errorPool, async (tx) => {
          await tx.query('INSERT INTO stock_history VALUES (1)');
        })
      ).rejects.toThrow();

      expect(errorPool.mockClient.release).toHaveBeenCalledTimes(1);
    });

    it('should surface the original error when rollback also fails', async () => {
      const errorPool = createMockPool('ROLLBACK');

      await expect(
        withTransaction(errorPool, async () => {
          throw new Error('business rule violated');
        })
      ).rejects.toThrow('business rule violated');
    });
  });
});

describe('createDatabaseClient', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should throw when no connection string is configured', () => {
    vi.stubEnv('DATABASE_URL', '');

    expect(() => createDatabaseClient()).toThrow(DatabaseConnectionError);
  });

  it('should enable TLS only when requested', async () => {
    poolOptions.length = 0;

    await createDatabaseClient('postgresql://localhost:5432/rxstock_test', { ssl: true }).end();
    await createDatabaseClient('postgresql://localhost:5432/rxstock_test').end();

    expect(poolOptions[0]?.ssl).toEqual({ rejectUnauthorized: false });
    expect(poolOptions[1]).not.toHaveProperty('ssl');
  });

  it('should require verified TLS in production', async () => {
    vi.stubEnv('NODE_ENV', 'production');
    poolOptions.length = 0;

    await createDatabaseClient('postgresql://localhost:5432/rxstock_test', { ssl: false }).end();

    expect(poolOptions[0]?.ssl).toEqual({ rejectUnauthorized: true });
  });

  it('should create a pool without connecting eagerly', async () => {
    const pool = createDatabaseClient('postgresql://localhost:5432/rxstock_test');

    expect(typeof pool.query).toBe('function');
    expect(typeof pool.connect).toBe('function');
    await pool.end();
  });
});
