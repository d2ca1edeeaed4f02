/**
 * PostgresInventoryRepository Unit Tests
 *
 * Runs against a scripted pool; asserts the SQL issued, the parameters
 * bound and the mapping of rows back to domain records.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  DatabaseOperationError,
  NotFoundError,
  type DatabasePool,
  type PoolClient,
  type QueryResult,
} from '@rxstock/core';
import { PostgresInventoryRepository, escapeLikePattern } from '../repositories/PostgresInventoryRepository.js';

interface RecordedQuery {
  sql: string;
  params: unknown[] | undefined;
}

type Script = Array<[match: string, reply: QueryResult | Error]>;

/**
 * Pool whose replies are chosen by the first script entry contained in the SQL
 */
function createScriptedPool(script: Script = []): DatabasePool & { queries: RecordedQuery[]; client: PoolClient } {
  const queries: RecordedQuery[] = [];

  const run = async (sql: string, params?: unknown[]): Promise<QueryResult> => {
    queries.push({ sql, params });
    const entry = script.find(([match]) => sql.includes(match));
    if (!entry) {
      return { rows: [], rowCount: 0 };
    }
    const [, reply] = entry;
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  };

  const client: PoolClient = {
    query: vi.fn().mockImplementation(run),
    release: vi.fn(),
  };

  return {
    queries,
    client,
    query: vi.fn().mockImplementation(run),
    connect: vi.fn().mockResolvedValue(client),
    end: vi.fn().mockResolvedValue(undefined),
  };
}

const CREATED_AT = new Date('2025-01-10T09:00:00Z');

const amoxicillinRow = {
  id: 5,
  name: 'Amoxicillin 500mg',
  current_stock: 80,
  reorder_point: 20,
  expiry_date: '2026-03-31',
  unit_price: '0.45',
  batch_number: 'AMX-2024-01',
  supplier: 'MedSupply',
  category: 'Antibiotics',
  location: 'Shelf A2',
  created_at: CREATED_AT,
  updated_at: CREATED_AT,
};

function statements(pool: { queries: RecordedQuery[] }): string[] {
  return pool.queries.map((q) => q.sql.replace(/\s+/g, ' ').trim());
}

describe('PostgresInventoryRepository', () => {
  describe('add', () => {
    it('should insert every field and return the new id', async () => {
      const pool = createScriptedPool([['INSERT INTO medicines', { rows: [{ id: 7 }], rowCount: 1 }]]);
      const repository = new PostgresInventoryRepository(pool);

      const id = await repository.add({
        name: 'Cetirizine 10mg',
        currentStock: 120,
        reorderPoint: 30,
        expiryDate: '2026-01-31',
        unitPrice: 0.2,
        batchNumber: null,
        supplier: 'AllergyCo',
        category: null,
        location: null,
      });

      expect(id).toBe(7);
      expect(pool.queries[0]?.params).toEqual([
        'Cetirizine 10mg',
        120,
        30,
        '2026-01-31',
        0.2,
        null,
        'AllergyCo',
        null,
        null,
      ]);
    });
  });

  describe('reads', () => {
    it('should map rows to medicines with a numeric price', async () => {
      const pool = createScriptedPool([['FROM medicines', { rows: [amoxicillinRow], rowCount: 1 }]]);
      const repository = new PostgresInventoryRepository(pool);

      const [medicine] = await repository.listAll();

      expect(medicine).toEqual({
        id: 5,
        name: 'Amoxicillin 500mg',
        currentStock: 80,
        reorderPoint: 20,
        expiryDate: '2026-03-31',
        unitPrice: 0.45,
        batchNumber: 'AMX-2024-01',
        supplier: 'MedSupply',
        category: 'Antibiotics',
        location: 'Shelf A2',
        createdAt: CREATED_AT,
        updatedAt: CREATED_AT,
      });
      expect(statements(pool)[0]).toContain("to_char(expiry_date, 'YYYY-MM-DD') AS expiry_date");
      expect(statements(pool)[0]).toContain('ORDER BY name ASC, id ASC');
    });

    it('should return null for an unknown id', async () => {
      const repository = new PostgresInventoryRepository(createScriptedPool());

      expect(await repository.findById(99)).toBeNull();
    });

    it('should filter low stock at or below the reorder point', async () => {
      const pool = createScriptedPool();

      await new PostgresInventoryRepository(pool).findLowStock();

      expect(statements(pool)[0]).toContain('WHERE current_stock <= reorder_point ORDER BY current_stock ASC, name ASC');
    });

    it('should bind the expiry cutoff as a calendar date', async () => {
      const pool = createScriptedPool();

      await new PostgresInventoryRepository(pool).findExpiring(30, new Date(2025, 5, 15));

      expect(pool.queries[0]?.params).toEqual(['2025-07-15']);
      expect(statements(pool)[0]).toContain('WHERE expiry_date <= $1::date ORDER BY expiry_date ASC, name ASC');
    });

    it('should search name and category with escaped wildcards', async () => {
      const pool = createScriptedPool();

      await new PostgresInventoryRepository(pool).search('10%_off');

      expect(pool.queries[0]?.params).toEqual(['%10\\%\\_off%']);
      expect(statements(pool)[0]).toContain("WHERE name ILIKE $1 ESCAPE '\\' OR category ILIKE $1 ESCAPE '\\'");
    });

    it('should filter history by medicine and apply the limit', async () => {
      const pool = createScriptedPool([
        [
          'FROM stock_history',
          {
            rows: [
              {
                id: 3,
                medicine_id: 5,
                medicine_name: 'Amoxicillin 500mg',
                old_stock: 80,
                new_stock: 50,
                change_reason: 'Dispensed',
                changed_at: CREATED_AT,
              },
            ],
            rowCount: 1,
          },
        ],
      ]);

      const entries = await new PostgresInventoryRepository(pool).getHistory({ medicineId: 5, limit: 10 });

      expect(entries).toEqual([
        {
          id: 3,
          medicineId: 5,
          medicineName: 'Amoxicillin 500mg',
          oldStock: 80,
          newStock: 50,
          changeReason: 'Dispensed',
          changedAt: CREATED_AT,
        },
      ]);
      expect(pool.queries[0]?.params).toEqual([5, 10]);
      expect(statements(pool)[0]).toContain('WHERE h.medicine_id = $1 ORDER BY h.changed_at DESC, h.id DESC LIMIT $2');
    });

    it('should list history for all medicines without a filter', async () => {
      const pool = createScriptedPool();

      await new PostgresInventoryRepository(pool).getHistory({ limit: 50 });

      expect(pool.queries[0]?.params).toEqual([50]);
      expect(statements(pool)[0]).not.toContain('WHERE');
      expect(statements(pool)[0]).toContain('LIMIT $1');
    });
  });

  describe('updateStock', () => {
    const historyRow = {
      id: 11,
      medicine_id: 5,
      old_stock: 80,
      new_stock: 50,
      change_reason: 'Dispensed',
      changed_at: CREATED_AT,
    };

    it('should lock the row, update stock and append history in one transaction', async () => {
      const pool = createScriptedPool([
        ['FOR UPDATE', { rows: [{ name: 'Amoxicillin 500mg', current_stock: 80 }], rowCount: 1 }],
        ['INSERT INTO stock_history', { rows: [historyRow], rowCount: 1 }],
      ]);
      const repository = new PostgresInventoryRepository(pool);

      const entry = await repository.updateStock(5, 50, 'Dispensed');

      expect(entry).toEqual({
        id: 11,
        medicineId: 5,
        medicineName: 'Amoxicillin 500mg',
        oldStock: 80,
        newStock: 50,
        changeReason: 'Dispensed',
        changedAt: CREATED_AT,
      });
      expect(statements(pool)).toEqual([
        'BEGIN ISOLATION LEVEL READ COMMITTED',
        'SET LOCAL statement_timeout = 30000',
        'SELECT name, current_stock FROM medicines WHERE id = $1 FOR UPDATE',
        'UPDATE medicines SET current_stock = $1, updated_at = NOW() WHERE id = $2',
        'INSERT INTO stock_history (medicine_id, old_stock, new_stock, change_reason) VALUES ($1, $2, $3, $4) RETURNING id, medicine_id, old_stock, new_stock, change_reason, changed_at',
        'COMMIT',
      ]);
      expect(pool.queries[4]?.params).toEqual([5, 80, 50, 'Dispensed']);
      expect(pool.client.release).toHaveBeenCalledTimes(1);
    });

    it('should roll back and report a missing medicine', async () => {
      const pool = createScriptedPool();
      const repository = new PostgresInventoryRepository(pool);

      await expect(repository.updateStock(42, 10, 'Restock')).rejects.toThrow(NotFoundError);
      expect(statements(pool)).toContain('ROLLBACK');
      expect(statements(pool).some((sql) => sql.startsWith('UPDATE'))).toBe(false);
    });

    it('should roll back and wrap a failed history insert', async () => {
      const pool = createScriptedPool([
        ['FOR UPDATE', { rows: [{ name: 'Amoxicillin 500mg', current_stock: 80 }], rowCount: 1 }],
        ['INSERT INTO stock_history', new Error('disk full')],
      ]);
      const repository = new PostgresInventoryRepository(pool);

      const failure = repository.updateStock(5, 50, 'Dispensed');

      await expect(failure).rejects.toThrow(DatabaseOperationError);
      await expect(failure).rejects.toThrow('Database updateStock failed: disk full');
      expect(statements(pool)).toContain('ROLLBACK');
      expect(statements(pool)).not.toContain('COMMIT');
    });
  });

  describe('updateDetails', () => {
    it('should set only the provided columns', async () => {
      const pool = createScriptedPool([['UPDATE medicines', { rows: [amoxicillinRow], rowCount: 1 }]]);

      await new PostgresInventoryRepository(pool).updateDetails(5, { name: 'Amoxil 500mg', unitPrice: 0.5 });

      expect(statements(pool)[0]).toContain('SET name = $1, unit_price = $2, updated_at = NOW() WHERE id = $3');
      expect(pool.queries[0]?.params).toEqual(['Amoxil 500mg', 0.5, 5]);
    });

    it('should write null to clear an optional field', async () => {
      const pool = createScriptedPool([['UPDATE medicines', { rows: [amoxicillinRow], rowCount: 1 }]]);

      await new PostgresInventoryRepository(pool).updateDetails(5, { location: null });

      expect(pool.queries[0]?.params).toEqual([null, 5]);
    });

    it('should report a missing medicine', async () => {
      const repository = new PostgresInventoryRepository(createScriptedPool());

      await expect(repository.updateDetails(42, { supplier: 'PharmaDirect' })).rejects.toThrow(
        'Medicine 42 not found'
      );
    });
  });

  describe('delete', () => {
    it('should delete history before the medicine inside a transaction', async () => {
      const pool = createScriptedPool([['DELETE FROM medicines', { rows: [], rowCount: 1 }]]);

      const deleted = await new PostgresInventoryRepository(pool).delete(5);

      expect(deleted).toBe(true);
      expect(statements(pool).slice(2)).toEqual([
        'DELETE FROM stock_history WHERE medicine_id = $1',
        'DELETE FROM medicines WHERE id = $1',
        'COMMIT',
      ]);
    });

    it('should return false when nothing was deleted', async () => {
      const pool = createScriptedPool([['DELETE FROM medicines', { rows: [], rowCount: 0 }]]);

      expect(await new PostgresInventoryRepository(pool).delete(99)).toBe(false);
    });
  });

  it('should wrap driver errors with the operation name', async () => {
    const pool = createScriptedPool([['FROM medicines', new Error('relation "medicines" does not exist')]]);

    await expect(new PostgresInventoryRepository(pool).listAll()).rejects.toThrow(
      'Database listAll failed: relation "medicines" does not exist'
    );
  });
});

describe('escapeLikePattern', () => {
  it('should escape backslashes and wildcards', () => {
    expect(escapeLikePattern('a\\b%c_d')).toBe('a\\\\b\\%c\\_d');
  });

  it('should leave plain text unchanged', () => {
    expect(escapeLikePattern('Amoxicillin')).toBe('Amoxicillin');
  });
});
