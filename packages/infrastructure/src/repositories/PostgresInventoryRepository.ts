/**
 * @fileoverview PostgreSQL Inventory Repository (Infrastructure Layer)
 *
 * Persistence for medicines and their stock history.
 *
 * ## Hexagonal Architecture
 *
 * This is an **ADAPTER** - it implements the IInventoryRepository port
 * defined in the domain layer. The domain depends only on the interface.
 *
 * Stock updates and deletes run inside one transaction each, so a stock
 * level never changes without its history row and a medicine never
 * disappears while leaving history behind.
 *
 * @module @rxstock/infrastructure/repositories/postgres-inventory-repository
 */

import {
  AppError,
  createLogger,
  DatabaseOperationError,
  NotFoundError,
  toError,
  withTransaction,
  type DatabasePool,
} from '@rxstock/core';
import type {
  Medicine,
  MedicineDetailsPatch,
  MedicineId,
  NewMedicine,
  StockHistoryEntry,
} from '@rxstock/types';
import {
  addDays,
  formatIsoDate,
  type IInventoryRepository,
  type StockHistoryFilter,
} from '@rxstock/domain';

const logger = createLogger({ name: 'postgres-inventory-repository' });

// ============================================================================
// CONSTANTS
// ============================================================================

const MEDICINE_COLUMNS = `id, name, current_stock, reorder_point,
       to_char(expiry_date, 'YYYY-MM-DD') AS expiry_date,
       unit_price, batch_number, supplier, category, location,
       created_at, updated_at`;

const DETAIL_COLUMNS: ReadonlyArray<readonly [keyof MedicineDetailsPatch, string]> = [
  ['name', 'name'],
  ['reorderPoint', 'reorder_point'],
  ['expiryDate', 'expiry_date'],
  ['unitPrice', 'unit_price'],
  ['batchNumber', 'batch_number'],
  ['supplier', 'supplier'],
  ['category', 'category'],
  ['location', 'location'],
];

// ============================================================================
// DATABASE ROW TYPES
// ============================================================================

interface MedicineRow {
  id: number;
  name: string;
  current_stock: number;
  reorder_point: number;
  expiry_date: string;
  /** NUMERIC comes back from pg as a string */
  unit_price: string;
  batch_number: string | null;
  supplier: string | null;
  category: string | null;
  location: string | null;
  created_at: Date;
  updated_at: Date;
}

interface StockHistoryRow {
  id: number;
  medicine_id: number;
  medicine_name: string;
  old_stock: number;
  new_stock: number;
  change_reason: string;
  changed_at: Date;
}

interface LockedStockRow {
  name: string;
  current_stock: number;
}

/**
 * Escape LIKE wildcards so a search term matches literally
 */
export function escapeLikePattern(term: string): string {
  return term.replace(/[\\%_]/g, (char) => `\\${char}`);
}

// ============================================================================
// REPOSITORY IMPLEMENTATION
// ============================================================================

/**
 * PostgreSQL implementation of the inventory repository
 */
export class PostgresInventoryRepository implements IInventoryRepository {
  constructor(private readonly pool: DatabasePool) {}

  // ============================================================================
  // MEDICINE OPERATIONS
  // ============================================================================

  async add(medicine: NewMedicine): Promise<MedicineId> {
    return this.run('add', async () => {
      const result = await this.pool.query<{ id: number }>(
        `INSERT INTO medicines (
          name, current_stock, reorder_point, expiry_date, unit_price,
          batch_number, supplier, category, location
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
        RETURNING id`,
        [
          medicine.name,
          medicine.currentStock,
          medicine.reorderPoint,
          medicine.expiryDate,
          medicine.unitPrice,
          medicine.batchNumber,
          medicine.supplier,
          medicine.category,
          medicine.location,
        ]
      );

      const row = result.rows[0];
      if (!row) {
        throw new DatabaseOperationError('add', 'Insert returned no id');
      }
      return row.id;
    });
  }

  async listAll(): Promise<Medicine[]> {
    return this.run('listAll', async () => {
      const result = await this.pool.query<MedicineRow>(
        `SELECT ${MEDICINE_COLUMNS} FROM medicines ORDER BY name ASC, id ASC`
      );
      return result.rows.map((row) => this.rowToMedicine(row));
    });
  }

  async findById(id: MedicineId): Promise<Medicine | null> {
    return this.run('findById', async () => {
      const result = await this.pool.query<MedicineRow>(
        `SELECT ${MEDICINE_COLUMNS} FROM medicines WHERE id = $1`,
        [id]
      );
      const row = result.rows[0];
      return row ? this.rowToMedicine(row) : null;
    });
  }

  async updateStock(id: MedicineId, newStock: number, reason: string): Promise<StockHistoryEntry> {
    return this.run('updateStock', () =>
      withTransaction(this.pool, async (tx) => {
        const locked = await tx.selectForUpdate<LockedStockRow>(
          'SELECT name, current_stock FROM medicines WHERE id = $1',
          [id]
        );
        const current = locked.rows[0];
        if (!current) {
          throw new NotFoundError(`Medicine ${id}`);
        }

        await tx.query(
          'UPDATE medicines SET current_stock = $1, updated_at = NOW() WHERE id = $2',
          [newStock, id]
        );

        const inserted = await tx.query<Omit<StockHistoryRow, 'medicine_name'>>(
          `INSERT INTO stock_history (medicine_id, old_stock, new_stock, change_reason)
           VALUES ($1, $2, $3, $4)
           RETURNING id, medicine_id, old_stock, new_stock, change_reason, changed_at`,
          [id, current.current_stock, newStock, reason]
        );
        const history = inserted.rows[0];
        if (!history) {
          throw new DatabaseOperationError('updateStock', 'History entry was not created');
        }

        return this.rowToHistoryEntry({ ...history, medicine_name: current.name });
      })
    );
  }

  async updateDetails(id: MedicineId, patch: MedicineDetailsPatch): Promise<Medicine> {
    return this.run('updateDetails', async () => {
      const params: unknown[] = [];
      const assignments: string[] = [];
      for (const [field, column] of DETAIL_COLUMNS) {
        const value = patch[field];
        if (value !== undefined) {
          params.push(value);
          assignments.push(`${column} = $${params.length}`);
        }
      }

      if (assignments.length === 0) {
        const existing = await this.findById(id);
        if (!existing) {
          throw new NotFoundError(`Medicine ${id}`);
        }
        return existing;
      }

      params.push(id);
      const result = await this.pool.query<MedicineRow>(
        `UPDATE medicines
         SET ${assignments.join(', ')}, updated_at = NOW()
         WHERE id = $${params.length}
         RETURNING ${MEDICINE_COLUMNS}`,
        params
      );

      const row = result.rows[0];
      if (!row) {
        throw new NotFoundError(`Medicine ${id}`);
      }
      return this.rowToMedicine(row);
    });
  }

  async delete(id: MedicineId): Promise<boolean> {
    return this.run('delete', () =>
      withTransaction(this.pool, async (tx) => {
        await tx.query('DELETE FROM stock_history WHERE medicine_id = $1', [id]);
        const result = await tx.query('DELETE FROM medicines WHERE id = $1', [id]);
        return (result.rowCount ?? 0) > 0;
      })
    );
  }

  // ============================================================================
  // QUERIES
  // ============================================================================

  async findLowStock(): Promise<Medicine[]> {
    return this.run('findLowStock', async () => {
      const result = await this.pool.query<MedicineRow>(
        `SELECT ${MEDICINE_COLUMNS} FROM medicines
         WHERE current_stock <= reorder_point
         ORDER BY current_stock ASC, name ASC`
      );
      return result.rows.map((row) => this.rowToMedicine(row));
    });
  }

  async findExpiring(withinDays: number, today: Date): Promise<Medicine[]> {
    const cutoff = formatIsoDate(addDays(today, withinDays));
    return this.run('findExpiring', async () => {
      const result = await this.pool.query<MedicineRow>(
        `SELECT ${MEDICINE_COLUMNS} FROM medicines
         WHERE expiry_date <= $1::date
         ORDER BY expiry_date ASC, name ASC`,
        [cutoff]
      );
      return result.rows.map((row) => this.rowToMedicine(row));
    });
  }

  async search(term: string): Promise<Medicine[]> {
    const pattern = `%${escapeLikePattern(term)}%`;
    return this.run('search', async () => {
      const result = await this.pool.query<MedicineRow>(
        `SELECT ${MEDICINE_COLUMNS} FROM medicines
         WHERE name ILIKE $1 ESCAPE '\\' OR category ILIKE $1 ESCAPE '\\'
         ORDER BY name ASC, id ASC`,
        [pattern]
      );
      return result.rows.map((row) => this.rowToMedicine(row));
    });
  }

  async getHistory(filter: StockHistoryFilter): Promise<StockHistoryEntry[]> {
    return this.run('getHistory', async () => {
      const params: unknown[] = [];
      let where = '';
      if (filter.medicineId !== undefined) {
        params.push(filter.medicineId);
        where = 'WHERE h.medicine_id = $1';
      }
      params.push(filter.limit);

      const result = await this.pool.query<StockHistoryRow>(
        `SELECT h.id, h.medicine_id, m.name AS medicine_name,
                h.old_stock, h.new_stock, h.change_reason, h.changed_at
         FROM stock_history h
         JOIN medicines m ON m.id = h.medicine_id
         ${where}
         ORDER BY h.changed_at DESC, h.id DESC
         LIMIT $${params.length}`,
        params
      );
      return result.rows.map((row) => this.rowToHistoryEntry(row));
    });
  }

  // ============================================================================
  // HELPERS
  // ============================================================================

  /**
   * Run a repository operation, wrapping driver failures.
   * Application errors (not found, connection) pass through unchanged.
   */
  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      const cause = toError(error);
      logger.error({ err: cause, operation }, 'Inventory query failed');
      throw new DatabaseOperationError(operation, cause.message, cause);
    }
  }

  private rowToMedicine(row: MedicineRow): Medicine {
    return {
      id: row.id,
      name: row.name,
      currentStock: row.current_stock,
      reorderPoint: row.reorder_point,
      expiryDate: row.expiry_date,
      unitPrice: Number(row.unit_price),
      batchNumber: row.batch_number,
      supplier: row.supplier,
      category: row.category,
      location: row.location,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  private rowToHistoryEntry(row: StockHistoryRow): StockHistoryEntry {
    return {
      id: row.id,
      medicineId: row.medicine_id,
      medicineName: row.medicine_name,
      oldStock: row.old_stock,
      newStock: row.new_stock,
      changeReason: row.change_reason,
      changedAt: row.changed_at,
    };
  }
}

/**
 * Create a PostgreSQL inventory repository
 */
export function createPostgresInventoryRepository(pool: DatabasePool): PostgresInventoryRepository {
  return new PostgresInventoryRepository(pool);
}
