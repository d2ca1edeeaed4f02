/**
 * @fileoverview Inventory Store Port
 *
 * Persistence contract for medicines and their stock history. Adapters live
 * in `@rxstock/infrastructure`; the domain depends only on this interface.
 *
 * @module domain/inventory/interfaces
 */

import type {
  Medicine,
  MedicineDetailsPatch,
  MedicineId,
  NewMedicine,
  StockHistoryEntry,
} from '@rxstock/types';

// ============================================================================
// QUERY TYPES
// ============================================================================

export interface StockHistoryFilter {
  /** Restrict to one medicine; all medicines when omitted */
  readonly medicineId?: MedicineId;
  /** Maximum entries returned, most recent first */
  readonly limit: number;
}

export const DEFAULT_STOCK_CHANGE_REASON = 'Manual update';
export const DEFAULT_HISTORY_LIMIT = 50;

// ============================================================================
// REPOSITORY PORT
// ============================================================================

/**
 * Repository interface for the medicine inventory
 *
 * Every mutating operation is atomic: a stock change and its history entry
 * are written together or not at all.
 */
export interface IInventoryRepository {
  /**
   * Insert a validated medicine and return its new id
   */
  add(medicine: NewMedicine): Promise<MedicineId>;

  /**
   * All medicines ordered by name
   */
  listAll(): Promise<Medicine[]>;

  findById(id: MedicineId): Promise<Medicine | null>;

  /**
   * Set the stock level and append a history entry with the previous value.
   *
   * @throws NotFoundError when the medicine does not exist
   */
  updateStock(id: MedicineId, newStock: number, reason: string): Promise<StockHistoryEntry>;

  /**
   * Edit descriptive fields. Stock is not editable here.
   *
   * @throws NotFoundError when the medicine does not exist
   */
  updateDetails(id: MedicineId, patch: MedicineDetailsPatch): Promise<Medicine>;

  /**
   * Medicines at or below their reorder point, lowest stock first
   */
  findLowStock(): Promise<Medicine[]>;

  /**
   * Medicines expiring on or before `today + withinDays`, soonest first.
   * Already expired medicines are included.
   */
  findExpiring(withinDays: number, today: Date): Promise<Medicine[]>;

  /**
   * Case-insensitive substring match on name or category, ordered by name
   */
  search(term: string): Promise<Medicine[]>;

  getHistory(filter: StockHistoryFilter): Promise<StockHistoryEntry[]>;

  /**
   * Remove a medicine together with its history.
   *
   * @returns false when the medicine did not exist
   */
  delete(id: MedicineId): Promise<boolean>;
}
