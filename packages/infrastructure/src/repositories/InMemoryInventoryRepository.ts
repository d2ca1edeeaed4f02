/**
 * In-Memory Inventory Repository
 *
 * Test/development adapter for inventory persistence.
 * Implements the IInventoryRepository port from the domain layer.
 *
 * WARNING: Not suitable for production - data is lost on restart.
 * For production, use PostgresInventoryRepository.
 *
 * @module @rxstock/infrastructure/repositories/InMemoryInventoryRepository
 */

import { NotFoundError } from '@rxstock/core';
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

export interface InMemoryInventoryRepositoryOptions {
  /** Clock for created/updated/changed timestamps */
  now?: () => Date;
}

function byName(a: Medicine, b: Medicine): number {
  return a.name.localeCompare(b.name) || a.id - b.id;
}

/**
 * In-memory implementation for development/testing
 *
 * Methods are async to match the port but complete synchronously, so each
 * call is atomic with respect to the others.
 *
 * @example
 * ```typescript
 * const repository = new InMemoryInventoryRepository();
 * const inventory = createInventoryService({ repository });
 * ```
 */
export class InMemoryInventoryRepository implements IInventoryRepository {
  private medicines = new Map<MedicineId, Medicine>();
  private history: StockHistoryEntry[] = [];
  private nextMedicineId = 1;
  private nextHistoryId = 1;
  private readonly now: () => Date;

  constructor(options: InMemoryInventoryRepositoryOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  add(medicine: NewMedicine): Promise<MedicineId> {
    const id = this.nextMedicineId++;
    const timestamp = this.now();
    this.medicines.set(id, { ...medicine, id, createdAt: timestamp, updatedAt: timestamp });
    return Promise.resolve(id);
  }

  listAll(): Promise<Medicine[]> {
    return Promise.resolve(this.snapshot().sort(byName));
  }

  findById(id: MedicineId): Promise<Medicine | null> {
    const medicine = this.medicines.get(id);
    return Promise.resolve(medicine ? { ...medicine } : null);
  }

  updateStock(id: MedicineId, newStock: number, reason: string): Promise<StockHistoryEntry> {
    const medicine = this.medicines.get(id);
    if (!medicine) {
      return Promise.reject(new NotFoundError(`Medicine ${id}`));
    }

    const timestamp = this.now();
    const entry: StockHistoryEntry = {
      id: this.nextHistoryId++,
      medicineId: id,
      medicineName: medicine.name,
      oldStock: medicine.currentStock,
      newStock,
      changeReason: reason,
      changedAt: timestamp,
    };

    this.medicines.set(id, { ...medicine, currentStock: newStock, updatedAt: timestamp });
    this.history.push(entry);
    return Promise.resolve({ ...entry });
  }

  updateDetails(id: MedicineId, patch: MedicineDetailsPatch): Promise<Medicine> {
    const medicine = this.medicines.get(id);
    if (!medicine) {
      return Promise.reject(new NotFoundError(`Medicine ${id}`));
    }

    const updated: Medicine = { ...medicine, updatedAt: this.now() };
    if (patch.name !== undefined) updated.name = patch.name;
    if (patch.reorderPoint !== undefined) updated.reorderPoint = patch.reorderPoint;
    if (patch.expiryDate !== undefined) updated.expiryDate = patch.expiryDate;
    if (patch.unitPrice !== undefined) updated.unitPrice = patch.unitPrice;
    if (patch.batchNumber !== undefined) updated.batchNumber = patch.batchNumber;
    if (patch.supplier !== undefined) updated.supplier = patch.supplier;
    if (patch.category !== undefined) updated.category = patch.category;
    if (patch.location !== undefined) updated.location = patch.location;

    this.medicines.set(id, updated);
    // History rows report the medicine's current name
    if (patch.name !== undefined) {
      const name = patch.name;
      this.history = this.history.map((entry) =>
        entry.medicineId === id ? { ...entry, medicineName: name } : entry
      );
    }
    return Promise.resolve({ ...updated });
  }

  findLowStock(): Promise<Medicine[]> {
    const low = this.snapshot()
      .filter((m) => m.currentStock <= m.reorderPoint)
      .sort((a, b) => a.currentStock - b.currentStock || a.name.localeCompare(b.name));
    return Promise.resolve(low);
  }

  findExpiring(withinDays: number, today: Date): Promise<Medicine[]> {
    const cutoff = formatIsoDate(addDays(today, withinDays));
    const expiring = this.snapshot()
      .filter((m) => m.expiryDate <= cutoff)
      .sort((a, b) => a.expiryDate.localeCompare(b.expiryDate) || a.name.localeCompare(b.name));
    return Promise.resolve(expiring);
  }

  search(term: string): Promise<Medicine[]> {
    const needle = term.toLowerCase();
    const matches = this.snapshot()
      .filter(
        (m) =>
          m.name.toLowerCase().includes(needle) ||
          (m.category?.toLowerCase().includes(needle) ?? false)
      )
      .sort(byName);
    return Promise.resolve(matches);
  }

  getHistory(filter: StockHistoryFilter): Promise<StockHistoryEntry[]> {
    const entries = this.history
      .filter((entry) => filter.medicineId === undefined || entry.medicineId === filter.medicineId)
      .sort((a, b) => b.changedAt.getTime() - a.changedAt.getTime() || b.id - a.id)
      .slice(0, filter.limit)
      .map((entry) => ({ ...entry }));
    return Promise.resolve(entries);
  }

  delete(id: MedicineId): Promise<boolean> {
    if (!this.medicines.delete(id)) {
      return Promise.resolve(false);
    }
    this.history = this.history.filter((entry) => entry.medicineId !== id);
    return Promise.resolve(true);
  }

  /**
   * Clear all data (for testing)
   */
  clear(): void {
    this.medicines.clear();
    this.history = [];
    this.nextMedicineId = 1;
    this.nextHistoryId = 1;
  }

  private snapshot(): Medicine[] {
    return [...this.medicines.values()].map((m) => ({ ...m }));
  }
}
