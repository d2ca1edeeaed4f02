/**
 * @fileoverview Inventory Service
 *
 * Entry point for inventory workflows. Validates input, delegates persistence
 * to the repository port and derives display data on read.
 *
 * @module domain/inventory/inventory-service
 */

import { createLogger, NotFoundError, ValidationError } from '@rxstock/core';
import {
  StockHistoryQuerySchema,
  UpdateMedicineDetailsSchema,
  type CreateMedicineInput,
  type Medicine,
  type MedicineId,
  type StockHistoryEntry,
  type StockHistoryQuery,
  type UpdateMedicineDetailsInput,
} from '@rxstock/types';
import {
  DEFAULT_STOCK_CHANGE_REASON,
  type IInventoryRepository,
} from './interfaces.js';
import {
  assertValidMedicineInput,
  validateBatchNumber,
  validateMedicineName,
  validatePrice,
  validateStockQuantity,
  type ValidationResult,
} from './validators.js';
import {
  buildDashboard,
  buildInventoryReport,
  EXPIRING_SOON_DAYS,
  type InventoryDashboard,
  type InventoryReport,
} from './inventory-report.js';

const logger = createLogger({ name: 'inventory-service' });

export interface InventoryServiceDeps {
  repository: IInventoryRepository;
}

function medicineLabel(id: MedicineId): string {
  return `Medicine ${id}`;
}

function assertValid(field: string, result: ValidationResult): void {
  if (!result.valid) {
    throw new ValidationError(result.message, { [field]: [result.message] });
  }
}

/**
 * Inventory Service
 *
 * @example
 * ```typescript
 * const service = createInventoryService({ repository });
 *
 * const id = await service.addMedicine({
 *   name: 'Amoxicillin 500mg',
 *   currentStock: 80,
 *   reorderPoint: 20,
 *   expiryDate: '2026-03-31',
 *   unitPrice: 0.45,
 * });
 * await service.updateStock(id, 50, 'Dispensed');
 * ```
 */
export class InventoryService {
  private readonly repository: IInventoryRepository;

  constructor(deps: InventoryServiceDeps) {
    this.repository = deps.repository;
  }

  // ==========================================================================
  // MUTATIONS
  // ==========================================================================

  async addMedicine(input: CreateMedicineInput): Promise<MedicineId> {
    const medicine = assertValidMedicineInput(input);
    const id = await this.repository.add(medicine);
    logger.info({ medicineId: id, name: medicine.name }, 'Medicine added');
    return id;
  }

  /**
   * Set an absolute stock level and record the change in history
   */
  async updateStock(
    id: MedicineId,
    newStock: number,
    reason: string = DEFAULT_STOCK_CHANGE_REASON
  ): Promise<StockHistoryEntry> {
    assertValid('currentStock', validateStockQuantity(newStock));

    const entry = await this.repository.updateStock(id, newStock, reason);
    logger.info(
      { medicineId: id, oldStock: entry.oldStock, newStock: entry.newStock, reason },
      'Stock updated'
    );
    return entry;
  }

  /**
   * Apply a relative stock change, clamped at zero
   */
  async adjustStock(
    id: MedicineId,
    delta: number,
    reason: string = DEFAULT_STOCK_CHANGE_REASON
  ): Promise<StockHistoryEntry> {
    if (!Number.isInteger(delta)) {
      throw new ValidationError('Stock adjustment must be a whole number', { delta: [String(delta)] });
    }
    const medicine = await this.getMedicine(id);
    const newStock = Math.max(0, medicine.currentStock + delta);
    return this.updateStock(id, newStock, reason);
  }

  /**
   * Edit descriptive fields; stock changes go through updateStock
   */
  async editMedicine(id: MedicineId, input: UpdateMedicineDetailsInput): Promise<Medicine> {
    if (input.name !== undefined) assertValid('name', validateMedicineName(input.name));
    if (input.batchNumber !== undefined) assertValid('batchNumber', validateBatchNumber(input.batchNumber));
    if (input.unitPrice !== undefined) assertValid('unitPrice', validatePrice(input.unitPrice));
    if (input.reorderPoint !== undefined) assertValid('reorderPoint', validateStockQuantity(input.reorderPoint));

    const parsed = UpdateMedicineDetailsSchema.safeParse(input);
    if (!parsed.success) {
      const flattened = parsed.error.flatten();
      throw new ValidationError(flattened.formErrors[0] ?? 'Invalid medicine details', flattened.fieldErrors);
    }

    const medicine = await this.repository.updateDetails(id, parsed.data);
    logger.info({ medicineId: id, fields: Object.keys(parsed.data) }, 'Medicine details updated');
    return medicine;
  }

  async deleteMedicine(id: MedicineId): Promise<void> {
    const deleted = await this.repository.delete(id);
    if (!deleted) {
      throw new NotFoundError(medicineLabel(id));
    }
    logger.info({ medicineId: id }, 'Medicine deleted');
  }

  // ==========================================================================
  // QUERIES
  // ==========================================================================

  listMedicines(): Promise<Medicine[]> {
    return this.repository.listAll();
  }

  async getMedicine(id: MedicineId): Promise<Medicine> {
    const medicine = await this.repository.findById(id);
    if (!medicine) {
      throw new NotFoundError(medicineLabel(id));
    }
    return medicine;
  }

  getLowStock(): Promise<Medicine[]> {
    return this.repository.findLowStock();
  }

  async getExpiring(withinDays: number = EXPIRING_SOON_DAYS, today: Date = new Date()): Promise<Medicine[]> {
    if (!Number.isInteger(withinDays) || withinDays < 0) {
      throw new ValidationError('Expiry window must be a non-negative whole number of days', {
        withinDays: [String(withinDays)],
      });
    }
    return this.repository.findExpiring(withinDays, today);
  }

  async search(term: string): Promise<Medicine[]> {
    const trimmed = term.trim();
    if (trimmed === '') {
      return this.repository.listAll();
    }
    const results = await this.repository.search(trimmed);
    logger.debug({ term: trimmed, matches: results.length }, 'Inventory search');
    return results;
  }

  async getHistory(query: StockHistoryQuery = {}): Promise<StockHistoryEntry[]> {
    const parsed = StockHistoryQuerySchema.safeParse(query);
    if (!parsed.success) {
      throw new ValidationError('Invalid history query', parsed.error.flatten().fieldErrors);
    }
    const { medicineId, limit } = parsed.data;
    return this.repository.getHistory(medicineId === undefined ? { limit } : { medicineId, limit });
  }

  // ==========================================================================
  // DASHBOARD & REPORTS
  // ==========================================================================

  async getDashboard(today: Date = new Date()): Promise<InventoryDashboard> {
    return buildDashboard(await this.repository.listAll(), today);
  }

  async getReport(today: Date = new Date()): Promise<InventoryReport> {
    return buildInventoryReport(await this.repository.listAll(), today);
  }
}

export function createInventoryService(deps: InventoryServiceDeps): InventoryService {
  return new InventoryService(deps);
}
