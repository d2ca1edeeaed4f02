/**
 * InventoryService workflows against the in-memory repository
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { NotFoundError, ValidationError } from '@rxstock/core';
import type { CreateMedicineInput } from '@rxstock/types';
import { createInventoryService, type InventoryService } from '@rxstock/domain';
import { InMemoryInventoryRepository } from '../repositories/InMemoryInventoryRepository.js';

const TODAY = new Date(2025, 5, 15);

const amoxicillin: CreateMedicineInput = {
  name: 'Amoxicillin 500mg',
  currentStock: 80,
  reorderPoint: 20,
  expiryDate: '2025-06-20',
  unitPrice: 0.45,
  batchNumber: 'AMX-2024-01',
  supplier: 'MedSupply',
  category: 'Antibiotics',
  location: 'Shelf A2',
};

const insulin: CreateMedicineInput = {
  name: 'Insulin Glargine',
  currentStock: 3,
  reorderPoint: 5,
  expiryDate: '2025-09-30',
  unitPrice: 25,
  category: 'Diabetes',
};

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the operation to fail');
}

describe('InventoryService', () => {
  let repository: InMemoryInventoryRepository;
  let service: InventoryService;

  beforeEach(() => {
    repository = new InMemoryInventoryRepository();
    service = createInventoryService({ repository });
  });

  describe('addMedicine', () => {
    it('should store a valid medicine with blank optional fields as null', async () => {
      const id = await service.addMedicine({ ...amoxicillin, supplier: '  ', location: undefined });

      const stored = await service.getMedicine(id);
      expect(stored.name).toBe('Amoxicillin 500mg');
      expect(stored.supplier).toBeNull();
      expect(stored.location).toBeNull();
      expect(stored.batchNumber).toBe('AMX-2024-01');
    });

    it('should report every invalid field and store nothing', async () => {
      const error = await captureError(
        service.addMedicine({ ...amoxicillin, name: 'A', unitPrice: -1, batchNumber: 'AMX 01' })
      );

      expect(error).toBeInstanceOf(ValidationError);
      expect(error instanceof ValidationError && error.details).toEqual({
        name: ['Medicine name must be at least 2 characters long'],
        unitPrice: ['Price cannot be negative'],
        batchNumber: ['Batch number can only contain letters, numbers, hyphens, underscores, and slashes'],
      });
      expect(await service.listMedicines()).toEqual([]);
    });

    it('should reject an impossible expiry date', async () => {
      await expect(service.addMedicine({ ...amoxicillin, expiryDate: '2025-02-30' })).rejects.toThrow(
        ValidationError
      );
    });
  });

  describe('updateStock', () => {
    it('should record the previous level with the default reason', async () => {
      const id = await service.addMedicine(amoxicillin);

      const entry = await service.updateStock(id, 50);

      expect(entry.oldStock).toBe(80);
      expect(entry.newStock).toBe(50);
      expect(entry.changeReason).toBe('Manual update');
      expect((await service.getMedicine(id)).currentStock).toBe(50);
    });

    it('should keep a long free-text reason whole', async () => {
      const id = await service.addMedicine(amoxicillin);
      const reason = `Recount after audit: ${'shelf discrepancy '.repeat(20)}`.trim();

      const entry = await service.updateStock(id, 75, reason);

      expect(reason.length).toBeGreaterThan(255);
      expect(entry.changeReason).toBe(reason);
      expect((await service.getHistory({ medicineId: id }))[0]?.changeReason).toBe(reason);
    });

    it('should reject a negative or fractional level without writing history', async () => {
      const id = await service.addMedicine(amoxicillin);

      await expect(service.updateStock(id, -5)).rejects.toThrow('Stock quantity cannot be negative');
      await expect(service.updateStock(id, 2.5)).rejects.toThrow('Stock quantity must be a valid whole number');
      expect(await service.getHistory({ medicineId: id })).toEqual([]);
    });

    it('should report an unknown medicine', async () => {
      await expect(service.updateStock(999, 10)).rejects.toThrow('Medicine 999 not found');
    });
  });

  describe('adjustStock', () => {
    it('should apply a relative change', async () => {
      const id = await service.addMedicine(amoxicillin);

      const entry = await service.adjustStock(id, -30, 'Dispensed');

      expect([entry.oldStock, entry.newStock, entry.changeReason]).toEqual([80, 50, 'Dispensed']);
    });

    it('should clamp at zero', async () => {
      const id = await service.addMedicine(insulin);

      const entry = await service.adjustStock(id, -10);

      expect(entry.newStock).toBe(0);
    });

    it('should reject a fractional delta', async () => {
      const id = await service.addMedicine(insulin);

      await expect(service.adjustStock(id, 1.5)).rejects.toThrow('Stock adjustment must be a whole number');
    });
  });

  describe('editMedicine', () => {
    it('should update descriptive fields', async () => {
      const id = await service.addMedicine(amoxicillin);

      const updated = await service.editMedicine(id, { supplier: 'PharmaDirect', unitPrice: 0.5 });

      expect(updated.supplier).toBe('PharmaDirect');
      expect(updated.unitPrice).toBe(0.5);
      expect(updated.currentStock).toBe(80);
    });

    it('should apply the field validators', async () => {
      const id = await service.addMedicine(amoxicillin);

      await expect(service.editMedicine(id, { name: '<b>' })).rejects.toThrow(
        'Medicine name contains invalid characters'
      );
    });

    it('should reject an empty patch', async () => {
      const id = await service.addMedicine(amoxicillin);

      await expect(service.editMedicine(id, {})).rejects.toThrow('At least one field must be provided');
    });
  });

  describe('deleteMedicine', () => {
    it('should remove the medicine and its history', async () => {
      const id = await service.addMedicine(amoxicillin);
      await service.updateStock(id, 50, 'Dispensed');

      await service.deleteMedicine(id);

      await expect(service.getMedicine(id)).rejects.toThrow(NotFoundError);
      expect(await service.getHistory()).toEqual([]);
    });

    it('should report an unknown medicine', async () => {
      await expect(service.deleteMedicine(999)).rejects.toThrow(NotFoundError);
    });
  });

  describe('queries', () => {
    let amoxicillinId: number;
    let insulinId: number;

    beforeEach(async () => {
      amoxicillinId = await service.addMedicine(amoxicillin);
      insulinId = await service.addMedicine(insulin);
    });

    it('should list low stock', async () => {
      expect((await service.getLowStock()).map((m) => m.id)).toEqual([insulinId]);
    });

    it('should list medicines expiring within the window', async () => {
      expect((await service.getExpiring(30, TODAY)).map((m) => m.id)).toEqual([amoxicillinId]);
      expect((await service.getExpiring(120, TODAY)).map((m) => m.id)).toEqual([amoxicillinId, insulinId]);
    });

    it('should reject a negative expiry window', async () => {
      await expect(service.getExpiring(-1, TODAY)).rejects.toThrow(ValidationError);
    });

    it('should return everything for a blank search', async () => {
      expect(await service.search('   ')).toHaveLength(2);
    });

    it('should search by category', async () => {
      expect((await service.search(' diabetes ')).map((m) => m.name)).toEqual(['Insulin Glargine']);
    });

    it('should cap history with the requested limit', async () => {
      await service.updateStock(amoxicillinId, 70);
      await service.updateStock(amoxicillinId, 60);
      await service.updateStock(insulinId, 10);

      expect(await service.getHistory({ limit: 2 })).toHaveLength(2);
      expect(await service.getHistory({ medicineId: insulinId })).toHaveLength(1);
    });

    it('should reject an out-of-range history limit', async () => {
      await expect(service.getHistory({ limit: 0 })).rejects.toThrow('Invalid history query');
    });

    it('should build the dashboard from current stock', async () => {
      const dashboard = await service.getDashboard(TODAY);

      expect(dashboard.totalMedicines).toBe(2);
      expect(dashboard.totalInventoryValue).toBe(111);
      expect(dashboard.lowStockCount).toBe(1);
      expect(dashboard.expiringSoonCount).toBe(1);
      expect(dashboard.criticalAlerts.map((s) => s.name)).toEqual(['Amoxicillin 500mg']);
      expect(dashboard.stockStatusDistribution).toEqual({ Good: 1, Warning: 0, Low: 1, Critical: 0 });
    });

    it('should build the report', async () => {
      const report = await service.getReport(TODAY);

      expect(report.totalValue).toBe(111);
    });
  });
});
