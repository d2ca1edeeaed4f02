import type { StockStatus } from '@rxstock/types';

/** Stock above the reorder point but within this factor of it is a Warning */
export const WARNING_STOCK_FACTOR = 1.5;

/**
 * Classify stock against its reorder point.
 * Derived on every read; never persisted.
 */
export function getStockStatus(currentStock: number, reorderPoint: number): StockStatus {
  if (currentStock <= 0) {
    return 'Critical';
  }
  if (currentStock <= reorderPoint) {
    return 'Low';
  }
  if (currentStock <= reorderPoint * WARNING_STOCK_FACTOR) {
    return 'Warning';
  }
  return 'Good';
}
