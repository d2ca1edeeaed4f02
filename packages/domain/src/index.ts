/**
 * @fileoverview Domain Package Exports
 *
 * Pharmacy inventory rules: input validation, stock and expiry
 * classification, reorder advice, dashboard reports, barcode suggestion
 * mapping and the inventory service with its repository port.
 *
 * @module @rxstock/domain
 *
 * @example
 * ```typescript
 * import {
 *   createInventoryService,
 *   getStockStatus,
 *   daysUntilExpiry,
 *   getExpiryAlert,
 *   suggestMedicineData,
 * } from '@rxstock/domain';
 *
 * const status = getStockStatus(12, 20); // 'Low'
 * const alert = getExpiryAlert(daysUntilExpiry('2026-01-10'));
 * ```
 */

// Inventory
export * from './inventory/index.js';

// Barcode
export * from './barcode/index.js';
