/**
 * @fileoverview Inventory Module
 *
 * @module domain/inventory
 */

export {
  type ValidationResult,
  MAX_UNIT_PRICE,
  MAX_STOCK_QUANTITY,
  MAX_BATCH_NUMBER_LENGTH,
  validateMedicineName,
  validateBatchNumber,
  validatePrice,
  validateStockQuantity,
  assertValidMedicineInput,
} from './validators.js';

export { WARNING_STOCK_FACTOR, getStockStatus } from './stock-status.js';

export {
  type ExpirySeverity,
  type ExpiryAlert,
  EXPIRY_THRESHOLDS,
  parseExpiryDate,
  formatIsoDate,
  addDays,
  daysUntilExpiry,
  getExpiryAlert,
} from './expiry.js';

export {
  type CriticalityLevel,
  type CriticalityBuckets,
  MAX_ALERT_PRIORITY,
  CRITICALITY_THRESHOLDS,
  calculateAlertPriority,
  getCriticalityLevel,
  categorizeByCriticality,
} from './alert-priority.js';

export {
  type ReorderSuggestionInput,
  MIN_BLIND_ORDER_QUANTITY,
  SAFETY_STOCK_DAYS,
  DEFAULT_LEAD_TIME_DAYS,
  suggestReorderQuantity,
} from './reorder-advisor.js';

export {
  type MedicineSummary,
  type InventoryDashboard,
  type InventoryReport,
  type ExpiryBin,
  EXPIRING_SOON_DAYS,
  HIGH_VALUE_ITEM_LIMIT,
  UNCATEGORIZED,
  formatCurrency,
  highlightSearchTerm,
  toMedicineSummary,
  buildDashboard,
  buildInventoryReport,
  getExpiryBin,
} from './inventory-report.js';

export {
  type StockHistoryFilter,
  type IInventoryRepository,
  DEFAULT_STOCK_CHANGE_REASON,
  DEFAULT_HISTORY_LIMIT,
} from './interfaces.js';

export {
  type InventoryServiceDeps,
  InventoryService,
  createInventoryService,
} from './inventory-service.js';
