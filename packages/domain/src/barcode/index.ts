/**
 * @fileoverview Barcode Module
 *
 * @module domain/barcode
 */

export { findJsonObjectText, extractJsonObject } from './json-extraction.js';
export {
  BARCODE_BATCH_PREFIX,
  DEFAULT_SUGGESTED_REORDER_POINT,
  UNKNOWN_PRODUCT_NAME,
  parseSuggestedPrice,
  parseSuggestedReorderPoint,
  suggestMedicineData,
  summarizeBarcodeResult,
} from './suggestions.js';
export { MAX_SCAN_HISTORY, ScanHistory } from './scan-history.js';
