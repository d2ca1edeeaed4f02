/**
 * Consolidated schema exports
 */
export * from './common.js';
export * from './medicine.js';
export * from './barcode.js';
