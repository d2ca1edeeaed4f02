/**
 * rxstock Types Package
 *
 * Central type definitions and Zod schemas for the pharmacy inventory platform.
 * All schemas live in the schemas/ directory as the single source of truth.
 *
 * @module @rxstock/types
 *
 * ### Domain Schemas (`schemas/`)
 * - Common validation (calendar dates, timestamps, optional text)
 * - Medicines, stock status and stock history
 * - Barcode lookups, AI product analysis and form suggestions
 */
export * from './schemas/index.js';
