/**
 * @fileoverview Inventory Dashboard and Report Builders
 *
 * Pure aggregations over the current medicine list. Nothing here reads the
 * store; callers pass the medicines in.
 *
 * @module domain/inventory/inventory-report
 */

import type { Medicine, StockStatus } from '@rxstock/types';
import { getStockStatus } from './stock-status.js';
import { daysUntilExpiry, EXPIRY_THRESHOLDS } from './expiry.js';

// ============================================================================
// FORMATTING
// ============================================================================

const currencyFormatter = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Format an amount as `$1,234.50`
 */
export function formatCurrency(amount: number): string {
  return currencyFormatter.format(amount);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Wrap every case-insensitive occurrence of `term` in `**`
 */
export function highlightSearchTerm(text: string, term: string): string {
  if (!text || !term) {
    return text;
  }
  return text.replace(new RegExp(`(${escapeRegExp(term)})`, 'gi'), '**$1**');
}

// ============================================================================
// SUMMARIES
// ============================================================================

export interface MedicineSummary extends Medicine {
  readonly daysUntilExpiry: number | null;
  readonly stockStatus: StockStatus;
  readonly totalValue: number;
}

function roundCurrency(amount: number): number {
  return Math.round(amount * 100) / 100;
}

export function toMedicineSummary(medicine: Medicine, today: Date = new Date()): MedicineSummary {
  return {
    ...medicine,
    daysUntilExpiry: daysUntilExpiry(medicine.expiryDate, today),
    stockStatus: getStockStatus(medicine.currentStock, medicine.reorderPoint),
    totalValue: roundCurrency(medicine.currentStock * medicine.unitPrice),
  };
}

// ============================================================================
// DASHBOARD
// ============================================================================

export const EXPIRING_SOON_DAYS = 30;

export interface InventoryDashboard {
  readonly totalMedicines: number;
  readonly totalInventoryValue: number;
  readonly lowStockCount: number;
  readonly expiringSoonCount: number;
  /** Medicines expiring within 7 days, soonest first */
  readonly criticalAlerts: readonly MedicineSummary[];
  /** Medicines at or below their reorder point, lowest stock first */
  readonly lowStockWarnings: readonly MedicineSummary[];
  readonly stockStatusDistribution: Readonly<Record<StockStatus, number>>;
}

function isExpiringWithin(summary: MedicineSummary, days: number): boolean {
  return summary.daysUntilExpiry !== null && summary.daysUntilExpiry <= days;
}

function byDaysUntilExpiry(a: MedicineSummary, b: MedicineSummary): number {
  return (a.daysUntilExpiry ?? Infinity) - (b.daysUntilExpiry ?? Infinity);
}

export function buildDashboard(
  medicines: readonly Medicine[],
  today: Date = new Date()
): InventoryDashboard {
  const summaries = medicines.map((medicine) => toMedicineSummary(medicine, today));

  const lowStock = summaries
    .filter((s) => s.currentStock <= s.reorderPoint)
    .sort((a, b) => a.currentStock - b.currentStock);

  const distribution: Record<StockStatus, number> = { Good: 0, Warning: 0, Low: 0, Critical: 0 };
  for (const summary of summaries) {
    distribution[summary.stockStatus] += 1;
  }

  return {
    totalMedicines: summaries.length,
    totalInventoryValue: roundCurrency(summaries.reduce((sum, s) => sum + s.totalValue, 0)),
    lowStockCount: lowStock.length,
    expiringSoonCount: summaries.filter((s) => isExpiringWithin(s, EXPIRING_SOON_DAYS)).length,
    criticalAlerts: summaries
      .filter((s) => isExpiringWithin(s, EXPIRY_THRESHOLDS.critical))
      .sort(byDaysUntilExpiry),
    lowStockWarnings: lowStock,
    stockStatusDistribution: distribution,
  };
}

// ============================================================================
// REPORT
// ============================================================================

export type ExpiryBin = '< 30 days' | '30-90 days' | '90-180 days' | '> 180 days';

export const HIGH_VALUE_ITEM_LIMIT = 10;

export interface InventoryReport {
  readonly totalValue: number;
  /** Mean over medicines with a readable expiry date; null when there are none */
  readonly averageDaysToExpiry: number | null;
  readonly totalStockUnits: number;
  readonly activeSuppliers: number;
  readonly valueByCategory: Readonly<Record<string, number>>;
  readonly expiryTimeline: Readonly<Record<ExpiryBin, number>>;
  readonly lowStock: readonly MedicineSummary[];
  readonly expiringSoon: readonly MedicineSummary[];
  readonly highValueItems: readonly MedicineSummary[];
}

export const UNCATEGORIZED = 'Uncategorized';

export function getExpiryBin(days: number): ExpiryBin {
  if (days < 30) return '< 30 days';
  if (days < 90) return '30-90 days';
  if (days < 180) return '90-180 days';
  return '> 180 days';
}

export function buildInventoryReport(
  medicines: readonly Medicine[],
  today: Date = new Date()
): InventoryReport {
  const summaries = medicines.map((medicine) => toMedicineSummary(medicine, today));

  const knownExpiry = summaries.flatMap((s) => (s.daysUntilExpiry === null ? [] : [s.daysUntilExpiry]));
  const averageDaysToExpiry =
    knownExpiry.length > 0 ? knownExpiry.reduce((sum, d) => sum + d, 0) / knownExpiry.length : null;

  // Category names are free text, so they never index a plain object
  const categoryTotals = new Map<string, number>();
  for (const summary of summaries) {
    const category = summary.category ?? UNCATEGORIZED;
    categoryTotals.set(category, roundCurrency((categoryTotals.get(category) ?? 0) + summary.totalValue));
  }

  const expiryTimeline: Record<ExpiryBin, number> = {
    '< 30 days': 0,
    '30-90 days': 0,
    '90-180 days': 0,
    '> 180 days': 0,
  };
  for (const days of knownExpiry) {
    expiryTimeline[getExpiryBin(days)] += 1;
  }

  const suppliers = new Set(
    summaries.flatMap((s) => (s.supplier === null ? [] : [s.supplier]))
  );

  return {
    totalValue: roundCurrency(summaries.reduce((sum, s) => sum + s.totalValue, 0)),
    averageDaysToExpiry,
    totalStockUnits: summaries.reduce((sum, s) => sum + s.currentStock, 0),
    activeSuppliers: suppliers.size,
    valueByCategory: Object.fromEntries(categoryTotals),
    expiryTimeline,
    lowStock: summaries.filter((s) => s.stockStatus === 'Low' || s.stockStatus === 'Critical'),
    expiringSoon: summaries.filter((s) => isExpiringWithin(s, EXPIRING_SOON_DAYS)),
    highValueItems: [...summaries]
      .sort((a, b) => b.totalValue - a.totalValue)
      .slice(0, HIGH_VALUE_ITEM_LIMIT),
  };
}
