/**
 * @fileoverview Alert Priority Scoring
 *
 * Additive score combining stock urgency and expiry urgency, used to rank
 * and bucket medicines on the dashboard.
 *
 * @module domain/inventory/alert-priority
 */

import type { Medicine } from '@rxstock/types';
import { daysUntilExpiry } from './expiry.js';

export const MAX_ALERT_PRIORITY = 20;

export const CRITICALITY_THRESHOLDS = {
  critical: 15,
  high: 10,
  medium: 5,
} as const;

export type CriticalityLevel = 'critical' | 'high' | 'medium' | 'low';

export type CriticalityBuckets<T> = Record<CriticalityLevel, T[]>;

function stockScore(currentStock: number, reorderPoint: number): number {
  if (currentStock <= 0) return 10;
  if (currentStock <= reorderPoint * 0.5) return 8;
  if (currentStock <= reorderPoint) return 5;
  return 0;
}

function expiryScore(days: number | null): number {
  if (days === null) return 0;
  if (days < 0) return 10;
  if (days <= 7) return 8;
  if (days <= 30) return 5;
  return 0;
}

/**
 * Score in [0, 20]. Unknown expiry contributes nothing.
 */
export function calculateAlertPriority(
  currentStock: number,
  reorderPoint: number,
  days: number | null
): number {
  return Math.min(stockScore(currentStock, reorderPoint) + expiryScore(days), MAX_ALERT_PRIORITY);
}

export function getCriticalityLevel(priority: number): CriticalityLevel {
  if (priority >= CRITICALITY_THRESHOLDS.critical) return 'critical';
  if (priority >= CRITICALITY_THRESHOLDS.high) return 'high';
  if (priority >= CRITICALITY_THRESHOLDS.medium) return 'medium';
  return 'low';
}

/**
 * Partition medicines by priority. Every medicine lands in exactly one
 * bucket, and input order is kept within each bucket.
 */
export function categorizeByCriticality<
  T extends Pick<Medicine, 'currentStock' | 'reorderPoint' | 'expiryDate'>,
>(medicines: readonly T[], today: Date = new Date()): CriticalityBuckets<T> {
  const buckets: CriticalityBuckets<T> = { critical: [], high: [], medium: [], low: [] };

  for (const medicine of medicines) {
    const priority = calculateAlertPriority(
      medicine.currentStock,
      medicine.reorderPoint,
      daysUntilExpiry(medicine.expiryDate, today)
    );
    buckets[getCriticalityLevel(priority)].push(medicine);
  }

  return buckets;
}
