/**
 * Reorder quantity suggestion
 */

export interface ReorderSuggestionInput {
  currentStock: number;
  reorderPoint: number;
  /** Units consumed per day; omit when no usage data exists */
  avgDailyUsage?: number;
  /** Supplier lead time (default: 7 days) */
  leadTimeDays?: number;
}

/** Minimum order size when no usage data exists */
export const MIN_BLIND_ORDER_QUANTITY = 30;
/** Days of usage held as safety stock */
export const SAFETY_STOCK_DAYS = 3;
export const DEFAULT_LEAD_TIME_DAYS = 7;

/**
 * Suggested number of units to order.
 *
 * Without usage data: max(2 x reorder point, 30).
 * With usage data: usage over the lead time plus safety stock, minus what is
 * on hand, never less than the reorder point. Truncated to whole units.
 */
export function suggestReorderQuantity(input: ReorderSuggestionInput): number {
  const { currentStock, reorderPoint, avgDailyUsage, leadTimeDays = DEFAULT_LEAD_TIME_DAYS } = input;

  let quantity: number;
  if (avgDailyUsage === undefined) {
    quantity = Math.max(reorderPoint * 2, MIN_BLIND_ORDER_QUANTITY);
  } else {
    const safetyStock = avgDailyUsage * SAFETY_STOCK_DAYS;
    const needed = avgDailyUsage * leadTimeDays + safetyStock - currentStock;
    quantity = Math.max(needed, reorderPoint);
  }

  return Math.max(Math.trunc(quantity), 0);
}
