import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { getStockStatus } from '../inventory/stock-status.js';
import { calculateAlertPriority, categorizeByCriticality } from '../inventory/alert-priority.js';
import { formatIsoDate, addDays } from '../inventory/expiry.js';

/**
 * Property-Based Tests for the inventory classifier
 *
 * Properties tested:
 * 1. Stock status boundaries hold for all stock levels
 * 2. Alert priority stays within [0, 20]
 * 3. Alert priority never decreases as stock or days to expiry decrease
 * 4. Criticality buckets partition the input with no overlap and no loss
 */

const TODAY = new Date(2025, 5, 15);

const stockArbitrary = fc.integer({ min: -100, max: 100_000 });
const reorderPointArbitrary = fc.integer({ min: 0, max: 10_000 });
const daysArbitrary = fc.option(fc.integer({ min: -3650, max: 3650 }), { nil: null });

const medicineArbitrary = fc.record({
  currentStock: stockArbitrary,
  reorderPoint: reorderPointArbitrary,
  expiryDate: fc
    .integer({ min: -400, max: 800 })
    .map((offset) => formatIsoDate(addDays(TODAY, offset))),
});

describe('Stock status properties', () => {
  it('should be Critical for any stock at or below zero', () => {
    fc.assert(
      fc.property(fc.integer({ min: -1_000_000, max: 0 }), reorderPointArbitrary, (stock, rp) => {
        expect(getStockStatus(stock, rp)).toBe('Critical');
      })
    );
  });

  it('should be Warning strictly above the reorder point up to 1.5x', () => {
    const warningCase = fc
      .integer({ min: 2, max: 10_000 })
      .chain((rp) => fc.tuple(fc.constant(rp), fc.integer({ min: rp + 1, max: Math.floor(rp * 1.5) })));

    fc.assert(
      fc.property(warningCase, ([rp, stock]) => {
        expect(getStockStatus(stock, rp)).toBe('Warning');
      })
    );
  });

  it('should be Low, not Warning, exactly at the reorder point', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 10_000 }), (rp) => {
        expect(getStockStatus(rp, rp)).toBe('Low');
      })
    );
  });
});

describe('Alert priority properties', () => {
  it('should always be within [0, 20]', () => {
    fc.assert(
      fc.property(stockArbitrary, reorderPointArbitrary, daysArbitrary, (stock, rp, days) => {
        const priority = calculateAlertPriority(stock, rp, days);
        expect(priority).toBeGreaterThanOrEqual(0);
        expect(priority).toBeLessThanOrEqual(20);
      })
    );
  });

  it('should not decrease as stock decreases', () => {
    fc.assert(
      fc.property(
        stockArbitrary,
        stockArbitrary,
        reorderPointArbitrary,
        daysArbitrary,
        (a, b, rp, days) => {
          const lower = Math.min(a, b);
          const higher = Math.max(a, b);
          expect(calculateAlertPriority(lower, rp, days)).toBeGreaterThanOrEqual(
            calculateAlertPriority(higher, rp, days)
          );
        }
      )
    );
  });

  it('should not decrease as days until expiry decrease', () => {
    fc.assert(
      fc.property(
        stockArbitrary,
        reorderPointArbitrary,
        fc.integer({ min: -3650, max: 3650 }),
        fc.integer({ min: -3650, max: 3650 }),
        (stock, rp, a, b) => {
          expect(calculateAlertPriority(stock, rp, Math.min(a, b))).toBeGreaterThanOrEqual(
            calculateAlertPriority(stock, rp, Math.max(a, b))
          );
        }
      )
    );
  });
});

describe('Criticality partition properties', () => {
  it('should place every medicine in exactly one bucket', () => {
    fc.assert(
      fc.property(fc.array(medicineArbitrary, { maxLength: 50 }), (medicines) => {
        const buckets = categorizeByCriticality(medicines, TODAY);
        const all = [...buckets.critical, ...buckets.high, ...buckets.medium, ...buckets.low];

        expect(all).toHaveLength(medicines.length);
        expect(new Set(all).size).toBe(medicines.length);
        for (const medicine of medicines) {
          expect(all).toContain(medicine);
        }
      })
    );
  });
});
