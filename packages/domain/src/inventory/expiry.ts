/**
 * @fileoverview Expiry Classification
 *
 * Calendar-day arithmetic on `YYYY-MM-DD` expiry dates. An expiry that
 * cannot be read is reported as `null` so callers can tell "unknown"
 * apart from "expires today".
 *
 * @module domain/inventory/expiry
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export type ExpirySeverity = 'expired' | 'today' | 'critical' | 'warning' | 'info' | 'good' | 'unknown';

export interface ExpiryAlert {
  readonly severity: ExpirySeverity;
  readonly message: string;
  readonly daysUntilExpiry: number | null;
}

/** Upper bounds (inclusive) of the critical, warning and info tiers */
export const EXPIRY_THRESHOLDS = {
  critical: 7,
  warning: 30,
  info: 90,
} as const;

/**
 * Parse a `YYYY-MM-DD` string into its UTC day number.
 * Returns null for malformed or impossible dates such as `2025-02-30`.
 */
function isoDateToEpochDay(value: string): number | null {
  const match = ISO_DATE_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const utc = Date.UTC(year, month - 1, day);
  const check = new Date(utc);
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }
  return Math.round(utc / MS_PER_DAY);
}

/**
 * Day number of the local calendar date of `date`
 */
function localDateToEpochDay(date: Date): number | null {
  if (Number.isNaN(date.getTime())) {
    return null;
  }
  return Math.round(Date.UTC(date.getFullYear(), date.getMonth(), date.getDate()) / MS_PER_DAY);
}

/**
 * Validate and normalise an expiry date to `YYYY-MM-DD`
 */
export function parseExpiryDate(value: Date | string): string | null {
  if (typeof value === 'string') {
    return isoDateToEpochDay(value) === null ? null : value.trim();
  }
  if (Number.isNaN(value.getTime())) {
    return null;
  }
  return formatIsoDate(value);
}

/**
 * Format the local calendar date of `date` as `YYYY-MM-DD`
 */
export function formatIsoDate(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Add whole days to a local calendar date
 */
export function addDays(date: Date, days: number): Date {
  const result = new Date(date.getFullYear(), date.getMonth(), date.getDate());
  result.setDate(result.getDate() + days);
  return result;
}

/**
 * Signed number of calendar days from `today` until `expiryDate`.
 * Negative once expired, 0 on the expiry day, null when the date is unreadable.
 */
export function daysUntilExpiry(expiryDate: Date | string, today: Date = new Date()): number | null {
  const expiryDay =
    typeof expiryDate === 'string' ? isoDateToEpochDay(expiryDate) : localDateToEpochDay(expiryDate);
  const todayDay = localDateToEpochDay(today);
  if (expiryDay === null || todayDay === null) {
    return null;
  }
  return expiryDay - todayDay;
}

export function getExpiryAlert(days: number | null): ExpiryAlert {
  if (days === null) {
    return { severity: 'unknown', message: 'Expiry date unknown', daysUntilExpiry: null };
  }
  if (days < 0) {
    return { severity: 'expired', message: `EXPIRED ${Math.abs(days)} days ago`, daysUntilExpiry: days };
  }
  if (days === 0) {
    return { severity: 'today', message: 'EXPIRES TODAY', daysUntilExpiry: days };
  }
  if (days <= EXPIRY_THRESHOLDS.critical) {
    return { severity: 'critical', message: `CRITICAL: Expires in ${days} days`, daysUntilExpiry: days };
  }
  if (days <= EXPIRY_THRESHOLDS.warning) {
    return { severity: 'warning', message: `WARNING: Expires in ${days} days`, daysUntilExpiry: days };
  }
  if (days <= EXPIRY_THRESHOLDS.info) {
    return { severity: 'info', message: `INFO: Expires in ${days} days`, daysUntilExpiry: days };
  }
  return { severity: 'good', message: `Good: ${days} days until expiry`, daysUntilExpiry: days };
}
