/**
 * Common schemas shared across the platform
 */
import { z } from 'zod';

function isCalendarDate(value: string): boolean {
  const date = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
}

/**
 * Calendar date in fixed YYYY-MM-DD format
 */
export const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must use YYYY-MM-DD format')
  .refine(isCalendarDate, 'Invalid calendar date')
  .describe('Calendar date (YYYY-MM-DD)');

/**
 * ISO 8601 timestamp
 */
export const TimestampSchema = z.coerce.date().describe('ISO 8601 timestamp');

/**
 * Optional free-text field; blank strings collapse to null
 */
export const OptionalTextSchema = z
  .string()
  .trim()
  .max(255)
  .nullish()
  .transform((value) => (value ? value : null));

export type IsoDate = z.infer<typeof IsoDateSchema>;
export type Timestamp = z.infer<typeof TimestampSchema>;
