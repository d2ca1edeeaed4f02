/**
 * Medicine and stock history schemas
 *
 * A Medicine row is the single persisted inventory record. Stock changes are
 * appended to the stock history log and never edited afterwards.
 */
import { z } from 'zod';
import { IsoDateSchema, OptionalTextSchema, TimestampSchema } from './common.js';

export const MedicineIdSchema = z.number().int().positive().describe('Medicine identifier');

/**
 * Derived stock classification, recomputed on every read
 */
export const StockStatusSchema = z.enum(['Good', 'Warning', 'Low', 'Critical']);

export const StockQuantitySchema = z
  .number()
  .int('Stock quantity must be a whole number')
  .min(0, 'Stock quantity cannot be negative');

export const UnitPriceSchema = z.number().finite().min(0, 'Price cannot be negative');

export const MedicineSchema = z.object({
  id: MedicineIdSchema,
  name: z.string().min(1),
  currentStock: StockQuantitySchema,
  reorderPoint: StockQuantitySchema,
  expiryDate: IsoDateSchema,
  unitPrice: UnitPriceSchema,
  batchNumber: z.string().nullable(),
  supplier: z.string().nullable(),
  category: z.string().nullable(),
  location: z.string().nullable(),
  createdAt: TimestampSchema,
  updatedAt: TimestampSchema,
});

/**
 * Fields accepted when adding a medicine to the inventory
 */
export const CreateMedicineInputSchema = z.object({
  name: z.string().trim().min(1, 'Medicine name is required').max(255),
  currentStock: StockQuantitySchema,
  reorderPoint: StockQuantitySchema,
  expiryDate: IsoDateSchema,
  unitPrice: UnitPriceSchema,
  batchNumber: OptionalTextSchema,
  supplier: OptionalTextSchema,
  category: OptionalTextSchema,
  location: OptionalTextSchema,
});

/**
 * Field edits; stock changes go through updateStock so history stays complete
 */
export const UpdateMedicineDetailsSchema = CreateMedicineInputSchema.omit({ currentStock: true })
  .partial()
  .refine((patch) => Object.keys(patch).length > 0, 'At least one field must be provided');

export const StockHistoryEntrySchema = z.object({
  id: z.number().int().positive(),
  medicineId: MedicineIdSchema,
  medicineName: z.string(),
  oldStock: z.number().int(),
  newStock: z.number().int(),
  changeReason: z.string(),
  changedAt: TimestampSchema,
});

export const StockHistoryQuerySchema = z.object({
  medicineId: MedicineIdSchema.optional(),
  limit: z.number().int().min(1).max(1000).default(50),
});

export type MedicineId = z.infer<typeof MedicineIdSchema>;
export type StockStatus = z.infer<typeof StockStatusSchema>;
export type Medicine = z.infer<typeof MedicineSchema>;
export type CreateMedicineInput = z.input<typeof CreateMedicineInputSchema>;
export type NewMedicine = z.output<typeof CreateMedicineInputSchema>;
export type UpdateMedicineDetailsInput = z.input<typeof UpdateMedicineDetailsSchema>;
export type MedicineDetailsPatch = z.output<typeof UpdateMedicineDetailsSchema>;
export type StockHistoryEntry = z.infer<typeof StockHistoryEntrySchema>;
export type StockHistoryQuery = z.input<typeof StockHistoryQuerySchema>;
