/**
 * @fileoverview Medicine Input Validators
 *
 * Field-level checks run before anything is persisted. A failed check is
 * reported with a message meant for the person filling in the form; the
 * store operation is never attempted.
 *
 * @module domain/inventory/validators
 */

import { ValidationError } from '@rxstock/core';
import {
  CreateMedicineInputSchema,
  type CreateMedicineInput,
  type NewMedicine,
} from '@rxstock/types';

export type ValidationResult = { readonly valid: true } | { readonly valid: false; readonly message: string };

const VALID: ValidationResult = { valid: true };

function invalid(message: string): ValidationResult {
  return { valid: false, message };
}

export const MAX_UNIT_PRICE = 10_000;
export const MAX_STOCK_QUANTITY = 1_000_000;
export const MAX_BATCH_NUMBER_LENGTH = 50;

const NAME_FORBIDDEN_CHARS = /[<>"']/;
const BATCH_NUMBER_PATTERN = /^[A-Za-z0-9\-_/]+$/;

export function validateMedicineName(name: string | null | undefined): ValidationResult {
  if (!name || name.trim().length < 2) {
    return invalid('Medicine name must be at least 2 characters long');
  }
  if (NAME_FORBIDDEN_CHARS.test(name)) {
    return invalid('Medicine name contains invalid characters');
  }
  return VALID;
}

/**
 * Batch numbers are optional; an empty value passes.
 */
export function validateBatchNumber(batchNumber: string | null | undefined): ValidationResult {
  if (!batchNumber) {
    return VALID;
  }
  if (!BATCH_NUMBER_PATTERN.test(batchNumber)) {
    return invalid(
      'Batch number can only contain letters, numbers, hyphens, underscores, and slashes'
    );
  }
  if (batchNumber.length > MAX_BATCH_NUMBER_LENGTH) {
    return invalid(`Batch number is too long (max ${MAX_BATCH_NUMBER_LENGTH} characters)`);
  }
  return VALID;
}

export function validatePrice(price: unknown): ValidationResult {
  const value = toNumber(price);
  if (value === null) {
    return invalid('Price must be a valid number');
  }
  if (value < 0) {
    return invalid('Price cannot be negative');
  }
  if (value > MAX_UNIT_PRICE) {
    return invalid('Price seems unreasonably high');
  }
  return VALID;
}

export function validateStockQuantity(quantity: unknown): ValidationResult {
  const value = toNumber(quantity);
  if (value === null || !Number.isInteger(value)) {
    return invalid('Stock quantity must be a valid whole number');
  }
  if (value < 0) {
    return invalid('Stock quantity cannot be negative');
  }
  if (value > MAX_STOCK_QUANTITY) {
    return invalid('Stock quantity seems unreasonably high');
  }
  return VALID;
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Run every field check plus the input schema.
 *
 * @throws ValidationError with per-field messages when any check fails
 */
export function assertValidMedicineInput(input: CreateMedicineInput): NewMedicine {
  const fieldErrors: Record<string, string[]> = {};
  const addError = (field: string, result: ValidationResult): void => {
    if (!result.valid) {
      (fieldErrors[field] ??= []).push(result.message);
    }
  };

  addError('name', validateMedicineName(input.name));
  addError('batchNumber', validateBatchNumber(input.batchNumber));
  addError('unitPrice', validatePrice(input.unitPrice));
  addError('currentStock', validateStockQuantity(input.currentStock));
  addError('reorderPoint', validateStockQuantity(input.reorderPoint));

  const parsed = CreateMedicineInputSchema.safeParse(input);
  if (!parsed.success) {
    for (const [field, messages] of Object.entries(parsed.error.flatten().fieldErrors)) {
      // A field check message takes precedence over the schema message
      if (fieldErrors[field] === undefined && messages !== undefined) {
        fieldErrors[field] = messages;
      }
    }
  }

  if (Object.keys(fieldErrors).length > 0 || !parsed.success) {
    throw new ValidationError('Invalid medicine input', fieldErrors);
  }

  return parsed.data;
}
