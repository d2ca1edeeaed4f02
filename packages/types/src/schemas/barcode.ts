/**
 * Barcode lookup schemas
 *
 * Language-model output is not schema-enforced by the provider, so every AI
 * field is parsed leniently: a field of the wrong type becomes undefined
 * instead of failing the whole object.
 */
import { z } from 'zod';

export const BarcodeSchema = z
  .string()
  .trim()
  .min(1, 'Barcode is required')
  .max(64, 'Barcode is too long')
  .describe('Scanned barcode value (UPC/EAN/NDC/GTIN)');

export const BarcodeTypeSchema = z.enum(['UPC', 'EAN', 'NDC', 'GTIN', 'Unknown']);

export const ConfidenceSchema = z.enum(['high', 'medium', 'low']);

const looseText = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .optional()
  .catch(undefined);

const looseNumeric = z.union([z.string(), z.number()]).optional().catch(undefined);

const looseBoolean = z
  .union([z.boolean(), z.enum(['true', 'false']).transform((value) => value === 'true')])
  .optional()
  .catch(undefined);

/**
 * Product data returned by the general consumer-product database
 */
export const BasicProductInfoSchema = z.object({
  barcode: BarcodeSchema,
  productName: z.string(),
  brand: z.string(),
  description: z.string(),
  category: z.string(),
  images: z.array(z.string()),
});

/**
 * Pharmacy classification of a known product, as returned by the model
 */
export const AiProductAnalysisSchema = z
  .object({
    is_medicine: looseBoolean,
    name: looseText,
    category: looseText,
    estimated_price: looseNumeric,
    suggested_reorder_point: looseNumeric,
    storage_requirements: looseText,
    common_dosage: looseText,
    safety_notes: looseText,
  })
  .transform((raw) => ({
    isMedicine: raw.is_medicine,
    name: raw.name,
    category: raw.category,
    estimatedPrice: raw.estimated_price,
    suggestedReorderPoint: raw.suggested_reorder_point,
    storageRequirements: raw.storage_requirements,
    commonDosage: raw.common_dosage,
    safetyNotes: raw.safety_notes,
  }));

/**
 * Model inference of a product from the barcode value alone
 */
export const AiBarcodeGuessSchema = z
  .object({
    barcode: looseText,
    likely_medicine: looseBoolean,
    product_name: looseText,
    category: looseText,
    barcode_type: BarcodeTypeSchema.optional().catch(undefined),
    confidence: ConfidenceSchema.optional().catch(undefined),
    recommendations: looseText,
    suggested_reorder_point: looseNumeric,
    estimated_price: looseNumeric,
  })
  .transform((raw) => ({
    barcode: raw.barcode,
    likelyMedicine: raw.likely_medicine,
    productName: raw.product_name,
    category: raw.category,
    barcodeType: raw.barcode_type,
    confidence: raw.confidence,
    recommendations: raw.recommendations,
    suggestedReorderPoint: raw.suggested_reorder_point,
    estimatedPrice: raw.estimated_price,
  }));

export type Barcode = z.infer<typeof BarcodeSchema>;
export type BarcodeType = z.infer<typeof BarcodeTypeSchema>;
export type Confidence = z.infer<typeof ConfidenceSchema>;
export type BasicProductInfo = z.infer<typeof BasicProductInfoSchema>;
export type AiProductAnalysis = z.output<typeof AiProductAnalysisSchema>;
export type AiBarcodeGuess = z.output<typeof AiBarcodeGuessSchema>;

/**
 * Two-stage decode of model output: a parsed object, or the raw text when
 * no well-formed JSON object could be extracted
 */
export type AiExtraction<T> =
  | { readonly kind: 'structured'; readonly data: T; readonly rawText: string }
  | { readonly kind: 'unstructured'; readonly rawText: string };

export type BarcodeNotFoundReason = 'no_match' | 'ai_unavailable';

/**
 * Outcome of a single barcode resolution pass
 */
export type BarcodeLookupResult =
  | {
      readonly kind: 'found';
      readonly barcode: string;
      readonly product: BasicProductInfo;
      /** null when the enhancement call itself failed */
      readonly enhancement: AiExtraction<AiProductAnalysis> | null;
    }
  | {
      readonly kind: 'ai_guessed';
      readonly barcode: string;
      readonly guess: AiExtraction<AiBarcodeGuess>;
    }
  | {
      readonly kind: 'not_found';
      readonly barcode: string;
      readonly reason: BarcodeNotFoundReason;
    };

/**
 * Flat display view of any lookup outcome
 */
export interface BarcodeSummary {
  barcode: string;
  name: string | null;
  brand: string | null;
  category: string | null;
  confidence: string | null;
  isMedicine: boolean | null;
  aiAnalysis: string | null;
}

/**
 * Add-medicine form fields derived from a lookup
 */
export interface MedicineSuggestion {
  name?: string;
  category?: string;
  unitPrice?: number;
  reorderPoint?: number;
  batchNumber?: string;
  location?: string;
}

export interface ScanHistoryEntry {
  readonly barcode: string;
  readonly scannedAt: Date;
}
