/**
 * @fileoverview Barcode Result Mapping
 *
 * Turns a barcode lookup outcome into add-medicine form suggestions and a
 * flat display summary. Pure functions; no lookups happen here.
 *
 * @module domain/barcode/suggestions
 */

import type {
  AiBarcodeGuess,
  AiProductAnalysis,
  BarcodeLookupResult,
  BarcodeSummary,
  MedicineSuggestion,
} from '@rxstock/types';

export const BARCODE_BATCH_PREFIX = 'BC_';
export const DEFAULT_SUGGESTED_REORDER_POINT = 10;
export const UNKNOWN_PRODUCT_NAME = 'Unknown Product';

const INTEGER_TEXT = /^\s*[+-]?\d+\s*$/;

// ============================================================================
// FIELD PARSERS
// ============================================================================

/**
 * Keep digits and dots only, so "$12.99 per box" becomes 12.99.
 * Returns undefined when nothing numeric remains.
 */
export function parseSuggestedPrice(value: string | number | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const cleaned = String(value).replace(/[^\d.]/g, '');
  if (!/\d/.test(cleaned) || cleaned.indexOf('.') !== cleaned.lastIndexOf('.')) {
    return undefined;
  }
  const price = Number(cleaned);
  return Number.isFinite(price) ? price : undefined;
}

/**
 * Whole-number reorder point; anything missing or unreadable falls back to 10
 */
export function parseSuggestedReorderPoint(value: string | number | undefined): number {
  let parsed: number | undefined;
  if (typeof value === 'number' && Number.isFinite(value)) {
    parsed = Math.trunc(value);
  } else if (typeof value === 'string' && INTEGER_TEXT.test(value)) {
    parsed = parseInt(value, 10);
  }
  return parsed !== undefined && parsed >= 0 ? parsed : DEFAULT_SUGGESTED_REORDER_POINT;
}

function nonEmpty(value: string | undefined | null): string | undefined {
  return value !== undefined && value !== null && value.trim() !== '' ? value : undefined;
}

// ============================================================================
// SUGGESTIONS
// ============================================================================

interface SuggestionSource {
  name?: string | undefined;
  category?: string | undefined;
  estimatedPrice?: string | number | undefined;
  suggestedReorderPoint?: string | number | undefined;
  storageRequirements?: string | undefined;
}

function fromFound(
  productName: string,
  productCategory: string,
  analysis: AiProductAnalysis | null
): SuggestionSource {
  return {
    name: nonEmpty(analysis?.name) ?? nonEmpty(productName),
    category: nonEmpty(analysis?.category) ?? nonEmpty(productCategory),
    estimatedPrice: analysis?.estimatedPrice,
    suggestedReorderPoint: analysis?.suggestedReorderPoint,
    storageRequirements: nonEmpty(analysis?.storageRequirements),
  };
}

function fromGuess(guess: AiBarcodeGuess | null): SuggestionSource {
  return {
    name: nonEmpty(guess?.productName),
    category: nonEmpty(guess?.category),
    estimatedPrice: guess?.estimatedPrice,
    suggestedReorderPoint: guess?.suggestedReorderPoint,
  };
}

function suggestionSource(result: BarcodeLookupResult): SuggestionSource | null {
  switch (result.kind) {
    case 'found':
      return fromFound(
        result.product.productName,
        result.product.category,
        result.enhancement?.kind === 'structured' ? result.enhancement.data : null
      );
    case 'ai_guessed':
      return fromGuess(result.guess.kind === 'structured' ? result.guess.data : null);
    case 'not_found':
      return null;
  }
}

/**
 * Map a lookup outcome onto add-medicine form fields.
 *
 * Only fields with a source value are filled, except the batch number
 * (`BC_<barcode>`) and the reorder point, which defaults to 10. A
 * `not_found` result yields the batch number alone.
 */
export function suggestMedicineData(result: BarcodeLookupResult): MedicineSuggestion {
  const suggestion: MedicineSuggestion = {};
  if (result.barcode !== '') {
    suggestion.batchNumber = `${BARCODE_BATCH_PREFIX}${result.barcode}`;
  }

  const source = suggestionSource(result);
  if (source === null) {
    return suggestion;
  }

  if (source.name !== undefined) suggestion.name = source.name;
  if (source.category !== undefined) suggestion.category = source.category;

  const unitPrice = parseSuggestedPrice(source.estimatedPrice);
  if (unitPrice !== undefined) suggestion.unitPrice = unitPrice;

  suggestion.reorderPoint = parseSuggestedReorderPoint(source.suggestedReorderPoint);

  if (source.storageRequirements !== undefined) suggestion.location = source.storageRequirements;

  return suggestion;
}

// ============================================================================
// DISPLAY SUMMARY
// ============================================================================

/**
 * Flatten any lookup outcome into one display shape
 */
export function summarizeBarcodeResult(result: BarcodeLookupResult): BarcodeSummary {
  const summary: BarcodeSummary = {
    barcode: result.barcode,
    name: null,
    brand: null,
    category: null,
    confidence: null,
    isMedicine: null,
    aiAnalysis: null,
  };

  switch (result.kind) {
    case 'not_found':
      return summary;

    case 'found': {
      const { product, enhancement } = result;
      const analysis = enhancement?.kind === 'structured' ? enhancement.data : null;
      return {
        ...summary,
        name: nonEmpty(analysis?.name) ?? nonEmpty(product.productName) ?? null,
        brand: nonEmpty(product.brand) ?? null,
        category: nonEmpty(analysis?.category) ?? nonEmpty(product.category) ?? null,
        isMedicine: analysis?.isMedicine ?? null,
        aiAnalysis: enhancement?.kind === 'unstructured' ? enhancement.rawText : null,
      };
    }

    case 'ai_guessed': {
      const { guess } = result;
      if (guess.kind === 'unstructured') {
        return {
          ...summary,
          name: UNKNOWN_PRODUCT_NAME,
          confidence: 'low',
          isMedicine: false,
          aiAnalysis: guess.rawText,
        };
      }
      return {
        ...summary,
        name: nonEmpty(guess.data.productName) ?? null,
        category: nonEmpty(guess.data.category) ?? null,
        confidence: guess.data.confidence ?? null,
        isMedicine: guess.data.likelyMedicine ?? null,
        aiAnalysis: nonEmpty(guess.data.recommendations) ?? null,
      };
    }
  }
}
