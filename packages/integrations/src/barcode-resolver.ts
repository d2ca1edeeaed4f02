/**
 * Barcode Resolver
 *
 * Single pass, no retries across steps:
 * 1. Basic lookup in the product database
 * 2. With a product name: AI enhancement of the product data
 * 3. Without one: AI-only guess from the barcode value
 *
 * Model output is decoded in two stages; text that is not a well-formed JSON
 * object is kept as raw text instead of failing the lookup.
 */
import { createLogger, ValidationError } from '@rxstock/core';
import {
  AiBarcodeGuessSchema,
  AiProductAnalysisSchema,
  BarcodeSchema,
  type AiExtraction,
  type AiProductAnalysis,
  type BarcodeLookupResult,
  type BarcodeSummary,
  type BasicProductInfo,
  type MedicineSuggestion,
} from '@rxstock/types';
import { extractJsonObject, suggestMedicineData, summarizeBarcodeResult } from '@rxstock/domain';
import type { CompletionClient } from './openai.js';
import type { BarcodeProductClient } from './barcode-lookup.js';
import { sanitizePromptInput } from './pharmacy-ai.js';

const logger = createLogger({ name: 'barcode-resolver' });

const ENHANCEMENT_PERSONA =
  'You are a pharmaceutical expert analyzing products for pharmacy inventory management. Provide accurate, structured information.';

const GUESS_PERSONA =
  'You are a pharmaceutical barcode expert helping pharmacy staff identify products from barcode scans.';

export function buildEnhancementPrompt(productName: string): string {
  return `Based on the product name "${productName}", provide detailed pharmacy inventory information.
Analyze if this is a pharmaceutical product and provide the following in JSON format:

{
    "is_medicine": true/false,
    "name": "standardized medicine name",
    "category": "medicine category (Prescription/Over-the-counter/etc.)",
    "estimated_price": "estimated unit price in USD",
    "suggested_reorder_point": "suggested reorder quantity",
    "storage_requirements": "storage conditions",
    "common_dosage": "common dosage information",
    "safety_notes": "important safety considerations"
}

If this is not a medicine, set is_medicine to false and provide basic product info.`;
}

export function buildBarcodeGuessPrompt(barcode: string): string {
  return `A barcode scan returned the code: ${barcode}

Please analyze this barcode and provide medicine information if possible.
Common barcode formats for medicines include:
- UPC/EAN codes for over-the-counter medicines
- NDC (National Drug Code) for prescription medicines
- GTIN for pharmaceutical products

Provide the following information in JSON format:
{
    "barcode": "${barcode}",
    "likely_medicine": true/false,
    "product_name": "best guess product name",
    "category": "estimated category",
    "barcode_type": "UPC/EAN/NDC/GTIN/Unknown",
    "confidence": "high/medium/low",
    "recommendations": "suggestions for pharmacy staff"
}

If you cannot identify the product, indicate low confidence and suggest manual entry.`;
}

export interface BarcodeResolverDeps {
  products: BarcodeProductClient;
  /** Without a completion client only the basic lookup runs */
  completions?: CompletionClient | undefined;
}

export interface BarcodeResolverConfig {
  /** Model for enhancement and guesses; the completion client's own model when unset */
  model?: string | undefined;
}

export interface ResolvedBarcode {
  result: BarcodeLookupResult;
  summary: BarcodeSummary;
  suggestion: MedicineSuggestion;
}

export class BarcodeResolver {
  private readonly products: BarcodeProductClient;
  private readonly completions: CompletionClient | undefined;
  private readonly model: string | undefined;

  constructor(deps: BarcodeResolverDeps, config: BarcodeResolverConfig = {}) {
    this.products = deps.products;
    this.completions = deps.completions;
    this.model = config.model;
  }

  /**
   * Resolve a scanned barcode.
   *
   * Never throws for lookup or AI failures; "nothing found" is the
   * `not_found` variant.
   *
   * @throws ValidationError for an empty or oversized barcode
   */
  async resolve(barcode: string): Promise<BarcodeLookupResult> {
    const parsed = BarcodeSchema.safeParse(barcode);
    if (!parsed.success) {
      const message = parsed.error.issues[0]?.message ?? 'Invalid barcode';
      throw new ValidationError(message, { barcode: [message] });
    }
    const code = parsed.data;

    const product = await this.products.lookup(code);
    if (product && product.productName.trim() !== '') {
      return {
        kind: 'found',
        barcode: code,
        product,
        enhancement: await this.enhance(product),
      };
    }

    return this.guess(code);
  }

  /**
   * Resolve and derive the display summary and form suggestions
   */
  async resolveWithSuggestions(barcode: string): Promise<ResolvedBarcode> {
    const result = await this.resolve(barcode);
    return {
      result,
      summary: summarizeBarcodeResult(result),
      suggestion: suggestMedicineData(result),
    };
  }

  private async enhance(product: BasicProductInfo): Promise<AiExtraction<AiProductAnalysis> | null> {
    if (!this.completions) {
      return null;
    }

    let text: string;
    try {
      text = await this.completions.complete({
        system: ENHANCEMENT_PERSONA,
        prompt: buildEnhancementPrompt(sanitizePromptInput(product.productName)),
        model: this.model,
        jsonMode: true,
      });
    } catch (error) {
      logger.warn({ err: error, barcode: product.barcode }, 'AI enhancement failed, keeping basic product data');
      return null;
    }

    const extraction = extractJsonObject(text, AiProductAnalysisSchema);
    if (extraction.kind === 'unstructured') {
      logger.warn({ barcode: product.barcode }, 'AI enhancement returned no JSON object');
    }
    return extraction;
  }

  private async guess(barcode: string): Promise<BarcodeLookupResult> {
    if (!this.completions) {
      return { kind: 'not_found', barcode, reason: 'no_match' };
    }

    let text: string;
    try {
      text = await this.completions.complete({
        system: GUESS_PERSONA,
        prompt: buildBarcodeGuessPrompt(sanitizePromptInput(barcode)),
        model: this.model,
        jsonMode: true,
      });
    } catch (error) {
      logger.warn({ err: error, barcode }, 'AI barcode lookup failed');
      return { kind: 'not_found', barcode, reason: 'ai_unavailable' };
    }

    const guess = extractJsonObject(text, AiBarcodeGuessSchema);
    if (guess.kind === 'unstructured') {
      logger.warn({ barcode }, 'AI barcode guess returned no JSON object');
    }
    return { kind: 'ai_guessed', barcode, guess };
  }
}

export function createBarcodeResolver(
  deps: BarcodeResolverDeps,
  config: BarcodeResolverConfig = {}
): BarcodeResolver {
  return new BarcodeResolver(deps, config);
}
