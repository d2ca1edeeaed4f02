import { z } from 'zod';
import { createLogger, ExternalServiceError, toError } from '@rxstock/core';
import type { BasicProductInfo } from '@rxstock/types';

const logger = createLogger({ name: 'barcode-lookup' });

/**
 * Barcode Product Database Client
 * Basic product lookup against the UPCitemdb trial API
 */

export const DEFAULT_BARCODE_API_URL = 'https://api.upcitemdb.com/prod/trial';
const DEFAULT_TIMEOUT_MS = 5000;

const UpcItemSchema = z.object({
  title: z.string().nullish(),
  brand: z.string().nullish(),
  description: z.string().nullish(),
  category: z.string().nullish(),
  images: z.array(z.string()).nullish(),
});

const UpcLookupResponseSchema = z.object({
  code: z.string().optional(),
  total: z.number().optional(),
  items: z.array(UpcItemSchema).nullish(),
});

const BarcodeLookupConfigSchema = z.object({
  baseUrl: z.string().url().optional(),
  timeoutMs: z.number().int().min(100).max(60000).optional(),
});

export interface BarcodeLookupConfig {
  /** API base URL (default: UPCitemdb trial endpoint) */
  baseUrl?: string | undefined;
  /** Request timeout in milliseconds (default: 5000) */
  timeoutMs?: number | undefined;
}

/**
 * Basic product lookup port
 *
 * Resolves to null when the product is unknown or the lookup failed; the
 * barcode resolver treats both as "no basic data".
 */
export interface BarcodeProductClient {
  lookup(barcode: string): Promise<BasicProductInfo | null>;
}

export class UpcItemDbClient implements BarcodeProductClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(config: BarcodeLookupConfig = {}) {
    const validated = BarcodeLookupConfigSchema.parse(config);
    this.baseUrl = (validated.baseUrl ?? DEFAULT_BARCODE_API_URL).replace(/\/+$/, '');
    this.timeoutMs = validated.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async lookup(barcode: string): Promise<BasicProductInfo | null> {
    try {
      return await this.fetchProduct(barcode);
    } catch (error) {
      logger.warn({ err: toError(error), barcode }, 'Basic barcode lookup failed');
      return null;
    }
  }

  /**
   * Fetch the first matching item.
   *
   * @throws ExternalServiceError on timeout, HTTP error or unexpected payload
   */
  async fetchProduct(barcode: string): Promise<BasicProductInfo | null> {
    const url = `${this.baseUrl}/lookup?upc=${encodeURIComponent(barcode)}`;

    // Create abort controller for timeout
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    let payload: unknown;
    try {
      const response = await fetch(url, {
        signal: controller.signal,
        headers: { Accept: 'application/json' },
      });

      if (!response.ok) {
        throw new ExternalServiceError('UPCitemdb', `Request failed with status ${response.status}`);
      }

      payload = await response.json();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new ExternalServiceError('UPCitemdb', `Request timeout after ${this.timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }

    const parsed = UpcLookupResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ExternalServiceError('UPCitemdb', 'Unexpected response format');
    }

    const item = parsed.data.items?.[0];
    if (!item) {
      return null;
    }

    return {
      barcode,
      productName: item.title ?? '',
      brand: item.brand ?? '',
      description: item.description ?? '',
      category: item.category ?? '',
      images: item.images ?? [],
    };
  }
}

export function createBarcodeLookupClient(config: BarcodeLookupConfig = {}): UpcItemDbClient {
  return new UpcItemDbClient(config);
}
