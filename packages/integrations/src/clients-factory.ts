/**
 * Shared client factory
 * Builds the external-service clients from validated environment settings
 */

import { createLogger, getEnv, type AppEnv, type DevEnv } from '@rxstock/core';
import { createOpenAIClient, type OpenAIClient } from './openai.js';
import { createBarcodeLookupClient, type UpcItemDbClient } from './barcode-lookup.js';
import { createBarcodeResolver, type BarcodeResolver } from './barcode-resolver.js';

const logger = createLogger({ name: 'clients-factory' });

/** Supported client names for configuration checks */
export type ClientName = 'openai' | 'barcodeLookup' | 'barcodeResolver';

/**
 * Result of client initialization
 */
export interface PharmacyClients {
  /** null when OPENAI_API_KEY is not set */
  openai: OpenAIClient | null;
  barcodeLookup: UpcItemDbClient;
  /** Runs the basic lookup only when OpenAI is not configured */
  barcodeResolver: BarcodeResolver;
  /** Returns true if all required clients are available */
  isConfigured: (required: ClientName[]) => boolean;
}

/**
 * Create pharmacy integration clients from environment variables
 *
 * @example
 * ```typescript
 * const clients = createPharmacyClients();
 * if (!clients.isConfigured(['openai'])) {
 *   logger.warn('AI services not configured');
 * }
 * const result = await clients.barcodeResolver.resolve('012345678905');
 * ```
 */
export function createPharmacyClients(env: AppEnv | DevEnv = getEnv()): PharmacyClients {
  const openai = env.OPENAI_API_KEY
    ? createOpenAIClient({ apiKey: env.OPENAI_API_KEY, model: env.OPENAI_MODEL })
    : null;

  if (!openai) {
    logger.warn('OPENAI_API_KEY not set, AI services and barcode enhancement are disabled');
  }

  const barcodeLookup = createBarcodeLookupClient({
    baseUrl: env.BARCODE_API_URL,
    timeoutMs: env.BARCODE_LOOKUP_TIMEOUT_MS,
  });

  const barcodeResolver = createBarcodeResolver(
    { products: barcodeLookup, completions: openai ?? undefined },
    { model: env.OPENAI_MODEL }
  );

  const available: Record<ClientName, boolean> = {
    openai: openai !== null,
    barcodeLookup: true,
    barcodeResolver: true,
  };

  return {
    openai,
    barcodeLookup,
    barcodeResolver,
    isConfigured: (required) => required.every((name) => available[name]),
  };
}
