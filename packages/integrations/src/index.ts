export {
  OpenAIClient,
  createOpenAIClient,
  DEFAULT_OPENAI_MODEL,
  type OpenAIClientConfig,
  type CompletionRequest,
  type CompletionClient,
} from './openai.js';

export {
  MAX_RECOMMENDATION_RECORDS,
  PERSONAS,
  sanitizePromptInput,
  summarizeInventoryForPrompt,
  buildMedicineInfoPrompt,
  buildDrugInteractionsPrompt,
  buildInventoryRecommendationsPrompt,
  buildInventoryTrendsPrompt,
  buildMedicineAlternativesPrompt,
  getMedicineInfo,
  checkDrugInteractions,
  getInventoryRecommendations,
  analyzeInventoryTrends,
  getMedicineAlternatives,
  type InventorySummaryItem,
} from './pharmacy-ai.js';

export {
  UpcItemDbClient,
  createBarcodeLookupClient,
  DEFAULT_BARCODE_API_URL,
  type BarcodeLookupConfig,
  type BarcodeProductClient,
} from './barcode-lookup.js';

export {
  BarcodeResolver,
  createBarcodeResolver,
  buildEnhancementPrompt,
  buildBarcodeGuessPrompt,
  type BarcodeResolverDeps,
  type BarcodeResolverConfig,
  type ResolvedBarcode,
} from './barcode-resolver.js';

export {
  createPharmacyClients,
  type PharmacyClients,
  type ClientName,
} from './clients-factory.js';
