/**
 * Pharmacy AI text services
 *
 * Stateless request/response wrappers around a CompletionClient. Each builds a
 * fixed prompt around caller data, sends it with a fixed persona and returns
 * the raw response text. Provider failures surface as ExternalServiceError with
 * the underlying cause message preserved; a rejected request stays a
 * ValidationError.
 */
import { AppError, createLogger, ExternalServiceError, ValidationError, toError } from '@rxstock/core';
import type { Medicine, StockHistoryEntry } from '@rxstock/types';
import type { CompletionClient, CompletionRequest } from './openai.js';

const logger = createLogger({ name: 'pharmacy-ai' });

/** Records sent with an inventory recommendation request */
export const MAX_RECOMMENDATION_RECORDS = 20;

const MAX_INPUT_LENGTH = 500;

/**
 * Strip control and zero-width characters from caller text and cap its length
 */
export function sanitizePromptInput(input: string, maxLength = MAX_INPUT_LENGTH): string {
  const sanitized = input
    // eslint-disable-next-line no-control-regex -- removing control characters from prompt input
    .replace(/[\x00-\x1F\x7F]/g, ' ')
    .replace(/[\u200B-\u200D\uFEFF]/g, '')
    .trim();
  return sanitized.length > maxLength ? `${sanitized.substring(0, maxLength)}...` : sanitized;
}

// =============================================================================
// PERSONAS
// =============================================================================

export const PERSONAS = {
  medicineInfo:
    'You are a pharmaceutical expert providing accurate information to pharmacy professionals. Always emphasize the importance of consulting official drug references and prescribing information.',
  drugInteractions:
    'You are a clinical pharmacist expert in drug interactions. Provide thorough analysis while emphasizing the need to consult official databases and healthcare providers for clinical decisions.',
  inventoryRecommendations:
    'You are an inventory management expert specializing in pharmacy operations. Provide practical, data-driven recommendations that improve efficiency and patient care while managing costs.',
  inventoryTrends:
    'You are a data analyst specializing in pharmaceutical inventory forecasting. Provide analytical insights based on historical patterns.',
  medicineAlternatives:
    'You are a clinical pharmacist providing alternative medication options. Always emphasize the importance of prescriber consultation for any therapeutic substitutions.',
} as const;

// =============================================================================
// PROMPTS
// =============================================================================

export function buildMedicineInfoPrompt(medicineName: string): string {
  return `Provide comprehensive information about the medicine '${medicineName}'.
Include the following details:

1. Generic and brand names
2. Primary uses and indications
3. Common dosage forms and strengths
4. Mechanism of action
5. Common side effects
6. Important contraindications
7. Storage requirements
8. Special handling considerations for pharmacy staff

Please provide accurate, up-to-date medical information suitable for pharmacy professionals.`;
}

export function buildDrugInteractionsPrompt(medications: readonly string[]): string {
  return `Analyze the following medications for potential drug interactions:
${medications.join(', ')}

Please provide:
1. Major drug interactions (if any)
2. Moderate interactions to monitor
3. Minor interactions or considerations
4. Recommendations for pharmacy staff
5. Any special monitoring requirements

Format the response in a clear, structured manner suitable for pharmacy professionals.
If no significant interactions are found, clearly state this.
Always recommend consulting official drug interaction databases for complete information.`;
}

export interface InventorySummaryItem {
  name: string;
  current_stock: number;
  reorder_point: number;
  category: string;
  unit_price: number;
  supplier: string;
}

/**
 * Compact view of the first 20 medicines sent for recommendations
 */
export function summarizeInventoryForPrompt(medicines: readonly Medicine[]): InventorySummaryItem[] {
  return medicines.slice(0, MAX_RECOMMENDATION_RECORDS).map((medicine) => ({
    name: medicine.name,
    current_stock: medicine.currentStock,
    reorder_point: medicine.reorderPoint,
    category: medicine.category ?? '',
    unit_price: medicine.unitPrice,
    supplier: medicine.supplier ?? '',
  }));
}

export function buildInventoryRecommendationsPrompt(summary: readonly InventorySummaryItem[]): string {
  return `Analyze the following pharmacy inventory data and provide optimization recommendations:

${JSON.stringify(summary, null, 2)}

Please provide recommendations in the following areas:
1. Stock level optimization (items that may be overstocked or understocked)
2. Reorder point adjustments based on current stock patterns
3. Cost optimization opportunities
4. Supplier diversification suggestions
5. Category-based inventory management insights
6. Risk mitigation strategies for critical medications

Provide specific, actionable recommendations that a pharmacy manager can implement.
Focus on improving efficiency, reducing costs, and ensuring medication availability.`;
}

export function buildInventoryTrendsPrompt(history: readonly StockHistoryEntry[]): string {
  const records = history.map((entry) => ({
    medicine: entry.medicineName,
    old_stock: entry.oldStock,
    new_stock: entry.newStock,
    change_reason: entry.changeReason,
    changed_at: entry.changedAt.toISOString(),
  }));

  return `Analyze the following historical inventory data and provide trend analysis:

${JSON.stringify(records, null, 2)}

Please provide:
1. Usage trend analysis for key medications
2. Seasonal patterns (if any)
3. Demand forecasting for the next quarter
4. Recommendations for inventory planning
5. Risk assessment for stock-outs

Provide insights that help with strategic inventory planning.`;
}

export function buildMedicineAlternativesPrompt(medicineName: string, reason: string): string {
  return `Provide alternative medications for '${medicineName}' due to ${reason}.

Please include:
1. Generic alternatives (if applicable)
2. Therapeutic alternatives with similar mechanisms
3. Considerations for substitution
4. Dosage conversion information (if different)
5. Important differences pharmacists should note

Focus on clinically appropriate alternatives that a pharmacist might recommend
in consultation with prescribers.`;
}

// =============================================================================
// SERVICES
// =============================================================================

async function requestText(
  client: CompletionClient,
  request: CompletionRequest,
  failureMessage: string
): Promise<string> {
  try {
    return await client.complete(request);
  } catch (error) {
    if (error instanceof AppError && !(error instanceof ExternalServiceError)) {
      throw error;
    }
    // Report the provider's own failure, not an already prefixed message
    const cause = error instanceof ExternalServiceError ? (error.originalError ?? error) : toError(error);
    logger.warn({ err: cause, operation: failureMessage }, 'AI request failed');
    throw new ExternalServiceError('OpenAI', `${failureMessage}: ${cause.message}`, cause);
  }
}

function requireMedicineName(medicineName: string): string {
  const name = sanitizePromptInput(medicineName);
  if (name === '') {
    throw new ValidationError('Medicine name is required', { medicineName: ['Medicine name is required'] });
  }
  return name;
}

/**
 * Free-text reference information about one medicine
 */
export async function getMedicineInfo(client: CompletionClient, medicineName: string): Promise<string> {
  const name = requireMedicineName(medicineName);
  return requestText(
    client,
    { system: PERSONAS.medicineInfo, prompt: buildMedicineInfoPrompt(name) },
    'Failed to retrieve medicine information'
  );
}

/**
 * Interaction analysis for a list of medications
 */
export async function checkDrugInteractions(
  client: CompletionClient,
  medications: readonly string[]
): Promise<string> {
  const names = medications.map((m) => sanitizePromptInput(m)).filter((m) => m !== '');
  if (names.length === 0) {
    throw new ValidationError('At least one medication is required', {
      medications: ['At least one medication is required'],
    });
  }
  return requestText(
    client,
    { system: PERSONAS.drugInteractions, prompt: buildDrugInteractionsPrompt(names) },
    'Failed to check drug interactions'
  );
}

/**
 * Optimization advice for the inventory; only the first 20 medicines are sent
 */
export async function getInventoryRecommendations(
  client: CompletionClient,
  medicines: readonly Medicine[]
): Promise<string> {
  const summary = summarizeInventoryForPrompt(medicines);
  return requestText(
    client,
    { system: PERSONAS.inventoryRecommendations, prompt: buildInventoryRecommendationsPrompt(summary) },
    'Failed to generate inventory recommendations'
  );
}

export async function analyzeInventoryTrends(
  client: CompletionClient,
  history: readonly StockHistoryEntry[]
): Promise<string> {
  return requestText(
    client,
    { system: PERSONAS.inventoryTrends, prompt: buildInventoryTrendsPrompt(history) },
    'Failed to analyze inventory trends'
  );
}

export async function getMedicineAlternatives(
  client: CompletionClient,
  medicineName: string,
  reason = 'shortage'
): Promise<string> {
  const name = requireMedicineName(medicineName);
  return requestText(
    client,
    {
      system: PERSONAS.medicineAlternatives,
      prompt: buildMedicineAlternativesPrompt(name, sanitizePromptInput(reason) || 'shortage'),
    },
    'Failed to get medicine alternatives'
  );
}
