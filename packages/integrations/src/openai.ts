import OpenAI from 'openai';
import { z } from 'zod';
import { ExternalServiceError, ValidationError, toError } from '@rxstock/core';

/**
 * Input validation schemas for OpenAI client
 */
const CompletionRequestSchema = z.object({
  system: z.string().min(1, 'System persona is required').max(10000),
  prompt: z.string().min(1, 'Prompt is required').max(100000, 'Prompt too long'),
  model: z.string().min(1).optional(),
  maxTokens: z.number().int().min(1).max(128000).optional(),
  temperature: z.number().min(0).max(2).optional(),
  jsonMode: z.boolean().optional(),
});

const OpenAIClientConfigSchema = z.object({
  apiKey: z.string().min(1, 'API key is required'),
  model: z.string().min(1).optional(),
  organization: z.string().optional(),
  maxTokens: z.number().int().min(1).max(128000).optional(),
  temperature: z.number().min(0).max(2).optional(),
  timeoutMs: z.number().int().min(1000).max(300000).optional(),
  baseURL: z.string().url().optional(),
});

/**
 * OpenAI Integration Client
 * Text completions for the pharmacy AI services and barcode resolution
 */

export interface OpenAIClientConfig {
  apiKey: string;
  /** Default model (default: gpt-4o-mini) */
  model?: string | undefined;
  organization?: string | undefined;
  maxTokens?: number | undefined;
  temperature?: number | undefined;
  /** Request timeout in milliseconds (default: 60000ms, max: 300000ms) */
  timeoutMs?: number | undefined;
  baseURL?: string | undefined;
}

/**
 * One persona-plus-prompt exchange with the model
 */
export interface CompletionRequest {
  /** System role text describing the persona */
  system: string;
  prompt: string;
  model?: string | undefined;
  maxTokens?: number | undefined;
  temperature?: number | undefined;
  /** Ask the provider for a JSON object response */
  jsonMode?: boolean | undefined;
}

/**
 * Text completion port
 *
 * Implementations return the raw response text. They throw ValidationError
 * for a malformed request and ExternalServiceError when the call cannot
 * complete, with the provider's failure as `originalError`.
 */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<string>;
}

/** Default timeout for OpenAI API requests (60 seconds) */
const DEFAULT_TIMEOUT_MS = 60000;
export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';

export class OpenAIClient implements CompletionClient {
  private client: OpenAI;
  private config: OpenAIClientConfig;

  constructor(config: OpenAIClientConfig) {
    // Validate config at construction time
    const validatedConfig = OpenAIClientConfigSchema.parse(config);
    this.config = validatedConfig;
    this.client = new OpenAI({
      apiKey: validatedConfig.apiKey,
      organization: validatedConfig.organization,
      baseURL: validatedConfig.baseURL,
      timeout: validatedConfig.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      // Failures are reported to the caller, never retried
      maxRetries: 0,
    });
  }

  /**
   * Create a chat completion from a persona and a prompt
   */
  async complete(request: CompletionRequest): Promise<string> {
    const parsed = CompletionRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw new ValidationError(
        parsed.error.issues[0]?.message ?? 'Invalid completion request',
        parsed.error.flatten().fieldErrors
      );
    }
    const validated = parsed.data;
    const { system, prompt, jsonMode = false } = validated;
    const model = validated.model ?? this.config.model ?? DEFAULT_OPENAI_MODEL;
    const maxTokens = validated.maxTokens ?? this.config.maxTokens;
    const temperature = validated.temperature ?? this.config.temperature;

    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create({
        model,
        messages: [
          { role: 'system', content: system },
          { role: 'user', content: prompt },
        ],
        ...(maxTokens !== undefined && { max_tokens: maxTokens }),
        ...(temperature !== undefined && { temperature }),
        ...(jsonMode && { response_format: { type: 'json_object' as const } }),
      });
      content = response.choices[0]?.message.content;
    } catch (error) {
      const cause = toError(error);
      throw new ExternalServiceError('OpenAI', cause.message, cause);
    }

    if (!content) {
      const cause = new Error('Empty response from API');
      throw new ExternalServiceError('OpenAI', cause.message, cause);
    }

    return content;
  }
}

/**
 * Create a configured OpenAI client
 */
export function createOpenAIClient(config: OpenAIClientConfig): OpenAIClient {
  return new OpenAIClient(config);
}
