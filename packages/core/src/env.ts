import { z } from 'zod';

/**
 * Environment Variable Validation
 * Ensures required secrets are present at boot time
 */

// Base runtime config
const RuntimeEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
});

// Database config
const DatabaseEnvSchema = z.object({
  DATABASE_URL: z.string().url().optional(),
  /** Force SSL for the database connection outside production */
  DATABASE_SSL: z
    .enum(['true', 'false'])
    .optional()
    .transform((v) => v === 'true'),
});

// OpenAI config
const OpenAIEnvSchema = z.object({
  OPENAI_API_KEY: z.string().min(1, 'OpenAI API key is required'),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
});

// Barcode product database config
const BarcodeEnvSchema = z.object({
  BARCODE_API_URL: z.string().url().default('https://api.upcitemdb.com/prod/trial'),
  BARCODE_LOOKUP_TIMEOUT_MS: z
    .string()
    .optional()
    .transform((v) => (v ? parseInt(v, 10) : 5000))
    .pipe(z.number().int().min(100).max(60000)),
});

// Full environment schema (production: every secret required)
export const AppEnvSchema = RuntimeEnvSchema.merge(DatabaseEnvSchema)
  .merge(OpenAIEnvSchema)
  .merge(BarcodeEnvSchema)
  .extend({ DATABASE_URL: z.string().url('DATABASE_URL must be a valid URL') });

// Partial schema for development (not all secrets required)
export const DevEnvSchema = RuntimeEnvSchema.merge(DatabaseEnvSchema)
  .merge(BarcodeEnvSchema)
  .merge(
    z.object({
      OPENAI_API_KEY: z.string().optional(),
      OPENAI_MODEL: z.string().default('gpt-4o-mini'),
    })
  );

export type AppEnv = z.infer<typeof AppEnvSchema>;
export type DevEnv = z.infer<typeof DevEnvSchema>;

/**
 * Validate environment variables
 * @param strict - If true, all secrets are required (production mode)
 */
export function validateEnv(
  strict = false,
  source: Record<string, string | undefined> = process.env
): AppEnv | DevEnv {
  const schema = strict ? AppEnvSchema : DevEnvSchema;

  const result = schema.safeParse(source);

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const errorMessages = Object.entries(errors)
      .map(([field, messages]) => `  ${field}: ${(messages ?? []).join(', ')}`)
      .join('\n');

    throw new Error(`Environment validation failed:\n${errorMessages}`);
  }

  return result.data;
}

/**
 * Get validated env with type safety
 */
export function getEnv(): AppEnv | DevEnv {
  const isProduction = process.env.NODE_ENV === 'production';
  return validateEnv(isProduction);
}
