/**
 * @module @rxstock/core
 * @description Shared core utilities
 *
 * Exports:
 * - Structured logger with secret redaction
 * - Error taxonomy
 * - Environment validation
 * - Database pool and transactions
 */

export {
  createLogger,
  withCorrelationId,
  generateCorrelationId,
  redactString,
  redactObject,
  logger,
  type Logger,
  type CreateLoggerOptions,
} from './logger.js';

export {
  AppError,
  ValidationError,
  ExternalServiceError,
  NotFoundError,
  DatabaseConnectionError,
  DatabaseOperationError,
  isOperationalError,
  toSafeErrorResponse,
  toError,
  type SafeErrorDetails,
} from './errors.js';

export {
  AppEnvSchema,
  DevEnvSchema,
  validateEnv,
  getEnv,
  type AppEnv,
  type DevEnv,
} from './env.js';

export {
  createDatabaseClient,
  withTransaction,
  IsolationLevel,
  type DatabaseClient,
  type DatabasePool,
  type DatabaseConfig,
  type PoolClient,
  type QueryResult,
  type TransactionClient,
  type TransactionOptions,
} from './database.js';
