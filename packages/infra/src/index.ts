/**
 * @module @rxstock/infra
 * @description Database schema migrations
 */

export {
  computeChecksum,
  parseMigrationFiles,
  readMigrationDirectory,
  createPoolMigrationClient,
  createMigrationManager,
  type MigrationFile,
  type MigrationRecord,
  type MigrationResult,
  type MigrationSummary,
  type ChecksumMismatch,
  type MigrationClient,
  type MigrationConfig,
  type MigrationManager,
} from './migrations.js';
