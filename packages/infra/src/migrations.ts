/**
 * Database Migration Utilities
 *
 * Applies the inventory schema from ordered `.sql` files. Each file runs in
 * its own transaction together with its `schema_migrations` record, so a
 * file is either fully applied and recorded or not at all.
 */

import crypto from 'node:crypto';
import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { createLogger, toError, type PoolClient } from '@rxstock/core';

const logger = createLogger({ name: 'migrations' });

// =============================================================================
// Types
// =============================================================================

export interface MigrationFile {
  filename: string;
  content: string;
  checksum: string;
}

const MigrationRecordSchema = z.object({
  id: z.coerce.number().int(),
  filename: z.string(),
  checksum: z.string().nullable(),
  applied_at: z.coerce.date(),
  applied_by: z.string().nullable(),
  execution_time_ms: z.coerce.number().nullable(),
});

/**
 * Migration record from the tracking table
 */
export type MigrationRecord = z.infer<typeof MigrationRecordSchema>;

export interface MigrationResult {
  filename: string;
  status: 'applied' | 'skipped' | 'failed';
  executionTimeMs?: number;
  error?: string;
}

export interface MigrationSummary {
  applied: number;
  skipped: number;
  failed: number;
  results: MigrationResult[];
  totalTimeMs: number;
}

export interface ChecksumMismatch {
  filename: string;
  expected: string;
  actual: string;
}

/**
 * Database client interface for migrations
 */
export interface MigrationClient {
  query(sql: string, params?: unknown[]): Promise<{ rows: Record<string, unknown>[] }>;
  beginTransaction(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export interface MigrationConfig {
  client: MigrationClient;
  /** Migrations table name (default: schema_migrations) */
  tableName?: string;
  /** Schema name (default: public) */
  schema?: string;
}

// =============================================================================
// Utilities
// =============================================================================

/**
 * Compute SHA-256 checksum of content (first 16 chars)
 */
export function computeChecksum(content: string): string {
  return crypto.createHash('sha256').update(content).digest('hex').substring(0, 16);
}

/**
 * Turn a filename-to-content record into migrations ordered by filename
 */
export function parseMigrationFiles(files: Record<string, string>): MigrationFile[] {
  return Object.entries(files)
    .filter(([filename]) => filename.endsWith('.sql'))
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([filename, content]) => ({
      filename,
      content,
      checksum: computeChecksum(content),
    }));
}

/**
 * Read every `.sql` file in a directory
 */
export async function readMigrationDirectory(directory: string): Promise<Record<string, string>> {
  const entries = await readdir(directory);
  const files: Record<string, string> = {};
  for (const filename of entries.filter((name) => name.endsWith('.sql'))) {
    files[filename] = await readFile(path.join(directory, filename), 'utf8');
  }
  return files;
}

/**
 * Adapt one acquired pool connection to the migration client interface.
 * The caller releases the connection.
 */
export function createPoolMigrationClient(connection: PoolClient): MigrationClient {
  return {
    query: async (sql, params) => {
      const result = await connection.query(sql, params);
      return { rows: result.rows };
    },
    beginTransaction: async () => {
      await connection.query('BEGIN');
    },
    commit: async () => {
      await connection.query('COMMIT');
    },
    rollback: async () => {
      await connection.query('ROLLBACK');
    },
  };
}

// =============================================================================
// Migration Manager
// =============================================================================

/**
 * Create a migration manager
 *
 * @example
 * ```typescript
 * const connection = await pool.connect();
 * try {
 *   const migrations = createMigrationManager({ client: createPoolMigrationClient(connection) });
 *   const summary = await migrations.run(await readMigrationDirectory('db/migrations'));
 * } finally {
 *   connection.release();
 * }
 * ```
 */
export function createMigrationManager(config: MigrationConfig) {
  const { client, tableName = 'schema_migrations', schema = 'public' } = config;
  const fullTableName = `${schema}.${tableName}`;

  async function ensureTable(): Promise<void> {
    await client.query(`
      CREATE TABLE IF NOT EXISTS ${fullTableName} (
        id SERIAL PRIMARY KEY,
        filename TEXT NOT NULL UNIQUE,
        checksum VARCHAR(64),
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        applied_by VARCHAR(100) DEFAULT current_user,
        execution_time_ms INTEGER
      )
    `);
  }

  async function getApplied(): Promise<MigrationRecord[]> {
    const result = await client.query(
      `SELECT id, filename, checksum, applied_at, applied_by, execution_time_ms
       FROM ${fullTableName}
       ORDER BY filename`
    );
    return result.rows.map((row) => MigrationRecordSchema.parse(row));
  }

  async function getStatus(): Promise<{ applied: MigrationRecord[]; tableExists: boolean }> {
    try {
      await ensureTable();
      return { applied: await getApplied(), tableExists: true };
    } catch (error) {
      logger.warn({ err: toError(error), table: fullTableName }, 'Migration status unavailable');
      return { applied: [], tableExists: false };
    }
  }

  async function isApplied(filename: string): Promise<boolean> {
    const result = await client.query(`SELECT 1 FROM ${fullTableName} WHERE filename = $1`, [
      filename,
    ]);
    return result.rows.length > 0;
  }

  async function recordMigration(
    filename: string,
    checksum: string,
    executionTimeMs: number
  ): Promise<void> {
    await client.query(
      `INSERT INTO ${fullTableName} (filename, checksum, execution_time_ms)
       VALUES ($1, $2, $3)`,
      [filename, checksum, executionTimeMs]
    );
  }

  /**
   * Apply pending migrations in filename order, stopping at the first failure
   */
  async function run(
    files: Record<string, string>,
    options: { dryRun?: boolean } = {}
  ): Promise<MigrationSummary> {
    const startTime = Date.now();
    const results: MigrationResult[] = [];

    await ensureTable();

    for (const migration of parseMigrationFiles(files)) {
      if (options.dryRun === true || (await isApplied(migration.filename))) {
        results.push({ filename: migration.filename, status: 'skipped' });
        continue;
      }

      const migrationStart = Date.now();
      try {
        await client.beginTransaction();
        await client.query(migration.content);
        const executionTimeMs = Date.now() - migrationStart;
        await recordMigration(migration.filename, migration.checksum, executionTimeMs);
        await client.commit();

        logger.info({ filename: migration.filename, executionTimeMs }, 'Migration applied');
        results.push({ filename: migration.filename, status: 'applied', executionTimeMs });
      } catch (error) {
        try {
          await client.rollback();
        } catch (rollbackError) {
          logger.error({ err: toError(rollbackError), filename: migration.filename }, 'Migration rollback failed');
        }

        const cause = toError(error);
        logger.error({ err: cause, filename: migration.filename }, 'Migration failed');
        results.push({
          filename: migration.filename,
          status: 'failed',
          executionTimeMs: Date.now() - migrationStart,
          error: cause.message,
        });
        break;
      }
    }

    return {
      applied: results.filter((r) => r.status === 'applied').length,
      skipped: results.filter((r) => r.status === 'skipped').length,
      failed: results.filter((r) => r.status === 'failed').length,
      results,
      totalTimeMs: Date.now() - startTime,
    };
  }

  /**
   * Applied files whose content changed since they ran
   */
  async function verifyChecksums(files: Record<string, string>): Promise<ChecksumMismatch[]> {
    const appliedChecksums = new Map(
      (await getApplied()).map((record) => [record.filename, record.checksum])
    );

    return parseMigrationFiles(files).flatMap((migration) => {
      const expected = appliedChecksums.get(migration.filename);
      return expected && expected !== migration.checksum
        ? [{ filename: migration.filename, expected, actual: migration.checksum }]
        : [];
    });
  }

  return {
    ensureTable,
    getApplied,
    getStatus,
    isApplied,
    run,
    verifyChecksums,
  };
}

export type MigrationManager = ReturnType<typeof createMigrationManager>;
