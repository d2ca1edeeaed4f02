/**
 * Database Migration Runner
 *
 * Applies db/migrations/*.sql in filename order against DATABASE_URL.
 *
 * Usage:
 *   npm run db:migrate                 apply pending migrations
 *   npm run db:migrate -- --dry-run    list what would run
 *   npm run db:migrate -- --verify     report applied files that changed
 */

import { fileURLToPath } from 'node:url';
import { createDatabaseClient, createLogger, getEnv, toError } from '@rxstock/core';
import {
  createMigrationManager,
  createPoolMigrationClient,
  readMigrationDirectory,
} from '@rxstock/infra';

const logger = createLogger({ name: 'run-migrations' });

const MIGRATIONS_DIR = fileURLToPath(new URL('../db/migrations/', import.meta.url));

async function main(): Promise<number> {
  const env = getEnv();
  if (!env.DATABASE_URL) {
    logger.error('DATABASE_URL environment variable is required');
    return 1;
  }

  const args = new Set(process.argv.slice(2));
  const files = await readMigrationDirectory(MIGRATIONS_DIR);
  logger.info({ directory: MIGRATIONS_DIR, files: Object.keys(files).length }, 'Migration files loaded');

  const pool = createDatabaseClient(env.DATABASE_URL, { ssl: env.DATABASE_SSL });
  const connection = await pool.connect();

  try {
    const manager = createMigrationManager({ client: createPoolMigrationClient(connection) });

    if (args.has('--verify')) {
      await manager.ensureTable();
      const mismatches = await manager.verifyChecksums(files);
      for (const mismatch of mismatches) {
        logger.warn(mismatch, 'Applied migration changed since it ran');
      }
      return mismatches.length > 0 ? 1 : 0;
    }

    const summary = await manager.run(files, { dryRun: args.has('--dry-run') });
    logger.info(
      {
        applied: summary.applied,
        skipped: summary.skipped,
        failed: summary.failed,
        totalTimeMs: summary.totalTimeMs,
      },
      summary.failed > 0 ? 'Migration failed' : 'Migrations complete'
    );
    return summary.failed > 0 ? 1 : 0;
  } finally {
    connection.release();
    await pool.end();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.fatal({ err: toError(error) }, 'Migration runner crashed');
    process.exitCode = 1;
  });
