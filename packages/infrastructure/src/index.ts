/**
 * @fileoverview Infrastructure Layer Package
 *
 * Adapters connecting the inventory domain to storage.
 *
 * @module @rxstock/infrastructure
 *
 * @example
 * ```typescript
 * import { createDatabaseClient } from '@rxstock/core';
 * import { createInventoryService } from '@rxstock/domain';
 * import { createPostgresInventoryRepository } from '@rxstock/infrastructure';
 *
 * const repository = createPostgresInventoryRepository(createDatabaseClient());
 * const inventory = createInventoryService({ repository });
 * ```
 */

export * from './repositories/index.js';
