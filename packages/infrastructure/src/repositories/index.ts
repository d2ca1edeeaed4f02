/**
 * @fileoverview Repository Adapters (Infrastructure Layer)
 *
 * Adapters implementing the domain's IInventoryRepository port:
 * - PostgresInventoryRepository (PostgreSQL)
 * - InMemoryInventoryRepository (tests and local development)
 *
 * @module @rxstock/infrastructure/repositories
 */

export {
  PostgresInventoryRepository,
  createPostgresInventoryRepository,
  escapeLikePattern,
} from './PostgresInventoryRepository.js';

export {
  InMemoryInventoryRepository,
  type InMemoryInventoryRepositoryOptions,
} from './InMemoryInventoryRepository.js';
