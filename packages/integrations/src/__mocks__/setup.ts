/**
 * MSW Test Utilities
 *
 * Lifecycle management (beforeAll/afterEach/afterAll) is handled by
 * vitest.setup.ts at the repository root.
 *
 * Test files should import from this module:
 * ```typescript
 * import { server, testFixtures, createFailingHandler } from '../__mocks__/setup.js';
 * ```
 */

export { server } from './server.js';
export {
  handlers,
  testFixtures,
  UPC_LOOKUP_URL,
  createFailingHandler,
  createSlowHandler,
  createRateLimitedHandler,
} from './handlers.js';
