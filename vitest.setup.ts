/**
 * Vitest setup: quiet logging and the in-process barcode API mock
 */

import { beforeAll, afterEach, afterAll } from 'vitest';
import { server } from './packages/integrations/src/__mocks__/server.js';

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';

// Any request without a handler fails the test instead of reaching the network
beforeAll(() => {
  server.listen({ onUnhandledRequest: 'error' });
});

// Drop per-test handler overrides
afterEach(() => {
  server.resetHandlers();
});

afterAll(() => {
  server.close();
});
