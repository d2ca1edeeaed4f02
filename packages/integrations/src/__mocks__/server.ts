import { setupServer } from 'msw/node';
import { handlers } from './handlers.js';

/**
 * MSW server shared by every test file; started in vitest.setup.ts
 */
export const server = setupServer(...handlers);
