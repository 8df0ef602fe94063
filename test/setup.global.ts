import { vi } from 'vitest';

process.env.NODE_ENV = 'test';
process.env.TZ = 'UTC';

/**
 * ---- SAFETY MOCKS ----
 * No test may reach a real database; stores under test are in-memory.
 */
vi.mock('@neondatabase/serverless', () => ({
  neon: () => {
    throw new Error('Database access is disabled in tests');
  },
}));
