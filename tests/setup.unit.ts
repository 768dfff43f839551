import { afterEach, vi } from 'vitest';

// Quiet environment for unit tests; read when src/lib/config is first imported
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.LOG_PRETTY = 'false';

afterEach(() => {
  vi.restoreAllMocks();
});
