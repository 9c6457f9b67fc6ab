/**
 * Global test setup for Vitest.
 *
 * Runs before every test file, so the environment below is in place
 * before src/config.ts is first imported.
 */

import { beforeEach, vi } from 'vitest';

process.env.NODE_ENV = 'test';
process.env.BRIEF_PROVIDER_BIN = 'gog';
process.env.BRIEF_LOG_LEVEL = 'error';
delete process.env.BRIEF_LOG_FILE;
delete process.env.BRIEF_ACCOUNTS_FILE;
delete process.env.BRIEF_TIMEZONE;

beforeEach(() => {
  vi.clearAllMocks();
});
