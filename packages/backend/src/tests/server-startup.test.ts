import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { startServer } from '../server.js';
import { logger } from '../lib/logger.js';
import { ValidationError } from '../lib/errors.js';
import { resetServerConfigCache } from '../lib/config/server.js';
import { resetDatabaseConfigCache } from '../lib/config/database.js';

const ENV_KEYS = ['PORT', 'DATABASE_URL'] as const;

describe('startServer', () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
    resetServerConfigCache();
    resetDatabaseConfigCache();
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved.get(key);
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    resetServerConfigCache();
    resetDatabaseConfigCache();
    vi.restoreAllMocks();
  });

  it('logs an invalid PORT as a fatal start-up failure', async () => {
    const fatal = vi.spyOn(logger, 'fatal').mockImplementation(() => undefined);
    process.env.PORT = 'eighty';
    process.env.DATABASE_URL = 'postgres://localhost/orgchart';

    const server = await startServer();

    expect(server).toBeNull();
    expect(fatal).toHaveBeenCalledTimes(1);
    expect(fatal).toHaveBeenCalledWith(
      { err: expect.any(ValidationError) },
      'Failed to start server',
    );
  });

  it('logs a missing DATABASE_URL as a fatal start-up failure', async () => {
    const fatal = vi.spyOn(logger, 'fatal').mockImplementation(() => undefined);

    const server = await startServer();

    expect(server).toBeNull();
    expect(fatal).toHaveBeenCalledWith(
      { err: expect.objectContaining({ message: 'DATABASE_URL is not set' }) },
      'Failed to start server',
    );
  });
});
