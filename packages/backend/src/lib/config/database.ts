import { ValidationError } from '../errors.js';
import { parseNonNegativeInt } from './env.js';

export interface DatabaseConfig {
  connectionString: string;
  poolMax: number;
  txMaxRetries: number;
}

let cachedConfig: DatabaseConfig | undefined;

/**
 * Validate the database environment variables and return a typed config.
 * Throws ValidationError naming the offending variable.
 */
export function validateDatabaseConfig(): DatabaseConfig {
  if (cachedConfig !== undefined) {
    return cachedConfig;
  }

  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new ValidationError('DATABASE_URL is not set', { variable: 'DATABASE_URL' });
  }
  if (!/^postgres(ql)?:\/\//.test(connectionString)) {
    throw new ValidationError(
      'DATABASE_URL must be a postgres:// or postgresql:// connection string',
      { variable: 'DATABASE_URL' },
    );
  }

  const poolMax = parseNonNegativeInt('DB_POOL_MAX', process.env.DB_POOL_MAX, 10);
  if (poolMax === 0) {
    throw new ValidationError('DB_POOL_MAX must be at least 1', { variable: 'DB_POOL_MAX' });
  }

  const config: DatabaseConfig = {
    connectionString,
    poolMax,
    txMaxRetries: parseNonNegativeInt('DB_TX_MAX_RETRIES', process.env.DB_TX_MAX_RETRIES, 3),
  };

  cachedConfig = config;
  return config;
}

/**
 * Reset the cached config. Intended for tests only.
 */
export function resetDatabaseConfigCache(): void {
  cachedConfig = undefined;
}
