import { ValidationError } from '../errors.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ServerConfig {
  port: number;
  host: string;
  corsOrigin: string;
  logLevel: LogLevel;
}

let cachedConfig: ServerConfig | undefined;

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Level for the process logger, which is created before the config is
 * validated. An invalid value falls back to info; getServerConfig rejects it.
 */
export function resolveLogLevel(raw: string | undefined): LogLevel {
  return raw !== undefined && isLogLevel(raw) ? raw : 'info';
}

export function getServerConfig(): ServerConfig {
  if (cachedConfig !== undefined) {
    return cachedConfig;
  }

  const rawPort = process.env.PORT || '3000';
  const port = /^\d+$/.test(rawPort) ? parseInt(rawPort, 10) : NaN;
  if (Number.isNaN(port) || port < 1 || port > 65535) {
    throw new ValidationError(`PORT must be an integer between 1 and 65535, got '${rawPort}'`, {
      variable: 'PORT',
    });
  }

  const logLevel = process.env.LOG_LEVEL || 'info';
  if (!isLogLevel(logLevel)) {
    throw new ValidationError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`, {
      variable: 'LOG_LEVEL',
    });
  }

  cachedConfig = {
    port,
    host: process.env.HOST || '0.0.0.0',
    corsOrigin: process.env.CORS_ORIGIN || 'http://localhost:5173',
    logLevel,
  };
  return cachedConfig;
}

/**
 * Reset the cached config. Intended for tests only.
 */
export function resetServerConfigCache(): void {
  cachedConfig = undefined;
}
