import { pino } from 'pino';
import { resolveLogLevel } from './config/server.js';

/**
 * Process-wide logger for code that runs outside a request (start-up, the
 * store, scripts). Route handlers use `request.log`.
 */
export const logger = pino({
  name: 'orgchart',
  level: resolveLogLevel(process.env.LOG_LEVEL),
});
