import 'dotenv/config';
import { logger } from './lib/logger.js';
import { startServer } from './server.js';

const fastify = await startServer();
if (!fastify) {
  process.exit(1);
}

const shutdown = async (signal: string) => {
  fastify.log.info(`Received ${signal}, shutting down`);
  try {
    await fastify.close();
    process.exit(0);
  } catch (err) {
    logger.error({ err }, 'Error during shutdown');
    process.exit(1);
  }
};

process.once('SIGINT', () => void shutdown('SIGINT'));
process.once('SIGTERM', () => void shutdown('SIGTERM'));
