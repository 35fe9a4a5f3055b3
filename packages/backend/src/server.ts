import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { registerErrorHandler } from './lib/error-handler.js';
import { getServerConfig } from './lib/config/server.js';
import { validateDatabaseConfig } from './lib/config/database.js';
import { createPool, ensureSchema } from './lib/db.js';
import { logger } from './lib/logger.js';
import { PgNodeStore } from './store/pg-node-store.js';
import { orgChartRoutes } from './routes/org-charts.js';

/**
 * Load config, connect, apply the schema and listen. Any failure, invalid
 * config included, is logged as fatal and resolves to null.
 */
export async function startServer(): Promise<FastifyInstance | null> {
  let store: PgNodeStore | undefined;

  try {
    const serverConfig = getServerConfig();
    const databaseConfig = validateDatabaseConfig();

    const pool = createPool(databaseConfig);
    store = new PgNodeStore(pool, databaseConfig.txMaxRetries);
    const nodeStore = store;

    const fastify = Fastify({
      logger: { level: serverConfig.logLevel },
    });

    await fastify.register(cors, {
      origin: serverConfig.corsOrigin,
    });

    registerErrorHandler(fastify);

    fastify.addHook('onClose', async () => {
      await nodeStore.close();
    });

    fastify.get('/health', async () => {
      return { status: 'ok' };
    });

    // Register API routes
    await fastify.register(orgChartRoutes, { store: nodeStore });

    await ensureSchema(pool);
    await fastify.listen({ port: serverConfig.port, host: serverConfig.host });
    return fastify;
  } catch (err) {
    logger.fatal({ err }, 'Failed to start server');
    await store?.close();
    return null;
  }
}
