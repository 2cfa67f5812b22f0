import 'dotenv/config';

import { buildServer, getLogger } from '@ar/common';

import { AppContext } from './app-context.js';
import { loadRecommenderComponents } from './components.js';
import { getRecommendServiceConfig } from './config.js';
import { registerRoutes } from './routes.js';

async function bootstrap(): Promise<void> {
  process.env.SERVICE_NAME = process.env.SERVICE_NAME ?? 'ar-recommend-svc';

  const logger = getLogger({ module: 'recommend-bootstrap' });

  try {
    const config = getRecommendServiceConfig();
    logger.info(
      { indexBackend: config.index.backend, embedding: config.embedding.provider, ranker: config.ranker.provider },
      'Configuration loaded'
    );

    const server = await buildServer({ disableDefaultHealthRoute: true });
    const context = new AppContext(getLogger({ module: 'app-context' }));

    await registerRoutes(server, { context, config });

    const underPressure = await import('@fastify/under-pressure');
    await server.register(underPressure.default, {
      maxEventLoopDelay: 1500,
      maxHeapUsedBytes: 1_024 * 1_024 * 1024,
      maxRssBytes: 1_536 * 1_024 * 1024
    });

    server.addHook('onClose', async () => {
      await context.close();
    });

    await server.listen({ port: config.server.port, host: config.server.host });
    logger.info({ port: config.server.port }, 'ar-recommend-svc listening (initializing recommender...)');

    void context
      .initialize(() => loadRecommenderComponents(config, getLogger({ module: 'recommender-loader' })))
      .then(
        () => logger.info('ar-recommend-svc fully initialized and ready'),
        (error: unknown) => logger.error({ error }, 'Failed to initialize recommender - service running in degraded mode')
      );

    const shutdown = async () => {
      logger.info('Received shutdown signal.');
      try {
        await server.close();
        logger.info('ar-recommend-svc closed gracefully.');
        process.exit(0);
      } catch (error) {
        logger.error({ error }, 'Failed to shutdown gracefully.');
        process.exit(1);
      }
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());
  } catch (error) {
    logger.error({ error }, 'Failed to bootstrap ar-recommend-svc.');
    process.exit(1);
  }
}

void bootstrap();
