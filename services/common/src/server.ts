import fastify, { type FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';

import { getConfig } from './config.js';
import { errorHandlerPlugin, notFoundError } from './errors.js';
import { requestLoggingPlugin } from './logger.js';

export interface BuildServerOptions {
  disableDefaultHealthRoute?: boolean;
  bodyLimitBytes?: number;
}

export async function buildServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const config = getConfig();

  const app = fastify({
    logger: { level: config.runtime.logLevel },
    disableRequestLogging: true,
    trustProxy: true,
    bodyLimit: options.bodyLimitBytes ?? 64 * 1024
  });

  await app.register(requestLoggingPlugin);
  await app.register(errorHandlerPlugin);
  app.setNotFoundHandler(async (request) => {
    throw notFoundError(`Route ${request.method} ${request.url} not found`);
  });
  await app.register(helmet, { global: true });
  await app.register(cors, {
    origin: true
  });

  if (!options.disableDefaultHealthRoute) {
    app.get('/health', async () => ({
      status: 'ok',
      service: config.runtime.serviceName
    }));
  }

  return app;
}
