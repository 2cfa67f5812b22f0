import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { serviceUnavailableError } from '@ar/common';

import type { AppContext, RecommenderComponents } from './app-context.js';
import type { RecommendServiceConfig } from './config.js';
import { healthSchema, recommendSchema } from './schemas.js';
import type { DependencyHealthReport, HealthResponse, RecommendRequest, RecommendResponse, ServiceInfoResponse } from './types.js';

interface RegisterRoutesOptions {
  context: AppContext;
  config: RecommendServiceConfig;
}

async function checkDependencies(components: RecommenderComponents): Promise<DependencyHealthReport> {
  const [index, embedding, ranking, cache] = await Promise.all([
    components.index.healthCheck(),
    components.embeddingProvider.healthCheck(),
    components.ranking?.healthCheck() ?? Promise.resolve({ status: 'disabled' as const, message: 'No ranking provider configured.' }),
    components.cache?.healthCheck() ?? Promise.resolve({ status: 'disabled' as const, message: 'Caching disabled via configuration.' })
  ]);

  return { index, embedding, ranking, cache };
}

export async function registerRoutes(app: FastifyInstance, options: RegisterRoutesOptions): Promise<void> {
  const { context, config } = options;

  app.get('/', async (): Promise<ServiceInfoResponse> => ({
    service: config.base.runtime.serviceName,
    version: config.server.version,
    status: context.isReady() ? 'ready' : 'initializing',
    endpoints: {
      health: 'GET /health',
      recommend: 'POST /recommend'
    }
  }));

  app.get('/health', { schema: healthSchema }, async (_request: FastifyRequest, reply: FastifyReply): Promise<HealthResponse> => {
    if (!context.isReady()) {
      reply.status(503);
      const message = context.getLastError() === null ? 'System not initialized' : 'System initialization failed';
      return { status: 'unhealthy', message };
    }

    // Only the index decides readiness; the other dependencies are reported.
    const dependencies = await checkDependencies(context.require());
    if (dependencies.index.status !== 'healthy') {
      reply.status(503);
      return { status: 'unhealthy', message: dependencies.index.message ?? 'Similarity index unavailable', dependencies };
    }

    return { status: 'healthy', message: 'System operational', dependencies };
  });

  app.post(
    '/recommend',
    { schema: recommendSchema },
    async (request: FastifyRequest<{ Body: RecommendRequest }>): Promise<RecommendResponse> => {
      if (!context.isReady()) {
        throw serviceUnavailableError('System not ready');
      }

      const { recommendations } = context.require();
      return recommendations.recommend({
        query: request.body.query,
        topK: request.body.top_k,
        finalCount: request.body.final_count
      });
    }
  );
}
