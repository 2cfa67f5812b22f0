import type { Logger } from 'pino';
import { serviceUnavailableError } from '@ar/common';

import type { CatalogStore } from './catalog-store.js';
import type { EmbeddingProvider } from './embedding-provider.js';
import type { RankingCache } from './ranking-cache.js';
import type { RankingService } from './ranking-service.js';
import type { RecommendationService } from './recommend-service.js';
import type { RerankerOrchestrator } from './reranker.js';
import type { Retriever } from './retriever.js';
import type { SimilarityIndex } from './similarity-index.js';

export interface RecommenderComponents {
  catalog: CatalogStore;
  embeddingProvider: EmbeddingProvider;
  index: SimilarityIndex;
  retriever: Retriever;
  reranker: RerankerOrchestrator;
  recommendations: RecommendationService;
  ranking: RankingService | null;
  cache: RankingCache | null;
}

export type ComponentLoader = () => Promise<RecommenderComponents>;

/**
 * Holds the loaded recommender. Loading happens once; later callers share the
 * same in-flight promise.
 */
export class AppContext {
  private components: RecommenderComponents | null = null;
  private initPromise: Promise<RecommenderComponents> | null = null;
  private lastError: unknown = null;

  constructor(private readonly logger: Logger) {}

  isReady(): boolean {
    return this.components !== null;
  }

  getLastError(): unknown {
    return this.lastError;
  }

  initialize(loader: ComponentLoader): Promise<RecommenderComponents> {
    if (this.initPromise) {
      return this.initPromise;
    }

    const started = Date.now();
    this.initPromise = loader().then(
      (components) => {
        this.components = components;
        this.lastError = null;
        this.logger.info({ catalogSize: components.catalog.size, durationMs: Date.now() - started }, 'Recommender initialized.');
        return components;
      },
      (error: unknown) => {
        this.initPromise = null;
        this.lastError = error;
        this.logger.error({ error }, 'Recommender initialization failed.');
        throw error;
      }
    );

    return this.initPromise;
  }

  require(): RecommenderComponents {
    if (!this.components) {
      throw serviceUnavailableError('System not ready');
    }
    return this.components;
  }

  async close(): Promise<void> {
    const components = this.components;
    this.components = null;
    this.initPromise = null;
    if (!components) {
      return;
    }

    await Promise.all([
      components.index.close(),
      components.ranking?.close() ?? Promise.resolve(),
      components.cache?.close() ?? Promise.resolve()
    ]);
  }
}
