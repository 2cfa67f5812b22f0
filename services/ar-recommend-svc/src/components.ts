import type { Logger } from 'pino';

import type { RecommenderComponents } from './app-context.js';
import { CatalogStore } from './catalog-store.js';
import type { RecommendServiceConfig } from './config.js';
import { DomainClassifier, loadDomainVocabulary } from './domain-classifier.js';
import { createEmbeddingProvider, type EmbeddingProvider } from './embedding-provider.js';
import { PgVectorIndex } from './pgvector-index.js';
import { RankingCache } from './ranking-cache.js';
import { createRankingService } from './ranking-providers.js';
import { RecommendationService } from './recommend-service.js';
import { RerankerOrchestrator } from './reranker.js';
import { Retriever } from './retriever.js';
import {
  FlatInnerProductIndex,
  buildFlatIndex,
  readEmbeddingsFile,
  type SimilarityIndex
} from './similarity-index.js';

async function loadIndex(
  config: RecommendServiceConfig,
  catalog: CatalogStore,
  provider: EmbeddingProvider,
  logger: Logger
): Promise<SimilarityIndex> {
  if (config.index.backend === 'pgvector') {
    const index = new PgVectorIndex(config.index.pgvector, logger.child({ module: 'pgvector-index' }));
    await index.initialize();
    return index;
  }

  const stored = await readEmbeddingsFile(config.catalog.embeddingsFile);
  if (stored) {
    if (stored.dimensions !== provider.dimensions) {
      throw new Error(
        `Embeddings file has ${stored.dimensions} dimensions but the ${provider.name} provider produces ${provider.dimensions}.`
      );
    }
    logger.info({ file: config.catalog.embeddingsFile, model: stored.model }, 'Loaded catalog embeddings.');
    return FlatInnerProductIndex.fromEmbeddingsFile(catalog.all(), stored);
  }

  logger.warn({ file: config.catalog.embeddingsFile }, 'Embeddings file not found. Embedding catalog at startup.');
  return buildFlatIndex(catalog.all(), provider);
}

export async function loadRecommenderComponents(config: RecommendServiceConfig, logger: Logger): Promise<RecommenderComponents> {
  const catalog = await CatalogStore.fromFile(config.catalog.catalogFile);
  logger.info({ file: config.catalog.catalogFile, records: catalog.size }, 'Catalog loaded.');

  const embeddingProvider = createEmbeddingProvider({
    config: config.embedding,
    logger: logger.child({ module: 'embedding-provider' })
  });
  const index = await loadIndex(config, catalog, embeddingProvider, logger);
  const classifier = new DomainClassifier(loadDomainVocabulary(config.catalog.vocabularyFile));
  const ranking = createRankingService(config.ranker, logger);
  const cache = config.cache.disable ? null : new RankingCache(config.cache, logger.child({ module: 'ranking-cache' }));

  const retriever = new Retriever({
    embeddingProvider,
    index,
    config: config.retrieval,
    logger: logger.child({ module: 'retriever' })
  });
  const reranker = new RerankerOrchestrator({
    classifier,
    ranking,
    cache,
    logger: logger.child({ module: 'reranker' })
  });
  const recommendations = new RecommendationService({
    retriever,
    reranker,
    retrievalConfig: config.retrieval,
    recommendationConfig: config.recommendation,
    logger: logger.child({ module: 'recommend-service' })
  });

  return { catalog, embeddingProvider, index, retriever, reranker, recommendations, ranking, cache };
}
