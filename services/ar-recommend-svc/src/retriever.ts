import type { Logger } from 'pino';

import type { RetrievalConfig } from './config.js';
import type { EmbeddingProvider } from './embedding-provider.js';
import { EmbeddingError } from './errors.js';
import type { SimilarityIndex } from './similarity-index.js';
import type { CandidateRecord, EmbeddingVector, RetrievalFilters } from './types.js';

export interface RetrieverDependencies {
  embeddingProvider: EmbeddingProvider;
  index: SimilarityIndex;
  config: RetrievalConfig;
  logger: Logger;
}

export class Retriever {
  private readonly embeddingProvider: EmbeddingProvider;
  private readonly index: SimilarityIndex;
  private readonly config: RetrievalConfig;
  private readonly logger: Logger;

  constructor(deps: RetrieverDependencies) {
    this.embeddingProvider = deps.embeddingProvider;
    this.index = deps.index;
    this.config = deps.config;
    this.logger = deps.logger;
  }

  /**
   * Returns up to `topK` candidates scoring at or above the similarity floor,
   * in the order the index ranked them. Scanning stops at the first hit below
   * the floor.
   */
  async retrieve(query: string, topK: number): Promise<CandidateRecord[]> {
    if (topK <= 0) {
      return [];
    }

    const vector = await this.embedQuery(query);
    const hits = await this.index.search(vector, topK);
    const candidates: CandidateRecord[] = [];

    for (const hit of hits) {
      if (hit.score < this.config.similarityFloor) {
        break;
      }
      candidates.push({ ...hit.record, similarityScore: hit.score });
      if (candidates.length >= topK) {
        break;
      }
    }

    this.logger.debug(
      { topK, hits: hits.length, kept: candidates.length, floor: this.config.similarityFloor },
      'Retrieved candidates.'
    );

    return candidates;
  }

  async retrieveWithFilters(query: string, filters: RetrievalFilters, topK: number): Promise<CandidateRecord[]> {
    const prefetch = Math.max(topK, this.config.filterPrefetch);
    const candidates = await this.retrieve(query, prefetch);
    const testTypes = filters.testTypes && filters.testTypes.length > 0 ? new Set(filters.testTypes) : null;
    const categories = filters.categories && filters.categories.length > 0 ? new Set(filters.categories) : null;

    return candidates
      .filter((candidate) => !testTypes || testTypes.has(candidate.testType))
      .filter((candidate) => !categories || categories.has(candidate.category))
      .slice(0, Math.max(0, topK));
  }

  private async embedQuery(query: string): Promise<EmbeddingVector> {
    let vector: EmbeddingVector;
    try {
      vector = await this.embeddingProvider.generateEmbedding(query);
    } catch (error) {
      if (error instanceof EmbeddingError) {
        throw error;
      }
      throw new EmbeddingError('unavailable', 'Embedding provider failed to embed the query.', { cause: error });
    }

    if (vector.length === 0 || vector.length !== this.index.dimensions || !vector.every(Number.isFinite)) {
      throw new EmbeddingError('malformed', 'Embedding provider returned a malformed vector.', {
        details: { received: vector.length, expected: this.index.dimensions }
      });
    }

    return vector;
  }
}
