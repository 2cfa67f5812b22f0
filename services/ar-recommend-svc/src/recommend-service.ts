import type { Logger } from 'pino';
import { badRequestError, clamp } from '@ar/common';

import type { RecommendationConfig, RetrievalConfig } from './config.js';
import type { RerankerOrchestrator } from './reranker.js';
import type { Retriever } from './retriever.js';
import { toRecommendedAssessment } from './response-mapper.js';
import type { CandidateRecord, DomainLabel, RecommendResponse, RerankStrategy } from './types.js';

export interface RecommendQuery {
  query: string;
  topK?: number;
  finalCount?: number;
}

export interface RecommendationTrace {
  candidates: CandidateRecord[];
  recommendations: CandidateRecord[];
  domain: DomainLabel;
  strategy: RerankStrategy;
  finalCount: number;
}

export interface RecommendationServiceDependencies {
  retriever: Retriever;
  reranker: RerankerOrchestrator;
  retrievalConfig: RetrievalConfig;
  recommendationConfig: RecommendationConfig;
  logger: Logger;
}

export function clampFinalCount(value: number | undefined, config: RecommendationConfig): number {
  return clamp(Math.floor(value ?? config.defaultFinalCount), { min: config.minFinalCount, max: config.maxFinalCount });
}

export class RecommendationService {
  private readonly deps: RecommendationServiceDependencies;

  constructor(deps: RecommendationServiceDependencies) {
    this.deps = deps;
  }

  /**
   * Runs retrieval, reranking and balancing for a query and returns the
   * clamped list as records.
   */
  async run({ query, topK, finalCount }: RecommendQuery): Promise<RecommendationTrace> {
    const trimmed = query.trim();
    if (trimmed.length === 0) {
      throw badRequestError('Query must not be empty.', { field: 'query' });
    }

    const { retrievalConfig, recommendationConfig } = this.deps;
    const effectiveTopK = topK ?? retrievalConfig.defaultTopK;
    if (!Number.isInteger(effectiveTopK) || effectiveTopK < 1 || effectiveTopK > retrievalConfig.maxTopK) {
      throw badRequestError(`top_k must be an integer between 1 and ${retrievalConfig.maxTopK}.`, { field: 'top_k' });
    }

    const effectiveFinalCount = clampFinalCount(finalCount, recommendationConfig);
    const started = Date.now();

    const candidates = await this.deps.retriever.retrieve(trimmed, effectiveTopK);
    const { recommendations, domain, strategy } = await this.deps.reranker.rerank(trimmed, candidates, effectiveFinalCount);
    const clamped = recommendations.slice(0, effectiveFinalCount);

    this.deps.logger.info(
      {
        topK: effectiveTopK,
        finalCount: effectiveFinalCount,
        candidates: candidates.length,
        returned: clamped.length,
        domain,
        strategy,
        durationMs: Date.now() - started
      },
      'Recommendation completed.'
    );

    return { candidates, recommendations: clamped, domain, strategy, finalCount: effectiveFinalCount };
  }

  async recommend(request: RecommendQuery): Promise<RecommendResponse> {
    const { recommendations } = await this.run(request);
    return {
      recommended_assessments: recommendations.map((record) =>
        toRecommendedAssessment(record, this.deps.recommendationConfig.durationMinutes)
      )
    };
  }
}
