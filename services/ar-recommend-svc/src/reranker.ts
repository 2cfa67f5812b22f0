import type { Logger } from 'pino';

import { balance } from './balancer.js';
import type { DomainClassifier } from './domain-classifier.js';
import type { RankingCache } from './ranking-cache.js';
import type { RankingService } from './ranking-service.js';
import { applyRankingOrder, buildRankingPrompt, parseRankingOrder } from './rerank-prompt.js';
import type { CandidateRecord, DomainLabel, RerankStrategy } from './types.js';

export interface RerankerDependencies {
  classifier: DomainClassifier;
  ranking: RankingService | null;
  cache?: RankingCache | null;
  logger: Logger;
}

export interface RerankResult {
  recommendations: CandidateRecord[];
  domain: DomainLabel;
  strategy: RerankStrategy;
}

export class RerankerOrchestrator {
  private readonly classifier: DomainClassifier;
  private readonly ranking: RankingService | null;
  private readonly cache: RankingCache | null;
  private readonly logger: Logger;

  constructor(deps: RerankerDependencies) {
    this.classifier = deps.classifier;
    this.ranking = deps.ranking;
    this.cache = deps.cache ?? null;
    this.logger = deps.logger;
  }

  get rankingEnabled(): boolean {
    return this.ranking !== null;
  }

  async recommend(query: string, candidates: readonly CandidateRecord[], finalCount: number): Promise<CandidateRecord[]> {
    const result = await this.rerank(query, candidates, finalCount);
    return result.recommendations;
  }

  /**
   * Optionally reorders candidates through the external ranker, then always
   * balances. Any ranker failure leaves the retrieval order in place.
   */
  async rerank(query: string, candidates: readonly CandidateRecord[], finalCount: number): Promise<RerankResult> {
    const domain = this.classifier.classify(query);
    const { ordered, strategy } = await this.order(query, candidates, finalCount);
    const recommendations = balance(ordered, domain, finalCount);

    this.logger.debug(
      { domain, strategy, candidates: candidates.length, returned: recommendations.length },
      'Reranked candidates.'
    );

    return { recommendations, domain, strategy };
  }

  private async order(
    query: string,
    candidates: readonly CandidateRecord[],
    finalCount: number
  ): Promise<{ ordered: readonly CandidateRecord[]; strategy: RerankStrategy }> {
    if (!this.ranking) {
      return { ordered: candidates, strategy: 'disabled' };
    }

    if (candidates.length === 0) {
      return { ordered: candidates, strategy: 'fallback' };
    }

    const cacheKey = this.cache?.enabled ? this.cache.buildKey(query, candidates) : null;
    if (this.cache && cacheKey) {
      const cachedOrder = await this.cache.get(cacheKey);
      const cached = cachedOrder ? applyRankingOrder(candidates, cachedOrder) : [];
      if (cached.length > 0) {
        return { ordered: cached, strategy: 'cache' };
      }
    }

    const outcome = await this.ranking.rank(buildRankingPrompt(query, candidates, finalCount));
    if (!outcome.ok) {
      this.logger.warn({ provider: outcome.provider, reason: outcome.reason }, 'Ranking unavailable. Using retrieval order.');
      return { ordered: candidates, strategy: 'fallback' };
    }

    const order = parseRankingOrder(outcome.text, candidates.length);
    const reordered = order ? applyRankingOrder(candidates, order) : [];
    if (!order || reordered.length === 0) {
      this.logger.warn({ provider: outcome.provider }, 'Ranking reply held no usable ordering. Using retrieval order.');
      return { ordered: candidates, strategy: 'fallback' };
    }

    if (this.cache && cacheKey) {
      await this.cache.set(cacheKey, order);
    }

    return { ordered: reordered, strategy: 'llm' };
  }
}
