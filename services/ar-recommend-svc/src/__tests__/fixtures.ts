import { pino } from 'pino';

import type { RecommenderComponents } from '../app-context.js';
import { CatalogStore } from '../catalog-store.js';
import type { RecommendationConfig, RetrievalConfig } from '../config.js';
import { DomainClassifier, type DomainVocabulary } from '../domain-classifier.js';
import type { EmbeddingHealthStatus, EmbeddingProvider } from '../embedding-provider.js';
import type { RankingHealthStatus, RankingService } from '../ranking-service.js';
import { RecommendationService } from '../recommend-service.js';
import { RerankerOrchestrator } from '../reranker.js';
import { Retriever } from '../retriever.js';
import type { IndexHealth, SimilarityHit, SimilarityIndex } from '../similarity-index.js';
import type { CandidateRecord, EmbeddingVector, RankingOutcome, TestType } from '../types.js';

export const silentLogger = pino({ level: 'silent' });

export const CATALOG_BASE_URL = 'https://assessments.example.com/catalog/';

export const testVocabulary: DomainVocabulary = {
  technical: ['java', 'sql', 'python', 'developer'],
  behavioral: ['teamwork', 'leadership', 'communication', 'resilience']
};

export const retrievalConfig: RetrievalConfig = {
  similarityFloor: 0.2,
  defaultTopK: 20,
  maxTopK: 50,
  filterPrefetch: 50
};

export const recommendationConfig: RecommendationConfig = {
  defaultFinalCount: 10,
  minFinalCount: 5,
  maxFinalCount: 10,
  durationMinutes: 30
};

export function candidate(slug: string, testType: TestType, similarityScore = 0.9): CandidateRecord {
  return {
    name: slug,
    url: `${CATALOG_BASE_URL}${slug}`,
    category: testType === 'K' ? 'Technical' : 'Behavioral',
    testType,
    description: `${slug} description`,
    similarityScore
  };
}

export function knowledgeItems(count: number, prefix = 'k'): CandidateRecord[] {
  return Array.from({ length: count }, (_, idx) => candidate(`${prefix}${idx + 1}`, 'K'));
}

export function personalityItems(count: number, prefix = 'p'): CandidateRecord[] {
  return Array.from({ length: count }, (_, idx) => candidate(`${prefix}${idx + 1}`, 'P'));
}

export function urls(records: readonly { url: string }[]): string[] {
  return records.map((record) => record.url.slice(CATALOG_BASE_URL.length));
}

export function toHits(records: readonly CandidateRecord[]): SimilarityHit[] {
  return records.map(({ similarityScore, ...record }) => ({ record, score: similarityScore }));
}

export class StubEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'local' as const;
  readonly model = 'stub-model';
  readonly texts: string[] = [];

  constructor(readonly dimensions: number, private readonly vector: EmbeddingVector = new Array<number>(dimensions).fill(1)) {}

  async generateEmbedding(text: string): Promise<EmbeddingVector> {
    this.texts.push(text);
    return this.vector;
  }

  async healthCheck(): Promise<EmbeddingHealthStatus> {
    return { status: 'healthy' };
  }
}

export class StubIndex implements SimilarityIndex {
  readonly backend = 'flat' as const;
  readonly searches: number[] = [];
  closed = false;

  constructor(readonly dimensions: number, private readonly hits: SimilarityHit[]) {}

  async search(_vector: EmbeddingVector, k: number): Promise<SimilarityHit[]> {
    this.searches.push(k);
    return this.hits.slice(0, Math.max(0, k));
  }

  async healthCheck(): Promise<IndexHealth> {
    return this.hits.length > 0
      ? { status: 'healthy', size: this.hits.length }
      : { status: 'unhealthy', size: 0, message: 'Index is empty.' };
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class StubRankingService implements RankingService {
  readonly name = 'stub';
  readonly prompts: string[] = [];

  constructor(private readonly outcome: RankingOutcome) {}

  async rank(prompt: string): Promise<RankingOutcome> {
    this.prompts.push(prompt);
    return this.outcome;
  }

  async healthCheck(): Promise<RankingHealthStatus> {
    return { status: 'healthy' };
  }

  async close(): Promise<void> {}
}

export function rankedReply(text: string): RankingOutcome {
  return { ok: true, provider: 'stub', text, latencyMs: 5 };
}

export function buildComponents(
  records: readonly CandidateRecord[],
  ranking: RankingService | null = null,
  embeddingProvider: EmbeddingProvider = new StubEmbeddingProvider(4)
): RecommenderComponents {
  const catalog = new CatalogStore(records.map(({ similarityScore: _score, ...record }) => record));
  const index = new StubIndex(4, toHits(records));
  const retriever = new Retriever({ embeddingProvider, index, config: retrievalConfig, logger: silentLogger });
  const reranker = new RerankerOrchestrator({
    classifier: new DomainClassifier(testVocabulary),
    ranking,
    logger: silentLogger
  });
  const recommendations = new RecommendationService({
    retriever,
    reranker,
    retrievalConfig,
    recommendationConfig,
    logger: silentLogger
  });

  return { catalog, embeddingProvider, index, retriever, reranker, recommendations, ranking, cache: null };
}
