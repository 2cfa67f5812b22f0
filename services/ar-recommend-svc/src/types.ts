import type { EmbeddingHealthStatus } from './embedding-provider.js';
import type { CacheHealthStatus } from './ranking-cache.js';
import type { RankingHealthStatus } from './ranking-service.js';
import type { IndexHealth } from './similarity-index.js';

export type TestType = 'K' | 'P';

export type DomainLabel = 'technical' | 'behavioral' | 'mixed';

export type EmbeddingVector = number[];

export interface AssessmentRecord {
  name: string;
  url: string;
  category: string;
  testType: TestType;
  description: string;
}

export interface CandidateRecord extends AssessmentRecord {
  similarityScore: number;
}

export interface RetrievalFilters {
  testTypes?: TestType[];
  categories?: string[];
}

export type RankingFailureReason = 'disabled' | 'circuit_open' | 'timeout' | 'empty_response' | 'error';

export type RankingOutcome =
  | { ok: true; provider: string; text: string; latencyMs: number }
  | { ok: false; provider: string; reason: RankingFailureReason; message?: string };

export type RerankStrategy = 'llm' | 'cache' | 'fallback' | 'disabled';

export interface RecommendRequest {
  query: string;
  top_k?: number;
  final_count?: number;
}

export interface RecommendedAssessment {
  name: string;
  url: string;
  adaptive_support: 'Yes';
  description: string;
  duration: number;
  remote_support: 'Yes';
  test_type: string[];
}

export interface RecommendResponse {
  recommended_assessments: RecommendedAssessment[];
}

export interface DependencyHealthReport {
  index: IndexHealth;
  embedding: EmbeddingHealthStatus;
  ranking: RankingHealthStatus;
  cache: CacheHealthStatus;
}

export interface HealthResponse {
  status: 'healthy' | 'unhealthy';
  message: string;
  dependencies?: DependencyHealthReport;
}

export interface ServiceInfoResponse {
  service: string;
  version: string;
  status: 'ready' | 'initializing';
  endpoints: Record<string, string>;
}
