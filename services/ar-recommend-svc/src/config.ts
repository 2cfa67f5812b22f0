import { fileURLToPath } from 'node:url';
import { isAbsolute, join } from 'node:path';

import { clamp, getConfig as getBaseConfig, parseBoolean, parseNumber, type ServiceConfig } from '@ar/common';

export type EmbeddingProviderName = 'local' | 'remote';
export type IndexBackend = 'flat' | 'pgvector';
export type RankerProviderName = 'gemini' | 'together' | 'none';

export interface CatalogConfig {
  dataDir: string;
  catalogFile: string;
  embeddingsFile: string;
  vocabularyFile: string;
}

export interface RemoteEmbeddingConfig {
  baseUrl: string;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
  circuitBreakerFailures: number;
  circuitBreakerCooldownMs: number;
  authToken?: string;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderName;
  dimensions: number;
  remote: RemoteEmbeddingConfig;
}

export interface PgVectorConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password?: string;
  ssl: boolean;
  schema: string;
  table: string;
  dimensions: number;
  poolMax: number;
  idleTimeoutMs: number;
  connectionTimeoutMs: number;
  statementTimeoutMs: number;
  enableAutoMigrate: boolean;
}

export interface IndexConfig {
  backend: IndexBackend;
  pgvector: PgVectorConfig;
}

export interface RetrievalConfig {
  similarityFloor: number;
  defaultTopK: number;
  maxTopK: number;
  filterPrefetch: number;
}

export interface RecommendationConfig {
  defaultFinalCount: number;
  minFinalCount: number;
  maxFinalCount: number;
  durationMinutes: number;
}

export interface GeminiConfig {
  projectId: string | null;
  location: string;
  model: string;
  temperature: number;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
  circuitBreakerThreshold: number;
  circuitBreakerCooldownMs: number;
  enable: boolean;
}

export interface TogetherAIConfig {
  apiKey: string | null;
  baseUrl: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
  circuitBreakerThreshold: number;
  circuitBreakerCooldownMs: number;
  enable: boolean;
}

export interface RankerConfig {
  provider: RankerProviderName;
  gemini: GeminiConfig;
  together: TogetherAIConfig;
}

export interface RankingCacheConfig {
  host: string;
  port: number;
  password?: string;
  tls: boolean;
  keyPrefix: string;
  ttlSeconds: number;
  disable: boolean;
}

export interface ServerRuntimeConfig {
  port: number;
  host: string;
  version: string;
}

export interface RecommendServiceConfig {
  base: ServiceConfig;
  catalog: CatalogConfig;
  embedding: EmbeddingConfig;
  index: IndexConfig;
  retrieval: RetrievalConfig;
  recommendation: RecommendationConfig;
  ranker: RankerConfig;
  cache: RankingCacheConfig;
  server: ServerRuntimeConfig;
}

const DEFAULT_DATA_DIR = fileURLToPath(new URL('../data/', import.meta.url));

let cachedConfig: RecommendServiceConfig | null = null;

function normalizeUrl(value: string | undefined, fallback: string): string {
  if (!value) {
    return fallback;
  }
  return value.endsWith('/') ? value.slice(0, -1) : value;
}

function resolveDataPath(dataDir: string, value: string | undefined, fallback: string): string {
  const file = value?.trim() || fallback;
  return isAbsolute(file) ? file : join(dataDir, file);
}

function resolveEmbeddingProvider(value: string | undefined): EmbeddingProviderName {
  return value?.trim().toLowerCase() === 'remote' ? 'remote' : 'local';
}

function resolveIndexBackend(value: string | undefined): IndexBackend {
  return value?.trim().toLowerCase() === 'pgvector' ? 'pgvector' : 'flat';
}

function resolveRankerProvider(value: string | undefined, geminiProject: string | null, togetherKey: string | null): RankerProviderName {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'gemini' || normalized === 'together' || normalized === 'none') {
    return normalized;
  }

  if (geminiProject) {
    return 'gemini';
  }

  return togetherKey ? 'together' : 'none';
}

export function getRecommendServiceConfig(): RecommendServiceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const base = getBaseConfig();
  const dataDir = process.env.DATA_DIR?.trim() || DEFAULT_DATA_DIR;
  const dimensions = clamp(Math.floor(parseNumber(process.env.EMBEDDING_DIMENSIONS, 256)), { min: 8, max: 4096 });

  const catalog: CatalogConfig = {
    dataDir,
    catalogFile: resolveDataPath(dataDir, process.env.CATALOG_FILE, 'catalog.json'),
    embeddingsFile: resolveDataPath(dataDir, process.env.EMBEDDINGS_FILE, 'embeddings.json'),
    vocabularyFile: resolveDataPath(dataDir, process.env.DOMAIN_VOCABULARY_FILE, 'domain-vocabulary.json')
  };

  const embedding: EmbeddingConfig = {
    provider: resolveEmbeddingProvider(process.env.EMBEDDING_PROVIDER),
    dimensions,
    remote: {
      baseUrl: normalizeUrl(process.env.EMBED_SERVICE_URL, 'http://localhost:7101'),
      timeoutMs: clamp(parseNumber(process.env.EMBED_TIMEOUT_MS, 2_000), { min: 100, max: 30_000 }),
      retries: clamp(parseNumber(process.env.EMBED_RETRIES, 2), { min: 0, max: 5 }),
      retryDelayMs: clamp(parseNumber(process.env.EMBED_RETRY_DELAY_MS, 100), { min: 0, max: 5_000 }),
      circuitBreakerFailures: clamp(parseNumber(process.env.EMBED_CB_FAILURES, 5), { min: 1, max: 50 }),
      circuitBreakerCooldownMs: clamp(parseNumber(process.env.EMBED_CB_COOLDOWN_MS, 30_000), { min: 1_000, max: 600_000 }),
      authToken: process.env.EMBED_SERVICE_TOKEN || undefined
    }
  };

  const index: IndexConfig = {
    backend: resolveIndexBackend(process.env.INDEX_BACKEND),
    pgvector: {
      host: process.env.PGVECTOR_HOST ?? 'localhost',
      port: parseNumber(process.env.PGVECTOR_PORT, 5432),
      database: process.env.PGVECTOR_DATABASE ?? 'assessments',
      user: process.env.PGVECTOR_USER ?? 'recommender',
      password: process.env.PGVECTOR_PASSWORD || undefined,
      ssl: parseBoolean(process.env.PGVECTOR_SSL, false),
      schema: process.env.PGVECTOR_SCHEMA ?? 'recommender',
      table: process.env.PGVECTOR_TABLE ?? 'assessment_embeddings',
      dimensions,
      poolMax: clamp(parseNumber(process.env.PGVECTOR_POOL_MAX, 5), { min: 1, max: 50 }),
      idleTimeoutMs: parseNumber(process.env.PGVECTOR_IDLE_TIMEOUT_MS, 30_000),
      connectionTimeoutMs: parseNumber(process.env.PGVECTOR_CONNECTION_TIMEOUT_MS, 5_000),
      statementTimeoutMs: parseNumber(process.env.PGVECTOR_STATEMENT_TIMEOUT_MS, 10_000),
      enableAutoMigrate: parseBoolean(process.env.PGVECTOR_AUTO_MIGRATE, false)
    }
  };

  const retrieval: RetrievalConfig = {
    similarityFloor: clamp(parseNumber(process.env.RETRIEVAL_SIMILARITY_FLOOR, 0.2), { min: -1, max: 1 }),
    defaultTopK: clamp(parseNumber(process.env.RETRIEVAL_TOP_K, 20), { min: 1, max: 50 }),
    maxTopK: 50,
    filterPrefetch: clamp(parseNumber(process.env.RETRIEVAL_FILTER_PREFETCH, 50), { min: 1, max: 500 })
  };

  const recommendation: RecommendationConfig = {
    defaultFinalCount: clamp(parseNumber(process.env.FINAL_RECOMMENDATIONS, 10), { min: 5, max: 10 }),
    minFinalCount: 5,
    maxFinalCount: 10,
    durationMinutes: clamp(parseNumber(process.env.ASSESSMENT_DURATION_MINUTES, 30), { min: 1, max: 600 })
  };

  const geminiProject = process.env.GEMINI_PROJECT_ID?.trim() || process.env.GOOGLE_CLOUD_PROJECT?.trim() || null;
  const togetherKey = process.env.TOGETHER_API_KEY?.trim() || null;
  const provider = resolveRankerProvider(process.env.RANKER_PROVIDER, geminiProject, togetherKey);
  const rankerTimeoutMs = clamp(parseNumber(process.env.RANKER_TIMEOUT_MS, 8_000), { min: 250, max: 60_000 });

  const ranker: RankerConfig = {
    provider,
    gemini: {
      projectId: geminiProject,
      location: process.env.GEMINI_LOCATION ?? 'us-central1',
      model: process.env.GEMINI_MODEL ?? 'gemini-1.5-flash',
      temperature: clamp(parseNumber(process.env.GEMINI_TEMPERATURE, 0), { min: 0, max: 2 }),
      timeoutMs: rankerTimeoutMs,
      retries: clamp(parseNumber(process.env.RANKER_RETRIES, 1), { min: 0, max: 5 }),
      retryDelayMs: clamp(parseNumber(process.env.RANKER_RETRY_DELAY_MS, 200), { min: 0, max: 5_000 }),
      circuitBreakerThreshold: clamp(parseNumber(process.env.RANKER_CB_FAILURES, 4), { min: 1, max: 20 }),
      circuitBreakerCooldownMs: clamp(parseNumber(process.env.RANKER_CB_COOLDOWN_MS, 60_000), { min: 5_000, max: 600_000 }),
      enable: provider === 'gemini' && geminiProject !== null
    },
    together: {
      apiKey: togetherKey,
      baseUrl: normalizeUrl(process.env.TOGETHER_API_BASE_URL, 'https://api.together.xyz/v1'),
      model: process.env.TOGETHER_MODEL ?? 'meta-llama/Llama-3.3-70B-Instruct-Turbo',
      maxTokens: clamp(parseNumber(process.env.TOGETHER_MAX_TOKENS, 256), { min: 16, max: 4_096 }),
      timeoutMs: rankerTimeoutMs,
      retries: clamp(parseNumber(process.env.RANKER_RETRIES, 1), { min: 0, max: 5 }),
      retryDelayMs: clamp(parseNumber(process.env.RANKER_RETRY_DELAY_MS, 200), { min: 0, max: 5_000 }),
      circuitBreakerThreshold: clamp(parseNumber(process.env.RANKER_CB_FAILURES, 4), { min: 1, max: 20 }),
      circuitBreakerCooldownMs: clamp(parseNumber(process.env.RANKER_CB_COOLDOWN_MS, 60_000), { min: 5_000, max: 600_000 }),
      enable: provider === 'together' && togetherKey !== null
    }
  };

  const cache: RankingCacheConfig = {
    host: process.env.REDIS_HOST ?? base.redis.host,
    port: parseNumber(process.env.REDIS_PORT, base.redis.port),
    password: process.env.REDIS_PASSWORD ?? base.redis.password,
    tls: parseBoolean(process.env.REDIS_TLS, false),
    keyPrefix: process.env.RANKING_CACHE_PREFIX ?? 'ar:ranking',
    ttlSeconds: parseNumber(process.env.RANKING_CACHE_TTL_SECONDS, base.runtime.cacheTtlSeconds),
    disable: !parseBoolean(process.env.RANKING_CACHE_ENABLE, false)
  };

  const server: ServerRuntimeConfig = {
    port: parseNumber(process.env.PORT, 8000),
    host: process.env.HOST ?? '0.0.0.0',
    version: process.env.SERVICE_VERSION ?? '1.0.0'
  };

  cachedConfig = {
    base,
    catalog,
    embedding,
    index,
    retrieval,
    recommendation,
    ranker,
    cache,
    server
  };

  return cachedConfig;
}

export function resetRecommendServiceConfig(): void {
  cachedConfig = null;
}
