import type { Logger } from 'pino';

import type { EmbeddingConfig, EmbeddingProviderName } from './config.js';
import { RemoteEmbeddingProvider } from './embed-client.js';
import type { EmbeddingVector } from './types.js';

export interface EmbeddingHealthStatus {
  status: 'healthy' | 'degraded' | 'unavailable';
  latencyMs?: number;
  message?: string;
}

export interface EmbeddingProvider {
  readonly name: EmbeddingProviderName;
  readonly model: string;
  readonly dimensions: number;
  generateEmbedding(text: string): Promise<EmbeddingVector>;
  healthCheck(): Promise<EmbeddingHealthStatus>;
}

const INPUT_CHARACTER_LIMIT = 3_000;
const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9+#]+/)
    .filter((token) => token.length > 0);
}

function fnv1a(token: string): number {
  let hash = FNV_OFFSET;
  for (let i = 0; i < token.length; i += 1) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

export function l2Normalize(vector: EmbeddingVector): EmbeddingVector {
  const magnitude = Math.sqrt(vector.reduce((acc, value) => acc + value * value, 0));
  return magnitude > 0 ? vector.map((value) => value / magnitude) : vector.slice();
}

/**
 * Hashed bag-of-words embedding. Texts sharing vocabulary land close together,
 * which is enough for offline runs and tests without a model server.
 */
export class LocalDeterministicProvider implements EmbeddingProvider {
  readonly name: EmbeddingProviderName = 'local';
  readonly model = 'local-hashed-bow';
  readonly dimensions: number;

  constructor(dimensions: number) {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new Error(`Embedding dimensions must be a positive integer, received ${dimensions}.`);
    }
    this.dimensions = dimensions;
  }

  async generateEmbedding(text: string): Promise<EmbeddingVector> {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text.slice(0, INPUT_CHARACTER_LIMIT))) {
      vector[fnv1a(token) % this.dimensions] += 1;
    }
    return l2Normalize(vector);
  }

  async healthCheck(): Promise<EmbeddingHealthStatus> {
    return { status: 'healthy' };
  }
}

export interface EmbeddingProviderFactoryOptions {
  config: EmbeddingConfig;
  logger: Logger;
}

export function createEmbeddingProvider({ config, logger }: EmbeddingProviderFactoryOptions): EmbeddingProvider {
  if (config.provider === 'remote') {
    logger.info({ baseUrl: config.remote.baseUrl, dimensions: config.dimensions }, 'Using remote embedding provider.');
    return new RemoteEmbeddingProvider(config.remote, config.dimensions, logger);
  }

  logger.info({ dimensions: config.dimensions }, 'Using local deterministic embedding provider.');
  return new LocalDeterministicProvider(config.dimensions);
}
