import axios, { type AxiosInstance } from 'axios';
import pRetry, { AbortError } from 'p-retry';
import type { Logger } from 'pino';
import { z } from 'zod';
import { CircuitBreaker, isCircuitOpenError } from '@ar/common';

import type { RemoteEmbeddingConfig } from './config.js';
import type { EmbeddingHealthStatus, EmbeddingProvider } from './embedding-provider.js';
import { EmbeddingError } from './errors.js';
import type { EmbeddingVector } from './types.js';

const embeddingResponseSchema = z.object({
  embedding: z.array(z.number()),
  model: z.string().optional(),
  dimensions: z.number().optional()
});

/**
 * Embedding provider backed by an HTTP embedding service exposing
 * `POST /v1/embeddings/generate`.
 */
export class RemoteEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'remote' as const;
  readonly model = 'remote-embed-service';
  private readonly http: AxiosInstance;
  private readonly breaker: CircuitBreaker;

  constructor(
    private readonly config: RemoteEmbeddingConfig,
    readonly dimensions: number,
    private readonly logger: Logger
  ) {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (config.authToken) {
      headers.Authorization = `Bearer ${config.authToken}`;
    }

    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers
    });
    this.breaker = new CircuitBreaker({
      failureThreshold: config.circuitBreakerFailures,
      successThreshold: 1,
      timeoutMs: config.circuitBreakerCooldownMs
    });
  }

  async generateEmbedding(text: string): Promise<EmbeddingVector> {
    try {
      return await this.breaker.exec(() =>
        pRetry(() => this.requestEmbedding(text), {
          retries: this.config.retries,
          factor: 2,
          minTimeout: this.config.retryDelayMs,
          maxTimeout: this.config.retryDelayMs * 4,
          onFailedAttempt: (error) => {
            this.logger.warn(
              { attempt: error.attemptNumber, retriesLeft: error.retriesLeft, error: error.message },
              'Embedding generation attempt failed.'
            );
          }
        })
      );
    } catch (error) {
      if (error instanceof EmbeddingError) {
        throw error;
      }

      if (isCircuitOpenError(error)) {
        this.logger.warn({ event: 'embed.circuit_short_circuit' }, 'Embedding circuit breaker is open; skipping downstream call.');
      }

      throw new EmbeddingError('unavailable', 'Embedding provider is unavailable.', { cause: error });
    }
  }

  private async requestEmbedding(text: string): Promise<EmbeddingVector> {
    const response = await this.http.post('/v1/embeddings/generate', { text, dimensions: this.dimensions });
    const parsed = embeddingResponseSchema.safeParse(response.data);

    if (!parsed.success || parsed.data.embedding.length === 0) {
      throw new AbortError(
        new EmbeddingError('malformed', 'Embedding service returned an empty or invalid embedding.', {
          details: { status: response.status }
        })
      );
    }

    return parsed.data.embedding;
  }

  async healthCheck(): Promise<EmbeddingHealthStatus> {
    const start = Date.now();
    try {
      const response = await this.http.get('/health');
      const latencyMs = Date.now() - start;
      if (response.status >= 200 && response.status < 300) {
        return { status: 'healthy', latencyMs } satisfies EmbeddingHealthStatus;
      }
      return { status: 'degraded', latencyMs, message: `Unexpected status ${response.status}` } satisfies EmbeddingHealthStatus;
    } catch (error) {
      this.logger.error({ error }, 'Embedding service health check failed.');
      return {
        status: 'unavailable',
        message: 'Embedding service unreachable.'
      } satisfies EmbeddingHealthStatus;
    }
  }
}
