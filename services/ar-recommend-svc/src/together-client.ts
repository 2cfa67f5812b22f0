import axios, { type AxiosInstance } from 'axios';
import pRetry, { AbortError } from 'p-retry';
import pTimeout from 'p-timeout';
import type { Logger } from 'pino';
import { z } from 'zod';
import { CircuitBreaker } from '@ar/common';

import type { TogetherAIConfig } from './config.js';
import { isTimeoutError, rankingFailure, type RankingHealthStatus, type RankingService } from './ranking-service.js';
import type { RankingOutcome } from './types.js';

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish()
        })
      })
    )
    .min(1)
});

function responseStatus(error: unknown): number | undefined {
  if (
    error instanceof Error &&
    'response' in error &&
    typeof error.response === 'object' &&
    error.response !== null &&
    'status' in error.response &&
    typeof error.response.status === 'number'
  ) {
    return error.response.status;
  }
  return undefined;
}

function isRetryable(error: unknown): boolean {
  const status = responseStatus(error);
  if (status === undefined) {
    return !isTimeoutError(error);
  }
  return status >= 500 || status === 429;
}

export class TogetherRankingClient implements RankingService {
  readonly name = 'together';
  private readonly http: AxiosInstance | null;
  private readonly breaker: CircuitBreaker;

  constructor(private readonly config: TogetherAIConfig, private readonly logger: Logger) {
    this.breaker = new CircuitBreaker({
      failureThreshold: config.circuitBreakerThreshold,
      successThreshold: 1,
      timeoutMs: config.circuitBreakerCooldownMs
    });

    if (!config.enable || !config.apiKey) {
      this.logger.warn('Together AI integration disabled. Falling back to rule-based ordering.');
      this.http = null;
      return;
    }

    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: {
        Authorization: `Bearer ${config.apiKey}`,
        'Content-Type': 'application/json'
      }
    });
  }

  async rank(prompt: string): Promise<RankingOutcome> {
    const http = this.http;
    if (!http) {
      return { ok: false, provider: this.name, reason: 'disabled' };
    }

    const startedAt = Date.now();

    try {
      const text = await this.breaker.exec(() =>
        pRetry(
          async (attempt) => {
            try {
              return await pTimeout(this.complete(http, prompt), {
                milliseconds: this.config.timeoutMs + 50,
                message: 'Together chat completion timed out.'
              });
            } catch (error) {
              if (!isRetryable(error)) {
                this.logger.warn({ attempt, status: responseStatus(error) }, 'Together chat completion failed without retry.');
                throw new AbortError(error instanceof Error ? error : String(error));
              }
              throw error;
            }
          },
          {
            retries: this.config.retries,
            factor: 1,
            minTimeout: this.config.retryDelayMs,
            maxTimeout: this.config.retryDelayMs * 3,
            onFailedAttempt: (error) => {
              this.logger.warn({ attempt: error.attemptNumber, error: error.message }, 'Together chat completion attempt failed.');
            }
          }
        )
      );

      const latencyMs = Date.now() - startedAt;
      if (text.trim().length === 0) {
        return { ok: false, provider: this.name, reason: 'empty_response' };
      }

      return { ok: true, provider: this.name, text, latencyMs };
    } catch (error) {
      this.logger.warn(
        { status: responseStatus(error), error: error instanceof Error ? error.message : String(error) },
        'Together ranking failed.'
      );
      return rankingFailure(this.name, error);
    }
  }

  private async complete(http: AxiosInstance, prompt: string): Promise<string> {
    const response = await http.post('/chat/completions', {
      model: this.config.model,
      messages: [{ role: 'user', content: prompt }],
      temperature: 0,
      max_tokens: this.config.maxTokens
    });

    const parsed = chatCompletionSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new AbortError('Together response did not match the chat completion shape.');
    }

    return parsed.data.choices[0].message.content ?? '';
  }

  async healthCheck(): Promise<RankingHealthStatus> {
    if (!this.http) {
      return { status: 'disabled', message: 'Together AI disabled via configuration.' };
    }

    if (this.breaker.getState() === 'OPEN') {
      return { status: 'degraded', circuitOpen: true, failureCount: this.breaker.getFailureCount() };
    }

    return { status: 'healthy', failureCount: this.breaker.getFailureCount() };
  }

  async close(): Promise<void> {
    this.logger.debug('Together client closed.');
  }
}
