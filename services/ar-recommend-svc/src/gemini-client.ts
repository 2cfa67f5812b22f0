import { VertexAI, type GenerativeModel } from '@google-cloud/vertexai';
import pRetry, { AbortError } from 'p-retry';
import pTimeout from 'p-timeout';
import type { Logger } from 'pino';
import { CircuitBreaker } from '@ar/common';

import type { GeminiConfig } from './config.js';
import { isTimeoutError, rankingFailure, type RankingHealthStatus, type RankingService } from './ranking-service.js';
import type { RankingOutcome } from './types.js';

const MAX_OUTPUT_TOKENS = 256;

export class GeminiRankingClient implements RankingService {
  readonly name = 'gemini';
  private readonly model: GenerativeModel | null;
  private readonly breaker: CircuitBreaker;

  constructor(private readonly config: GeminiConfig, private readonly logger: Logger) {
    this.breaker = new CircuitBreaker({
      failureThreshold: config.circuitBreakerThreshold,
      successThreshold: 1,
      timeoutMs: config.circuitBreakerCooldownMs
    });

    if (!config.enable || !config.projectId) {
      this.logger.warn('Gemini integration disabled. Falling back to rule-based ordering.');
      this.model = null;
      return;
    }

    this.model = new VertexAI({ project: config.projectId, location: config.location }).getGenerativeModel({
      model: config.model,
      generationConfig: {
        temperature: config.temperature,
        maxOutputTokens: MAX_OUTPUT_TOKENS
      }
    });
    this.logger.info({ model: config.model, project: config.projectId }, 'Gemini client initialized.');
  }

  async rank(prompt: string): Promise<RankingOutcome> {
    const model = this.model;
    if (!model) {
      return { ok: false, provider: this.name, reason: 'disabled' };
    }

    const startedAt = Date.now();

    try {
      const text = await this.breaker.exec(() =>
        pRetry(
          async (attempt) => {
            try {
              return await pTimeout(this.generate(model, prompt), {
                milliseconds: this.config.timeoutMs,
                message: 'Gemini generateContent timed out.'
              });
            } catch (error) {
              if (isTimeoutError(error)) {
                this.logger.warn({ attempt }, 'Gemini request timed out.');
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
              this.logger.warn({ attempt: error.attemptNumber, error: error.message }, 'Gemini request attempt failed.');
            }
          }
        )
      );

      const latencyMs = Date.now() - startedAt;
      if (text.trim().length === 0) {
        this.logger.warn({ latencyMs }, 'Gemini returned an empty response.');
        return { ok: false, provider: this.name, reason: 'empty_response' };
      }

      return { ok: true, provider: this.name, text, latencyMs };
    } catch (error) {
      this.logger.warn({ error, latencyMs: Date.now() - startedAt }, 'Gemini ranking failed.');
      return rankingFailure(this.name, error);
    }
  }

  private async generate(model: GenerativeModel, prompt: string): Promise<string> {
    const result = await model.generateContent({
      contents: [{ role: 'user', parts: [{ text: prompt }] }]
    });

    const parts = result.response.candidates?.[0]?.content?.parts ?? [];
    return parts.map((part) => part.text ?? '').join('');
  }

  async healthCheck(): Promise<RankingHealthStatus> {
    if (!this.model) {
      return { status: 'disabled', message: 'Gemini disabled via configuration.' };
    }

    if (this.breaker.getState() === 'OPEN') {
      return { status: 'degraded', circuitOpen: true, failureCount: this.breaker.getFailureCount() };
    }

    return { status: 'healthy', failureCount: this.breaker.getFailureCount() };
  }

  async close(): Promise<void> {
    this.logger.debug('Gemini client closed.');
  }
}
