import { circuitOpenError } from '@ar/common';
import { TimeoutError } from 'p-timeout';
import { describe, expect, it, vi } from 'vitest';

import type { RankerConfig } from '../config.js';
import { GeminiRankingClient } from '../gemini-client.js';
import { createRankingService } from '../ranking-providers.js';
import { classifyRankingFailure, isTimeoutError, rankingFailure } from '../ranking-service.js';
import { TogetherRankingClient } from '../together-client.js';
import { silentLogger } from './fixtures.js';

vi.mock('@google-cloud/vertexai', () => ({
  VertexAI: class {
    getGenerativeModel() {
      return { generateContent: vi.fn() };
    }
  }
}));

const rankerConfig: RankerConfig = {
  provider: 'none',
  gemini: {
    projectId: 'test-project',
    location: 'us-central1',
    model: 'gemini-test',
    temperature: 0,
    timeoutMs: 1_000,
    retries: 0,
    retryDelayMs: 0,
    circuitBreakerThreshold: 2,
    circuitBreakerCooldownMs: 60_000,
    enable: false
  },
  together: {
    apiKey: 'test-secret',
    baseUrl: 'https://together.example.com/v1',
    model: 'test-model',
    maxTokens: 256,
    timeoutMs: 1_000,
    retries: 0,
    retryDelayMs: 0,
    circuitBreakerThreshold: 2,
    circuitBreakerCooldownMs: 60_000,
    enable: false
  }
};

describe('isTimeoutError', () => {
  it('recognises timeout shapes', () => {
    expect(isTimeoutError(new TimeoutError('slow'))).toBe(true);
    expect(isTimeoutError(new Error('Request timed out'))).toBe(true);
    expect(isTimeoutError(Object.assign(new Error('socket'), { code: 'ETIMEDOUT' }))).toBe(true);
    expect(isTimeoutError(Object.assign(new Error('socket'), { code: 'ECONNRESET' }))).toBe(false);
    expect(isTimeoutError('timed out')).toBe(false);
  });
});

describe('classifyRankingFailure', () => {
  it('names the failure', () => {
    expect(classifyRankingFailure(circuitOpenError('Circuit breaker is open.'))).toBe('circuit_open');
    expect(classifyRankingFailure(new TimeoutError('slow'))).toBe('timeout');
    expect(classifyRankingFailure(new Error('boom'))).toBe('error');
  });

  it('builds a failed outcome', () => {
    expect(rankingFailure('together', 'plain failure')).toEqual({
      ok: false,
      provider: 'together',
      reason: 'error',
      message: 'plain failure'
    });
  });
});

describe('createRankingService', () => {
  it('returns nothing without an enabled provider', () => {
    expect(createRankingService(rankerConfig, silentLogger)).toBeNull();
    expect(createRankingService({ ...rankerConfig, provider: 'gemini' }, silentLogger)).toBeNull();
  });

  it('builds the Gemini client', () => {
    const service = createRankingService(
      { ...rankerConfig, provider: 'gemini', gemini: { ...rankerConfig.gemini, enable: true } },
      silentLogger
    );

    expect(service).toBeInstanceOf(GeminiRankingClient);
  });

  it('builds the Together client', () => {
    const service = createRankingService(
      { ...rankerConfig, provider: 'together', together: { ...rankerConfig.together, enable: true } },
      silentLogger
    );

    expect(service).toBeInstanceOf(TogetherRankingClient);
    expect(service?.name).toBe('together');
  });
});
