import { beforeEach, describe, expect, it, vi } from 'vitest';

import type { TogetherAIConfig } from '../config.js';
import { TogetherRankingClient } from '../together-client.js';
import { silentLogger } from './fixtures.js';

const postMock = vi.hoisted(() => vi.fn());

vi.mock('axios', () => ({
  default: {
    create: vi.fn(() => ({ post: postMock }))
  }
}));

const baseConfig: TogetherAIConfig = {
  apiKey: 'test-secret',
  baseUrl: 'https://together.example.com/v1',
  model: 'test-model',
  maxTokens: 256,
  timeoutMs: 1_000,
  retries: 1,
  retryDelayMs: 0,
  circuitBreakerThreshold: 3,
  circuitBreakerCooldownMs: 60_000,
  enable: true
};

function completion(content: string | null) {
  return { status: 200, data: { choices: [{ message: { content } }] } };
}

function httpError(status: number, message: string): Error {
  return Object.assign(new Error(message), { response: { status } });
}

describe('TogetherRankingClient', () => {
  beforeEach(() => {
    postMock.mockReset();
  });

  it('returns the completion text', async () => {
    postMock.mockResolvedValueOnce(completion('[1, 3, 2]'));
    const client = new TogetherRankingClient(baseConfig, silentLogger);

    expect(await client.rank('rank these')).toEqual({
      ok: true,
      provider: 'together',
      text: '[1, 3, 2]',
      latencyMs: expect.any(Number)
    });
    expect(postMock).toHaveBeenCalledWith('/chat/completions', {
      model: 'test-model',
      messages: [{ role: 'user', content: 'rank these' }],
      temperature: 0,
      max_tokens: 256
    });
  });

  it('retries server errors', async () => {
    postMock.mockRejectedValueOnce(httpError(503, 'Service Unavailable')).mockResolvedValueOnce(completion('[1]'));
    const client = new TogetherRankingClient(baseConfig, silentLogger);

    const outcome = await client.rank('rank these');

    expect(outcome).toMatchObject({ ok: true, text: '[1]' });
    expect(postMock).toHaveBeenCalledTimes(2);
  });

  it('does not retry client errors', async () => {
    postMock.mockRejectedValue(httpError(400, 'Bad Request'));
    const client = new TogetherRankingClient(baseConfig, silentLogger);

    expect(await client.rank('rank these')).toEqual({
      ok: false,
      provider: 'together',
      reason: 'error',
      message: 'Bad Request'
    });
    expect(postMock).toHaveBeenCalledTimes(1);
  });

  it('classifies request timeouts', async () => {
    postMock.mockRejectedValue(Object.assign(new Error('timeout of 1000ms exceeded'), { code: 'ECONNABORTED' }));
    const client = new TogetherRankingClient(baseConfig, silentLogger);

    expect(await client.rank('rank these')).toMatchObject({ ok: false, reason: 'timeout' });
    expect(postMock).toHaveBeenCalledTimes(1);
  });

  it('rejects replies that are not chat completions', async () => {
    postMock.mockResolvedValue({ status: 200, data: { error: 'nope' } });
    const client = new TogetherRankingClient(baseConfig, silentLogger);

    expect(await client.rank('rank these')).toEqual({
      ok: false,
      provider: 'together',
      reason: 'error',
      message: 'Together response did not match the chat completion shape.'
    });
    expect(postMock).toHaveBeenCalledTimes(1);
  });

  it('reports an empty completion', async () => {
    postMock.mockResolvedValueOnce(completion(null));
    const client = new TogetherRankingClient(baseConfig, silentLogger);

    expect(await client.rank('rank these')).toEqual({ ok: false, provider: 'together', reason: 'empty_response' });
  });

  it('stays idle without an API key', async () => {
    const client = new TogetherRankingClient({ ...baseConfig, apiKey: null, enable: false }, silentLogger);

    expect(await client.rank('rank these')).toEqual({ ok: false, provider: 'together', reason: 'disabled' });
    expect(await client.healthCheck()).toEqual({ status: 'disabled', message: 'Together AI disabled via configuration.' });
    expect(postMock).not.toHaveBeenCalled();
  });
});
