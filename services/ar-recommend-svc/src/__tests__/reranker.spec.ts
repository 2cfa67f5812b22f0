import { beforeEach, describe, expect, it, vi } from 'vitest';

import { balance } from '../balancer.js';
import type { RankingCacheConfig } from '../config.js';
import { DomainClassifier } from '../domain-classifier.js';
import { RankingCache } from '../ranking-cache.js';
import { RerankerOrchestrator } from '../reranker.js';
import {
  StubRankingService,
  candidate,
  rankedReply,
  silentLogger,
  testVocabulary,
  urls
} from './fixtures.js';

const store = vi.hoisted(() => new Map<string, string>());

vi.mock('ioredis', () => {
  class FakeRedis {
    on(): this {
      return this;
    }
    async get(key: string): Promise<string | null> {
      return store.get(key) ?? null;
    }
    async setex(key: string, _ttl: number, value: string): Promise<'OK'> {
      store.set(key, value);
      return 'OK';
    }
    async set(key: string, value: string): Promise<'OK'> {
      store.set(key, value);
      return 'OK';
    }
    async quit(): Promise<'OK'> {
      return 'OK';
    }
  }
  return { Redis: FakeRedis, Cluster: FakeRedis };
});

const cacheConfig: RankingCacheConfig = {
  host: 'localhost',
  port: 6379,
  tls: false,
  keyPrefix: 'test:ranking',
  ttlSeconds: 60,
  disable: false
};

const TECHNICAL_QUERY = 'java sql developer';

const interleaved = [
  candidate('k1', 'K'),
  candidate('p1', 'P'),
  candidate('k2', 'K'),
  candidate('p2', 'P'),
  candidate('k3', 'K'),
  candidate('p3', 'P'),
  candidate('k4', 'K'),
  candidate('p4', 'P')
];

describe('RerankerOrchestrator', () => {
  const classifier = new DomainClassifier(testVocabulary);

  beforeEach(() => {
    store.clear();
  });

  it('balances retrieval order when no ranker is configured', async () => {
    const reranker = new RerankerOrchestrator({ classifier, ranking: null, logger: silentLogger });

    const result = await reranker.rerank(TECHNICAL_QUERY, interleaved, 10);

    expect(result.strategy).toBe('disabled');
    expect(result.domain).toBe('technical');
    expect(result.recommendations).toEqual(balance(interleaved, classifier.classify(TECHNICAL_QUERY), 10));
    expect(urls(result.recommendations)).toEqual(['k1', 'k2', 'k3', 'k4', 'p1', 'p2', 'p3', 'p4']);
    expect(reranker.rankingEnabled).toBe(false);
  });

  it('balances the ranker ordering', async () => {
    const ranking = new StubRankingService(rankedReply('[8, 7, 6, 5, 4, 3, 2, 1]'));
    const reranker = new RerankerOrchestrator({ classifier, ranking, logger: silentLogger });

    const result = await reranker.rerank(TECHNICAL_QUERY, interleaved, 5);

    expect(result.strategy).toBe('llm');
    expect(urls(result.recommendations)).toEqual(['k4', 'k3', 'k2', 'p4', 'p3']);
    expect(ranking.prompts).toHaveLength(1);
    expect(ranking.prompts[0]).toContain('Query: java sql developer\n');
  });

  it('keeps only the items the ranker named', async () => {
    const ranking = new StubRankingService(rankedReply('[2, 1]'));
    const reranker = new RerankerOrchestrator({ classifier, ranking, logger: silentLogger });

    expect(urls(await reranker.recommend(TECHNICAL_QUERY, interleaved, 10))).toEqual(['k1', 'p1']);
  });

  it.each([
    ['a failed call', { ok: false, provider: 'stub', reason: 'timeout' } as const],
    ['a reply without a list', rankedReply('The Java test fits best.')],
    ['a list with only unknown positions', rankedReply('[99, 42]')],
    ['an empty list', rankedReply('[ ]')]
  ])('falls back to retrieval order after %s', async (_label, outcome) => {
    const reranker = new RerankerOrchestrator({ classifier, ranking: new StubRankingService(outcome), logger: silentLogger });

    const result = await reranker.rerank(TECHNICAL_QUERY, interleaved, 10);

    expect(result.strategy).toBe('fallback');
    expect(result.recommendations).toEqual(balance(interleaved, 'technical', 10));
  });

  it('skips the ranker for an empty candidate list', async () => {
    const ranking = new StubRankingService(rankedReply('[1]'));
    const reranker = new RerankerOrchestrator({ classifier, ranking, logger: silentLogger });

    const result = await reranker.rerank(TECHNICAL_QUERY, [], 10);

    expect(result).toEqual({ recommendations: [], domain: 'technical', strategy: 'fallback' });
    expect(ranking.prompts).toEqual([]);
  });

  it('reuses a cached ordering for the same query and candidates', async () => {
    const ranking = new StubRankingService(rankedReply('[8, 7, 6, 5, 4, 3, 2, 1]'));
    const cache = new RankingCache(cacheConfig, silentLogger);
    const reranker = new RerankerOrchestrator({ classifier, ranking, cache, logger: silentLogger });

    const first = await reranker.rerank(TECHNICAL_QUERY, interleaved, 5);
    const second = await reranker.rerank('  JAVA SQL Developer ', interleaved, 5);

    expect(first.strategy).toBe('llm');
    expect(second.strategy).toBe('cache');
    expect(second.recommendations).toEqual(first.recommendations);
    expect(ranking.prompts).toHaveLength(1);
    expect(store.get(cache.buildKey(TECHNICAL_QUERY, interleaved))).toBe('[7,6,5,4,3,2,1,0]');
  });

  it('does not cache fallback orderings', async () => {
    const cache = new RankingCache(cacheConfig, silentLogger);
    const reranker = new RerankerOrchestrator({
      classifier,
      ranking: new StubRankingService({ ok: false, provider: 'stub', reason: 'error', message: 'boom' }),
      cache,
      logger: silentLogger
    });

    await reranker.rerank(TECHNICAL_QUERY, interleaved, 10);

    expect(store.size).toBe(0);
  });
});
