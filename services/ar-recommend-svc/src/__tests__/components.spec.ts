import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { resetConfigForTesting } from '@ar/common';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { CatalogStore } from '../catalog-store.js';
import { loadRecommenderComponents } from '../components.js';
import { getRecommendServiceConfig, resetRecommendServiceConfig } from '../config.js';
import { LocalDeterministicProvider } from '../embedding-provider.js';
import { buildFlatIndex, writeEmbeddingsFile } from '../similarity-index.js';
import { silentLogger } from './fixtures.js';

describe('loadRecommenderComponents', () => {
  let dir: string;
  let embeddingsFile: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ar-components-'));
    embeddingsFile = join(dir, 'embeddings.json');
    vi.stubEnv('DATA_DIR', '');
    vi.stubEnv('EMBEDDINGS_FILE', embeddingsFile);
    vi.stubEnv('EMBEDDING_PROVIDER', 'local');
    vi.stubEnv('EMBEDDING_DIMENSIONS', '64');
    vi.stubEnv('INDEX_BACKEND', 'flat');
    vi.stubEnv('RANKER_PROVIDER', 'none');
    vi.stubEnv('RANKING_CACHE_ENABLE', 'false');
    resetConfigForTesting();
    resetRecommendServiceConfig();
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    resetConfigForTesting();
    resetRecommendServiceConfig();
    await rm(dir, { recursive: true, force: true });
  });

  it('embeds the catalog when no embeddings file exists', async () => {
    const components = await loadRecommenderComponents(getRecommendServiceConfig(), silentLogger);

    expect(components.catalog.size).toBe(18);
    expect(components.index.backend).toBe('flat');
    expect(await components.index.healthCheck()).toEqual({ status: 'healthy', size: 18 });
    expect(components.ranking).toBeNull();
    expect(components.cache).toBeNull();
    expect(components.reranker.rankingEnabled).toBe(false);
  });

  it('serves recommendations drawn from the catalog', async () => {
    const components = await loadRecommenderComponents(getRecommendServiceConfig(), silentLogger);

    const trace = await components.recommendations.run({ query: 'Java developer with SQL skills' });

    expect(trace.domain).toBe('technical');
    expect(trace.strategy).toBe('disabled');
    expect(trace.recommendations.length).toBeLessThanOrEqual(10);
    const catalogUrls = new Set(components.catalog.all().map((record) => record.url));
    expect(trace.recommendations.every((record) => catalogUrls.has(record.url))).toBe(true);
  });

  it('loads a stored embeddings file', async () => {
    const config = getRecommendServiceConfig();
    const catalog = await CatalogStore.fromFile(config.catalog.catalogFile);
    const stored = await buildFlatIndex(catalog.all(), new LocalDeterministicProvider(64));
    await writeEmbeddingsFile(embeddingsFile, stored.toEmbeddingsFile('local-hashed-bow'));

    const components = await loadRecommenderComponents(config, silentLogger);

    expect(await components.index.healthCheck()).toEqual({ status: 'healthy', size: 18 });
  });

  it('rejects an embeddings file built for other dimensions', async () => {
    await writeEmbeddingsFile(embeddingsFile, { model: 'other', dimensions: 32, vectors: [] });

    await expect(loadRecommenderComponents(getRecommendServiceConfig(), silentLogger)).rejects.toThrow(
      'Embeddings file has 32 dimensions but the local provider produces 64.'
    );
  });
});
