#!/usr/bin/env tsx
import 'dotenv/config';
import process from 'node:process';

import { getLogger } from '@ar/common';

import { CatalogStore } from '../catalog-store.js';
import { getRecommendServiceConfig } from '../config.js';
import { createEmbeddingProvider } from '../embedding-provider.js';
import { PgVectorIndex } from '../pgvector-index.js';
import { FlatInnerProductIndex, embedCatalog, writeEmbeddingsFile } from '../similarity-index.js';
import { parseArgs } from './cli-args.js';

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const config = getRecommendServiceConfig();
  const logger = getLogger({ module: 'build-index' });

  const catalogFile = args.catalog ?? config.catalog.catalogFile;
  const catalog = await CatalogStore.fromFile(catalogFile);
  const provider = createEmbeddingProvider({ config: config.embedding, logger });
  logger.info({ catalogFile, records: catalog.size, model: provider.model }, 'Embedding catalog.');

  const vectors = await embedCatalog(catalog.all(), provider);

  if (config.index.backend === 'pgvector') {
    const index = new PgVectorIndex({ ...config.index.pgvector, enableAutoMigrate: true }, logger);
    try {
      await index.upsertRecords(catalog.all(), vectors);
    } finally {
      await index.close();
    }
    return;
  }

  const index = new FlatInnerProductIndex(provider.dimensions);
  index.add(catalog.all(), vectors);
  const output = args.output ?? config.catalog.embeddingsFile;
  await writeEmbeddingsFile(output, index.toEmbeddingsFile(provider.model));
  logger.info({ output, vectors: index.size }, 'Embeddings file written.');
}

main().catch((error: unknown) => {
  getLogger({ module: 'build-index' }).error({ error }, 'Index build failed.');
  process.exitCode = 1;
});
