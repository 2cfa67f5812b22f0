#!/usr/bin/env tsx
import 'dotenv/config';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import process from 'node:process';

import { getLogger } from '@ar/common';

import { loadRecommenderComponents } from '../components.js';
import { getRecommendServiceConfig } from '../config.js';
import { formatPredictionsCsv, generatePredictions, loadTestQueries } from '../predictions.js';
import { parseArgs } from './cli-args.js';

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const config = getRecommendServiceConfig();
  const logger = getLogger({ module: 'export-predictions' });

  const queriesFile = args.queries ?? join(config.catalog.dataDir, 'test-queries.json');
  const output = args.output ?? 'predictions.csv';
  const queries = await loadTestQueries(queriesFile);
  const components = await loadRecommenderComponents(config, logger);

  try {
    const rows = await generatePredictions(
      queries,
      components.recommendations,
      args.finalCount ? Number(args.finalCount) : undefined
    );
    await writeFile(output, formatPredictionsCsv(rows), 'utf8');
    logger.info({ output, queries: queries.length, rows: rows.length }, 'Predictions written.');
  } finally {
    await components.index.close();
    await components.cache?.close();
  }
}

main().catch((error: unknown) => {
  getLogger({ module: 'export-predictions' }).error({ error }, 'Prediction export failed.');
  process.exitCode = 1;
});
