#!/usr/bin/env tsx
import 'dotenv/config';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import process from 'node:process';

import { getLogger } from '@ar/common';

import { loadRecommenderComponents } from '../components.js';
import { getRecommendServiceConfig } from '../config.js';
import { evaluateRecommender, loadLabeledQueries } from '../evaluation.js';
import { parseArgs } from './cli-args.js';

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const config = getRecommendServiceConfig();
  const logger = getLogger({ module: 'evaluate' });

  const labeledFile = args.labeled ?? join(config.catalog.dataDir, 'labeled-queries.json');
  const labeled = await loadLabeledQueries(labeledFile);
  const components = await loadRecommenderComponents(config, logger);

  try {
    const report = await evaluateRecommender({
      labeled,
      retriever: components.retriever,
      recommendations: components.recommendations,
      catalog: components.catalog,
      topK: args.topK ? Number(args.topK) : undefined,
      finalCount: args.finalCount ? Number(args.finalCount) : undefined
    });

    logger.info(
      {
        queries: report.pipeline.queries,
        baselineRecall: report.baseline.meanRecall,
        pipelineRecall: report.pipeline.meanRecall,
        improvement: report.improvement,
        improvementPct: report.improvementPct
      },
      `Mean Recall@${report.k}`
    );

    if (report.uncatalogedUrls.length > 0) {
      logger.warn({ urls: report.uncatalogedUrls }, 'Labeled URLs missing from the catalog.');
    }

    if (args.output) {
      await writeFile(args.output, JSON.stringify(report, null, 2), 'utf8');
      logger.info({ output: args.output }, 'Evaluation report written.');
    }
  } finally {
    await components.index.close();
    await components.cache?.close();
  }
}

main().catch((error: unknown) => {
  getLogger({ module: 'evaluate' }).error({ error }, 'Evaluation failed.');
  process.exitCode = 1;
});
