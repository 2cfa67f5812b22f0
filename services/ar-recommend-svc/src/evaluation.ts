import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import type { CatalogStore } from './catalog-store.js';
import type { RecommendationService } from './recommend-service.js';
import type { Retriever } from './retriever.js';

export const DEFAULT_RECALL_K = 10;

const labeledQuerySchema = z.object({
  query: z.string().trim().min(1),
  relevant_urls: z.union([z.string(), z.array(z.string())])
});

export interface LabeledQuery {
  query: string;
  relevantUrls: string[];
}

export interface QueryEvaluation {
  query: string;
  recall: number;
  predicted: string[];
  relevant: string[];
}

export interface EvaluationSummary {
  meanRecall: number;
  queries: number;
  perQuery: QueryEvaluation[];
}

export interface EvaluationReport {
  k: number;
  baseline: EvaluationSummary;
  pipeline: EvaluationSummary;
  improvement: number;
  improvementPct: number | null;
  /** Labeled URLs no catalog record carries; no predictor can recall them. */
  uncatalogedUrls: string[];
}

export type Predictor = (query: string) => Promise<string[]>;

/**
 * Splits a `;`-separated URL list, dropping blanks and repeats.
 */
export function parseRelevantUrls(raw: string | readonly string[]): string[] {
  const values = typeof raw === 'string' ? raw.split(';') : raw;
  return Array.from(new Set(values.map((value) => value.trim()).filter((value) => value.length > 0)));
}

export function parseLabeledQueries(rows: unknown): LabeledQuery[] {
  return z
    .array(labeledQuerySchema)
    .parse(rows)
    .map((row) => ({ query: row.query, relevantUrls: parseRelevantUrls(row.relevant_urls) }));
}

export async function loadLabeledQueries(path: string): Promise<LabeledQuery[]> {
  return parseLabeledQueries(JSON.parse(await readFile(path, 'utf8')));
}

export function recallAtK(predicted: readonly string[], relevant: readonly string[], k = DEFAULT_RECALL_K): number {
  const expected = new Set(relevant);
  if (expected.size === 0) {
    return 0;
  }

  const top = new Set(predicted.slice(0, k));
  let hits = 0;
  for (const url of expected) {
    if (top.has(url)) {
      hits += 1;
    }
  }
  return hits / expected.size;
}

export async function evaluatePredictor(
  labeled: readonly LabeledQuery[],
  predictor: Predictor,
  k = DEFAULT_RECALL_K
): Promise<EvaluationSummary> {
  const perQuery: QueryEvaluation[] = [];

  for (const item of labeled) {
    if (item.relevantUrls.length === 0) {
      continue;
    }
    const predicted = await predictor(item.query);
    perQuery.push({
      query: item.query,
      recall: recallAtK(predicted, item.relevantUrls, k),
      predicted,
      relevant: item.relevantUrls
    });
  }

  const meanRecall = perQuery.length > 0 ? perQuery.reduce((sum, entry) => sum + entry.recall, 0) / perQuery.length : 0;
  return { meanRecall, queries: perQuery.length, perQuery };
}

export interface EvaluateRecommenderOptions {
  labeled: readonly LabeledQuery[];
  retriever: Retriever;
  recommendations: RecommendationService;
  k?: number;
  topK?: number;
  finalCount?: number;
  catalog?: CatalogStore;
}

export function findUncatalogedUrls(labeled: readonly LabeledQuery[], catalog: CatalogStore): string[] {
  const missing = new Set<string>();
  for (const item of labeled) {
    for (const url of item.relevantUrls) {
      if (!catalog.getByUrl(url)) {
        missing.add(url);
      }
    }
  }
  return Array.from(missing).sort();
}

/**
 * Compares plain similarity retrieval against the full pipeline by mean
 * Recall@k.
 */
export async function evaluateRecommender(options: EvaluateRecommenderOptions): Promise<EvaluationReport> {
  const k = options.k ?? DEFAULT_RECALL_K;

  const baseline = await evaluatePredictor(
    options.labeled,
    async (query) => (await options.retriever.retrieve(query, k)).map((candidate) => candidate.url),
    k
  );

  const pipeline = await evaluatePredictor(
    options.labeled,
    async (query) => {
      const trace = await options.recommendations.run({ query, topK: options.topK, finalCount: options.finalCount });
      return trace.recommendations.map((record) => record.url);
    },
    k
  );

  const improvement = pipeline.meanRecall - baseline.meanRecall;
  return {
    k,
    baseline,
    pipeline,
    improvement,
    improvementPct: baseline.meanRecall > 0 ? (improvement / baseline.meanRecall) * 100 : null,
    uncatalogedUrls: options.catalog ? findUncatalogedUrls(options.labeled, options.catalog) : []
  };
}
