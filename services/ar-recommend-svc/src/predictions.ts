import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import type { RecommendationService } from './recommend-service.js';

export const PREDICTIONS_HEADER = 'Query,Assessment_url';

const testQuerySchema = z.array(z.object({ query: z.string().trim().min(1) }));

export interface PredictionRow {
  query: string;
  url: string;
}

export async function loadTestQueries(path: string): Promise<string[]> {
  return testQuerySchema.parse(JSON.parse(await readFile(path, 'utf8'))).map((row) => row.query);
}

export function escapeCsvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatPredictionsCsv(rows: readonly PredictionRow[]): string {
  const lines = rows.map((row) => `${escapeCsvField(row.query)},${escapeCsvField(row.url)}`);
  return [PREDICTIONS_HEADER, ...lines].join('\n') + '\n';
}

export async function generatePredictions(
  queries: readonly string[],
  recommendations: RecommendationService,
  finalCount?: number
): Promise<PredictionRow[]> {
  const rows: PredictionRow[] = [];
  for (const query of queries) {
    const trace = await recommendations.run({ query, finalCount });
    for (const record of trace.recommendations) {
      rows.push({ query, url: record.url });
    }
  }
  return rows;
}
