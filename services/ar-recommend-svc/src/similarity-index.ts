import { existsSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { z } from 'zod';

import type { IndexBackend } from './config.js';
import { buildEmbeddingText } from './catalog-store.js';
import { l2Normalize, type EmbeddingProvider } from './embedding-provider.js';
import type { AssessmentRecord, EmbeddingVector } from './types.js';

export interface SimilarityHit {
  record: AssessmentRecord;
  score: number;
}

export interface IndexHealth {
  status: 'healthy' | 'unhealthy';
  size: number;
  message?: string;
}

/**
 * Nearest-neighbour search over catalog embeddings. Hits come back ordered by
 * descending score with ties in catalog order.
 */
export interface SimilarityIndex {
  readonly backend: IndexBackend;
  readonly dimensions: number;
  search(vector: EmbeddingVector, k: number): Promise<SimilarityHit[]>;
  healthCheck(): Promise<IndexHealth>;
  close(): Promise<void>;
}

export const embeddingsFileSchema = z.object({
  model: z.string(),
  dimensions: z.number().int().positive(),
  vectors: z.array(z.array(z.number()))
});

export type EmbeddingsFile = z.infer<typeof embeddingsFileSchema>;

export function dotProduct(a: EmbeddingVector, b: EmbeddingVector): number {
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    sum += a[i] * (b[i] ?? 0);
  }
  return sum;
}

interface IndexEntry {
  record: AssessmentRecord;
  vector: EmbeddingVector;
  position: number;
}

/**
 * Exhaustive inner-product index over L2-normalized vectors, so scores are
 * cosine similarities.
 */
export class FlatInnerProductIndex implements SimilarityIndex {
  readonly backend = 'flat' as const;
  private readonly entries: IndexEntry[] = [];

  constructor(readonly dimensions: number) {}

  get size(): number {
    return this.entries.length;
  }

  add(records: readonly AssessmentRecord[], vectors: readonly EmbeddingVector[]): void {
    if (records.length !== vectors.length) {
      throw new Error(`Expected ${records.length} vectors for ${records.length} records, received ${vectors.length}.`);
    }

    records.forEach((record, offset) => {
      const vector = vectors[offset];
      if (vector.length !== this.dimensions) {
        throw new Error(`Vector for ${record.url} has ${vector.length} dimensions, expected ${this.dimensions}.`);
      }
      this.entries.push({ record, vector: l2Normalize(vector), position: this.entries.length });
    });
  }

  async search(vector: EmbeddingVector, k: number): Promise<SimilarityHit[]> {
    if (k <= 0 || this.entries.length === 0) {
      return [];
    }

    if (vector.length !== this.dimensions) {
      throw new Error(`Query vector has ${vector.length} dimensions, expected ${this.dimensions}.`);
    }

    const query = l2Normalize(vector);
    return this.entries
      .map((entry) => ({ entry, score: dotProduct(query, entry.vector) }))
      .sort((a, b) => b.score - a.score || a.entry.position - b.entry.position)
      .slice(0, k)
      .map(({ entry, score }) => ({ record: entry.record, score }));
  }

  async healthCheck(): Promise<IndexHealth> {
    if (this.entries.length === 0) {
      return { status: 'unhealthy', size: 0, message: 'Index is empty.' };
    }
    return { status: 'healthy', size: this.entries.length };
  }

  async close(): Promise<void> {
    this.entries.length = 0;
  }

  toEmbeddingsFile(model: string): EmbeddingsFile {
    return {
      model,
      dimensions: this.dimensions,
      vectors: this.entries.map((entry) => entry.vector)
    };
  }

  static fromEmbeddingsFile(records: readonly AssessmentRecord[], file: EmbeddingsFile): FlatInnerProductIndex {
    const index = new FlatInnerProductIndex(file.dimensions);
    index.add(records, file.vectors);
    return index;
  }
}

export async function embedCatalog(
  records: readonly AssessmentRecord[],
  provider: EmbeddingProvider
): Promise<EmbeddingVector[]> {
  const vectors: EmbeddingVector[] = [];
  for (const record of records) {
    vectors.push(await provider.generateEmbedding(buildEmbeddingText(record)));
  }
  return vectors;
}

export async function buildFlatIndex(
  records: readonly AssessmentRecord[],
  provider: EmbeddingProvider
): Promise<FlatInnerProductIndex> {
  const index = new FlatInnerProductIndex(provider.dimensions);
  index.add(records, await embedCatalog(records, provider));
  return index;
}

export async function readEmbeddingsFile(path: string): Promise<EmbeddingsFile | null> {
  if (!existsSync(path)) {
    return null;
  }

  const raw = await readFile(path, 'utf8');
  return embeddingsFileSchema.parse(JSON.parse(raw));
}

export async function writeEmbeddingsFile(path: string, file: EmbeddingsFile): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(file), 'utf8');
}
