import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import type { AssessmentRecord, TestType } from './types.js';

export const DEFAULT_CATEGORY = 'General';

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value?.trim() ?? '');

export const catalogRowSchema = z.object({
  assessment_name: z.string().trim().min(1),
  assessment_url: z.string().trim().url(),
  test_type: optionalText,
  category: optionalText,
  description: optionalText
});

export type CatalogRow = z.input<typeof catalogRowSchema>;

const catalogFileSchema = z.array(catalogRowSchema);

function normalizeTestType(value: string): TestType {
  return value === 'P' ? 'P' : 'K';
}

/**
 * Validates raw catalog rows and turns them into records. Rows repeating an
 * already seen URL are dropped; the first occurrence wins.
 */
export function normalizeCatalogRows(rows: unknown): AssessmentRecord[] {
  const parsed = catalogFileSchema.parse(rows);
  const seen = new Set<string>();
  const records: AssessmentRecord[] = [];

  for (const row of parsed) {
    if (seen.has(row.assessment_url)) {
      continue;
    }
    seen.add(row.assessment_url);

    records.push({
      name: row.assessment_name,
      url: row.assessment_url,
      category: row.category || DEFAULT_CATEGORY,
      testType: normalizeTestType(row.test_type),
      description: row.description
    });
  }

  return records;
}

export function buildEmbeddingText(record: AssessmentRecord): string {
  return `${record.name} ${record.category} ${record.description}`.trim();
}

export class CatalogStore {
  private readonly records: readonly AssessmentRecord[];
  private readonly byUrl: ReadonlyMap<string, AssessmentRecord>;

  constructor(records: readonly AssessmentRecord[]) {
    this.records = Object.freeze(records.map((record) => Object.freeze({ ...record })));
    this.byUrl = new Map(this.records.map((record) => [record.url, record]));
  }

  static fromRows(rows: unknown): CatalogStore {
    return new CatalogStore(normalizeCatalogRows(rows));
  }

  static async fromFile(path: string): Promise<CatalogStore> {
    const raw = await readFile(path, 'utf8');
    const rows: unknown = JSON.parse(raw);
    return CatalogStore.fromRows(rows);
  }

  get size(): number {
    return this.records.length;
  }

  all(): readonly AssessmentRecord[] {
    return this.records;
  }

  getByUrl(url: string): AssessmentRecord | undefined {
    return this.byUrl.get(url);
  }
}
