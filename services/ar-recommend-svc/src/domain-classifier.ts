import { readFileSync } from 'node:fs';

import { z } from 'zod';

import type { DomainLabel } from './types.js';

export const DOMAIN_MARGIN = 2;

const vocabularyFileSchema = z.object({
  technical: z.record(z.array(z.string())),
  behavioral: z.record(z.array(z.string()))
});

export interface DomainVocabulary {
  technical: readonly string[];
  behavioral: readonly string[];
}

export interface DomainScores {
  technical: number;
  behavioral: number;
}

function flattenTerms(groups: Record<string, string[]>): string[] {
  const terms = new Set<string>();
  for (const group of Object.values(groups)) {
    for (const term of group) {
      const normalized = term.trim().toLowerCase();
      if (normalized.length > 0) {
        terms.add(normalized);
      }
    }
  }
  return Array.from(terms);
}

export function loadDomainVocabulary(path: string | URL = new URL('../data/domain-vocabulary.json', import.meta.url)): DomainVocabulary {
  const parsed = vocabularyFileSchema.parse(JSON.parse(readFileSync(path, 'utf8')));
  return {
    technical: flattenTerms(parsed.technical),
    behavioral: flattenTerms(parsed.behavioral)
  };
}

function countMatches(text: string, terms: readonly string[]): number {
  return terms.reduce((count, term) => (text.includes(term) ? count + 1 : count), 0);
}

/**
 * Labels a query by lexical overlap with technical and behavioral
 * vocabularies. A side wins only with a lead of at least `DOMAIN_MARGIN` terms.
 */
export class DomainClassifier {
  constructor(private readonly vocabulary: DomainVocabulary = loadDomainVocabulary()) {}

  score(query: string): DomainScores {
    const text = query.toLowerCase();
    return {
      technical: countMatches(text, this.vocabulary.technical),
      behavioral: countMatches(text, this.vocabulary.behavioral)
    };
  }

  classify(query: string): DomainLabel {
    const { technical, behavioral } = this.score(query);

    if (technical >= behavioral + DOMAIN_MARGIN) {
      return 'technical';
    }
    if (behavioral >= technical + DOMAIN_MARGIN) {
      return 'behavioral';
    }
    return 'mixed';
  }
}
