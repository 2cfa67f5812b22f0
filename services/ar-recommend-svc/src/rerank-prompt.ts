import type { CandidateRecord } from './types.js';

const ORDER_PATTERN = /\[[\d,\s]+\]/;

export function buildRankingPrompt(query: string, candidates: readonly CandidateRecord[], finalCount: number): string {
  const candidatesText = candidates
    .map(
      (candidate, idx) =>
        `${idx + 1}. ${candidate.name} (${candidate.testType})\n` +
        `   Category: ${candidate.category}\n` +
        `   Description: ${candidate.description}\n`
    )
    .join('\n');

  return `You are an expert HR assessment advisor. Given a hiring query and a list of candidate assessments,
rank the assessments by relevance to the query.

Query: ${query}

Candidate Assessments:
${candidatesText}
Instructions:
1. Analyze the query to understand required skills and competencies
2. Rank assessments by relevance (most relevant first)
3. Consider both technical (K-type) and behavioral (P-type) assessments
4. Return the top ${finalCount} most relevant assessment numbers

Return ONLY a JSON array of assessment numbers in order of relevance.
Example format: [3, 1, 7, 2, 5, 9, 4, 6, 8, 10]
`;
}

/**
 * Extracts the first bracketed integer list from a ranker reply and returns
 * the zero-based positions it names. Out-of-range numbers are dropped.
 * Returns null when the reply holds no parsable list.
 */
export function parseRankingOrder(text: string, candidateCount: number): number[] | null {
  const match = ORDER_PATTERN.exec(text);
  if (!match) {
    return null;
  }

  const entries = match[0]
    .slice(1, -1)
    .split(',')
    .map((entry) => entry.trim());

  if (entries.length === 1 && entries[0] === '') {
    return [];
  }

  if (entries.some((entry) => !/^\d+$/.test(entry))) {
    return null;
  }

  return entries
    .map((entry) => Number(entry))
    .filter((position) => position >= 1 && position <= candidateCount)
    .map((position) => position - 1);
}

export function applyRankingOrder<T>(candidates: readonly T[], order: readonly number[]): T[] {
  return order.flatMap((position) => (position >= 0 && position < candidates.length ? [candidates[position]] : []));
}
