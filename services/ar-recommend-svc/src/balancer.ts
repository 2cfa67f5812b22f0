import type { AssessmentRecord, DomainLabel } from './types.js';

export interface SplitRatio {
  knowledge: number;
  personality: number;
}

export const DOMAIN_SPLIT_RATIOS: Readonly<Record<DomainLabel, SplitRatio>> = {
  technical: { knowledge: 0.7, personality: 0.3 },
  behavioral: { knowledge: 0.3, personality: 0.7 },
  mixed: { knowledge: 0.5, personality: 0.5 }
};

export interface BalanceSplit {
  kTarget: number;
  pTarget: number;
}

export function computeSplit(domain: DomainLabel, finalCount: number): BalanceSplit {
  const total = Math.max(0, Math.floor(finalCount));
  const kTarget = Math.floor(total * DOMAIN_SPLIT_RATIOS[domain].knowledge + 1e-9);
  return { kTarget, pTarget: total - kTarget };
}

function dedupeByUrl<T extends AssessmentRecord>(candidates: readonly T[]): T[] {
  const seen = new Set<string>();
  return candidates.filter((candidate) => {
    if (seen.has(candidate.url)) {
      return false;
    }
    seen.add(candidate.url);
    return true;
  });
}

/**
 * Blends knowledge (K) and personality (P) items by the domain's quota. A
 * shortfall on one side is backfilled from the other. Selected K items come
 * first, then selected P items, each in input order.
 */
export function balance<T extends AssessmentRecord>(candidates: readonly T[], domain: DomainLabel, finalCount: number): T[] {
  const { kTarget, pTarget } = computeSplit(domain, finalCount);
  const total = kTarget + pTarget;
  if (total === 0) {
    return [];
  }

  const unique = dedupeByUrl(candidates);
  const knowledge = unique.filter((candidate) => candidate.testType === 'K');
  const personality = unique.filter((candidate) => candidate.testType === 'P');

  let kTake = Math.min(kTarget, knowledge.length);
  let pTake = Math.min(pTarget, personality.length);
  let remaining = total - kTake - pTake;

  if (remaining > 0) {
    const extraK = Math.min(remaining, knowledge.length - kTake);
    kTake += extraK;
    remaining -= extraK;
  }

  if (remaining > 0) {
    pTake += Math.min(remaining, personality.length - pTake);
  }

  return [...knowledge.slice(0, kTake), ...personality.slice(0, pTake)].slice(0, total);
}
