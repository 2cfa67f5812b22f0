import { TimeoutError } from 'p-timeout';
import { isCircuitOpenError } from '@ar/common';

import type { RankingFailureReason, RankingOutcome } from './types.js';

export interface RankingHealthStatus {
  status: 'healthy' | 'degraded' | 'disabled' | 'unavailable';
  circuitOpen?: boolean;
  failureCount?: number;
  message?: string;
}

/**
 * External ranker. Implementations never throw from `rank`; every failure is
 * reported as a failed outcome.
 */
export interface RankingService {
  readonly name: string;
  rank(prompt: string): Promise<RankingOutcome>;
  healthCheck(): Promise<RankingHealthStatus>;
  close(): Promise<void>;
}

export function isTimeoutError(error: unknown): boolean {
  if (error instanceof TimeoutError) {
    return true;
  }

  if (error instanceof Error && (error.name === 'TimeoutError' || error.message.toLowerCase().includes('timed out'))) {
    return true;
  }

  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return ['ECONNABORTED', 'ETIMEDOUT'].includes(error.code);
  }

  return false;
}

export function classifyRankingFailure(error: unknown): RankingFailureReason {
  if (isCircuitOpenError(error)) {
    return 'circuit_open';
  }
  if (isTimeoutError(error)) {
    return 'timeout';
  }
  return 'error';
}

export function rankingFailure(provider: string, error: unknown): RankingOutcome {
  return {
    ok: false,
    provider,
    reason: classifyRankingFailure(error),
    message: error instanceof Error ? error.message : String(error)
  };
}
