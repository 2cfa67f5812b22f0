import type { Logger } from 'pino';

import type { RankerConfig } from './config.js';
import { GeminiRankingClient } from './gemini-client.js';
import type { RankingService } from './ranking-service.js';
import { TogetherRankingClient } from './together-client.js';

export function createRankingService(config: RankerConfig, logger: Logger): RankingService | null {
  if (config.provider === 'gemini' && config.gemini.enable) {
    return new GeminiRankingClient(config.gemini, logger.child({ module: 'gemini-client' }));
  }

  if (config.provider === 'together' && config.together.enable) {
    return new TogetherRankingClient(config.together, logger.child({ module: 'together-client' }));
  }

  logger.warn({ provider: config.provider }, 'No ranking credential configured. Using rule-based ordering.');
  return null;
}
