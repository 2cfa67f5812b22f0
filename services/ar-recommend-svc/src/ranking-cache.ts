import { createHash } from 'node:crypto';

import { Cluster, Redis, type ClusterNode, type RedisOptions } from 'ioredis';
import type { Logger } from 'pino';
import { z } from 'zod';

import type { RankingCacheConfig } from './config.js';
import type { AssessmentRecord } from './types.js';

const cachedOrderSchema = z.array(z.number().int().nonnegative());

export interface CacheHealthStatus {
  status: 'healthy' | 'degraded' | 'disabled' | 'unavailable';
  latencyMs?: number;
  message?: string;
}

/**
 * Stores successful ranker orderings keyed by query and candidate set.
 */
export class RankingCache {
  private client: Redis | Cluster | null = null;

  constructor(private readonly config: RankingCacheConfig, private readonly logger: Logger) {
    if (this.config.disable) {
      this.logger.info('Ranking cache disabled via configuration.');
    }
  }

  get enabled(): boolean {
    return !this.config.disable;
  }

  private getClient(): Redis | Cluster | null {
    if (this.config.disable) {
      return null;
    }

    if (this.client) {
      return this.client;
    }

    const hosts = this.config.host
      .split(',')
      .map((value) => value.trim())
      .filter(Boolean);
    const tls = this.config.tls ? {} : undefined;

    if (hosts.length > 1) {
      const nodes: ClusterNode[] = hosts.map((host) => ({ host, port: this.config.port }));
      this.client = new Cluster(nodes, { redisOptions: { password: this.config.password, tls } });
    } else {
      const options: RedisOptions = {
        host: hosts[0] ?? this.config.host,
        port: this.config.port,
        password: this.config.password,
        tls,
        lazyConnect: false,
        maxRetriesPerRequest: 1
      };
      this.client = new Redis(options);
    }

    this.client.on('error', (error: unknown) => {
      this.logger.warn({ error }, 'Ranking cache connection error.');
    });

    return this.client;
  }

  buildKey(query: string, candidates: readonly AssessmentRecord[]): string {
    const digest = createHash('sha256')
      .update(query.trim().toLowerCase())
      .update('\n')
      .update(candidates.map((candidate) => candidate.url).join('\n'))
      .digest('hex');
    return `${this.config.keyPrefix}:${digest}`;
  }

  async get(key: string): Promise<number[] | null> {
    const client = this.getClient();
    if (!client) {
      return null;
    }

    try {
      const raw = await client.get(key);
      if (!raw) {
        return null;
      }
      const parsed = cachedOrderSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        this.logger.warn({ key }, 'Discarding malformed ranking cache entry.');
        return null;
      }
      return parsed.data;
    } catch (error) {
      this.logger.warn({ error, key }, 'Failed to read ranking cache entry.');
      return null;
    }
  }

  async set(key: string, order: readonly number[]): Promise<void> {
    const client = this.getClient();
    if (!client) {
      return;
    }

    try {
      const payload = JSON.stringify(order);
      if (this.config.ttlSeconds > 0) {
        await client.setex(key, this.config.ttlSeconds, payload);
      } else {
        await client.set(key, payload);
      }
    } catch (error) {
      this.logger.warn({ error, key }, 'Failed to write ranking cache entry.');
    }
  }

  async healthCheck(): Promise<CacheHealthStatus> {
    const client = this.getClient();
    if (!client) {
      return { status: 'disabled', message: 'Caching disabled via configuration.' };
    }

    const start = Date.now();
    try {
      const response = await client.ping();
      const latencyMs = Date.now() - start;
      return response.toUpperCase() === 'PONG'
        ? { status: 'healthy', latencyMs }
        : { status: 'degraded', latencyMs, message: 'Unexpected Redis ping response.' };
    } catch (error) {
      this.logger.warn({ error }, 'Redis health check failed.');
      return { status: 'degraded', message: 'Redis ping failed.' };
    }
  }

  async close(): Promise<void> {
    if (!this.client) {
      return;
    }

    try {
      await this.client.quit();
    } catch (error) {
      this.logger.warn({ error }, 'Failed to close Redis connection cleanly.');
    } finally {
      this.client = null;
    }
  }
}
