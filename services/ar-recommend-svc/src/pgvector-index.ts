import pg, { type Pool, type PoolClient } from 'pg';
import { registerType, toSql } from 'pgvector/pg';
import type { Logger } from 'pino';

import type { PgVectorConfig } from './config.js';
import type { IndexHealth, SimilarityHit, SimilarityIndex } from './similarity-index.js';
import type { AssessmentRecord, EmbeddingVector } from './types.js';

const VECTOR_TYPE_NAME = 'vector';

interface AssessmentRow {
  url: string;
  name: string;
  category: string;
  test_type: string;
  description: string;
  score: number | string;
}

function toHit(row: AssessmentRow): SimilarityHit {
  return {
    record: {
      name: row.name,
      url: row.url,
      category: row.category,
      testType: row.test_type === 'P' ? 'P' : 'K',
      description: row.description
    },
    score: Number(row.score)
  };
}

/**
 * pgvector-backed index. Scores are `1 - cosine distance`; ties fall back to
 * catalog position.
 */
export class PgVectorIndex implements SimilarityIndex {
  readonly backend = 'pgvector' as const;
  readonly dimensions: number;
  private readonly pool: Pool;
  private initialized = false;

  constructor(private readonly config: PgVectorConfig, private readonly logger: Logger) {
    this.dimensions = config.dimensions;
    this.pool = new pg.Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl,
      max: config.poolMax,
      idleTimeoutMillis: config.idleTimeoutMs,
      connectionTimeoutMillis: config.connectionTimeoutMs,
      statement_timeout: config.statementTimeoutMs
    });

    this.pool.on('connect', (client) => {
      Promise.resolve(registerType(client)).catch((error: unknown) => {
        this.logger.error({ error }, 'Failed to register pgvector type on connection.');
      });
    });
  }

  private get tableName(): string {
    return `${this.config.schema}.${this.config.table}`;
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.withClient(async (client) => {
      if (this.config.enableAutoMigrate) {
        await this.ensureInfrastructure(client);
      } else {
        await this.verifyInfrastructure(client);
      }
    });

    this.initialized = true;
  }

  async search(vector: EmbeddingVector, k: number): Promise<SimilarityHit[]> {
    if (k <= 0) {
      return [];
    }

    await this.initialize();

    return this.withClient(async (client) => {
      const result = await client.query<AssessmentRow>(
        `SELECT url, name, category, test_type, description, 1 - (embedding <=> $1) AS score
         FROM ${this.tableName}
         ORDER BY embedding <=> $1 ASC, position ASC
         LIMIT $2`,
        [toSql(vector), k]
      );

      return result.rows.map(toHit);
    });
  }

  async upsertRecords(records: readonly AssessmentRecord[], vectors: readonly EmbeddingVector[]): Promise<number> {
    if (records.length !== vectors.length) {
      throw new Error(`Expected ${records.length} vectors for ${records.length} records, received ${vectors.length}.`);
    }

    await this.initialize();

    return this.withClient(async (client) => {
      await client.query('BEGIN');
      try {
        for (const [position, record] of records.entries()) {
          await client.query(
            `INSERT INTO ${this.tableName} (url, name, category, test_type, description, position, embedding)
             VALUES ($1, $2, $3, $4, $5, $6, $7)
             ON CONFLICT (url) DO UPDATE SET
               name = EXCLUDED.name,
               category = EXCLUDED.category,
               test_type = EXCLUDED.test_type,
               description = EXCLUDED.description,
               position = EXCLUDED.position,
               embedding = EXCLUDED.embedding,
               updated_at = now()`,
            [record.url, record.name, record.category, record.testType, record.description, position, toSql(vectors[position])]
          );
        }
        await client.query('COMMIT');
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      }

      this.logger.info({ count: records.length, table: this.tableName }, 'Upserted assessment embeddings.');
      return records.length;
    });
  }

  async healthCheck(): Promise<IndexHealth> {
    try {
      await this.initialize();
      const size = await this.withClient(async (client) => {
        const result = await client.query<{ total: string }>(`SELECT COUNT(*) AS total FROM ${this.tableName}`);
        return Number(result.rows[0]?.total ?? 0);
      });

      return size > 0
        ? { status: 'healthy', size }
        : { status: 'unhealthy', size, message: 'Index table is empty.' };
    } catch (error) {
      this.logger.error({ error }, 'pgvector health check failed.');
      return { status: 'unhealthy', size: 0, message: 'Index database unreachable.' };
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
    this.initialized = false;
  }

  private async ensureInfrastructure(client: PoolClient): Promise<void> {
    await client.query(`CREATE EXTENSION IF NOT EXISTS ${VECTOR_TYPE_NAME}`);
    await client.query(`CREATE SCHEMA IF NOT EXISTS ${this.config.schema}`);
    await client.query(`
      CREATE TABLE IF NOT EXISTS ${this.tableName} (
        url TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        category TEXT NOT NULL DEFAULT 'General',
        test_type CHAR(1) NOT NULL CHECK (test_type IN ('K', 'P')),
        description TEXT NOT NULL DEFAULT '',
        position INTEGER NOT NULL,
        embedding ${VECTOR_TYPE_NAME}(${this.config.dimensions}) NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `);
  }

  private async verifyInfrastructure(client: PoolClient): Promise<void> {
    const tableCheck = await client.query(
      `SELECT table_name FROM information_schema.tables WHERE table_schema = $1 AND table_name = $2`,
      [this.config.schema, this.config.table]
    );

    if (tableCheck.rowCount === 0) {
      throw new Error(`Embeddings table ${this.tableName} is missing.`);
    }
  }

  private async withClient<T>(handler: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      return await handler(client);
    } finally {
      client.release();
    }
  }
}
