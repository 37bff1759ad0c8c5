/*
 * Copyright (C) 2025-2026 flickleafy
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU General Public License for more details.
 *
 * You should have received a copy of the GNU General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

/**
 * PostgreSQL vector store implementation with pgvector
 * Provides persistent vector storage and similarity search capabilities
 *
 * @packageDocumentation
 */

import { Pool } from 'pg';
import type { Logger } from 'winston';
import { IVectorStore } from '../interfaces';
import { EmbeddingVector, NodeMetadata, PostgresConfig, SearchResult } from '../models';

type NodeRow = {
  node_id: string;
  ref_doc_id: string;
  text: string;
  metadata: unknown;
  similarity: string | number;
};

const UPSERT_NODE = `
  INSERT INTO doc_nodes (node_id, ref_doc_id, text, metadata, embedding)
  VALUES ($1, $2, $3, $4, $5)
  ON CONFLICT (node_id)
  DO UPDATE SET
    ref_doc_id = EXCLUDED.ref_doc_id,
    text = EXCLUDED.text,
    metadata = EXCLUDED.metadata,
    embedding = EXCLUDED.embedding,
    updated_at = CURRENT_TIMESTAMP
`;

function toMetadata(value: unknown): NodeMetadata {
  const metadata: NodeMetadata = {};
  if (typeof value !== 'object' || value === null) {
    return metadata;
  }
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string' || typeof entry === 'number' || typeof entry === 'boolean' || entry === null) {
      metadata[key] = entry;
    }
  }
  return metadata;
}

/**
 * PostgreSQL vector store using pgvector extension
 * Follows Single Responsibility Principle
 *
 * Features:
 * - Persistent node storage with PostgreSQL
 * - Cosine distance ordering with the <=> operator
 * - Transaction support for batch operations
 * - Connection pooling
 */
export class PgVectorStore implements IVectorStore {
  private readonly logger: Logger;
  private readonly pool: Pool;
  private initialized: boolean = false;

  constructor(logger: Logger, config: PostgresConfig) {
    this.logger = logger;

    this.pool = new Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl ? { rejectUnauthorized: false } : false,
      max: config.maxConnections || 10,
      idleTimeoutMillis: config.idleTimeoutMillis || 30000,
      connectionTimeoutMillis: config.connectionTimeoutMillis || 5000,
    });

    // Handle pool errors
    this.pool.on('error', err => {
      this.logger.error('Unexpected PostgreSQL pool error', err);
    });
  }

  /**
   * Initialize the vector store (verify connection, extension and schema)
   * Should be called after construction
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      this.logger.debug('PgVectorStore already initialized');
      return;
    }

    try {
      this.logger.info('Initializing PgVectorStore...');

      await this.testConnection();
      await this.verifyPgVector();
      await this.verifySchema();

      this.initialized = true;
      this.logger.info('PgVectorStore initialized successfully');
    } catch (error) {
      this.logger.error('Failed to initialize PgVectorStore', error);
      throw new Error(`PgVectorStore initialization failed: ${error instanceof Error ? error.message : error}`);
    }
  }

  /**
   * Test database connection
   */
  private async testConnection(): Promise<void> {
    const client = await this.pool.connect();
    try {
      const result = await client.query<{ now: Date }>('SELECT NOW() AS now');
      this.logger.debug(`Database connection successful: ${result.rows[0].now}`);
    } finally {
      client.release();
    }
  }

  /**
   * Verify pgvector extension is installed
   */
  private async verifyPgVector(): Promise<void> {
    const client = await this.pool.connect();
    try {
      const result = await client.query<{ installed: boolean }>(
        "SELECT EXISTS(SELECT 1 FROM pg_extension WHERE extname = 'vector') AS installed"
      );

      if (!result.rows[0].installed) {
        throw new Error('pgvector extension is not installed. Please run: CREATE EXTENSION vector;');
      }

      this.logger.debug('pgvector extension verified');
    } finally {
      client.release();
    }
  }

  /**
   * Verify the node table exists
   */
  private async verifySchema(): Promise<void> {
    const client = await this.pool.connect();
    try {
      const result = await client.query<{ exists: boolean }>(
        "SELECT EXISTS(SELECT 1 FROM information_schema.tables WHERE table_name = 'doc_nodes') AS exists"
      );

      if (!result.rows[0].exists) {
        this.logger.warn('doc_nodes table does not exist. Please run migrations.');
        throw new Error('doc_nodes table not found. Run migrations first.');
      }

      this.logger.debug('Database schema verified');
    } finally {
      client.release();
    }
  }

  /**
   * Store a single embedding vector
   * Uses UPSERT to handle duplicates
   */
  async store(embedding: EmbeddingVector): Promise<void> {
    this.ensureInitialized();

    const client = await this.pool.connect();
    try {
      await client.query(UPSERT_NODE, this.toRowValues(embedding));
      this.logger.debug(`Stored embedding: ${embedding.id}`);
    } catch (error) {
      this.logger.error(`Failed to store embedding ${embedding.id}`, error);
      throw error;
    } finally {
      client.release();
    }
  }

  /**
   * Store multiple embedding vectors in a transaction
   */
  async storeBatch(embeddings: EmbeddingVector[]): Promise<void> {
    this.ensureInitialized();

    if (embeddings.length === 0) {
      return;
    }

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');

      for (const embedding of embeddings) {
        await client.query(UPSERT_NODE, this.toRowValues(embedding));
      }

      await client.query('COMMIT');
      this.logger.info(`Stored batch of ${embeddings.length} embeddings`);
    } catch (error) {
      await client.query('ROLLBACK');
      this.logger.error('Failed to store embedding batch', error);
      throw error;
    } finally {
      client.release();
    }
  }

  /**
   * Search for similar vectors using cosine similarity
   */
  async search(queryVector: number[], topK: number, refDocIds: string[] = []): Promise<SearchResult[]> {
    this.ensureInitialized();

    const client = await this.pool.connect();
    try {
      const query = `
        SELECT
          node_id,
          ref_doc_id,
          text,
          metadata,
          1 - (embedding <=> $1) AS similarity
        FROM doc_nodes
        WHERE (cardinality($2::TEXT[]) = 0 OR ref_doc_id = ANY($2::TEXT[]))
        ORDER BY embedding <=> $1
        LIMIT $3
      `;

      const result = await client.query<NodeRow>(query, [this.vectorToSql(queryVector), refDocIds, topK]);

      const searchResults: SearchResult[] = result.rows.map(row => ({
        node: {
          id: row.node_id,
          refDocId: row.ref_doc_id,
          text: row.text,
          metadata: toMetadata(row.metadata),
        },
        similarity: typeof row.similarity === 'number' ? row.similarity : parseFloat(row.similarity),
      }));

      this.logger.info(`Found ${searchResults.length} results for query (documents: ${refDocIds.join(', ') || 'all'})`);

      return searchResults;
    } catch (error) {
      this.logger.error('Failed to search vectors', error);
      throw error;
    } finally {
      client.release();
    }
  }

  /**
   * Clear all stored nodes
   */
  async clear(): Promise<void> {
    this.ensureInitialized();

    const client = await this.pool.connect();
    try {
      const result = await client.query('DELETE FROM doc_nodes');
      this.logger.info(`Cleared ${result.rowCount ?? 0} vectors`);
    } catch (error) {
      this.logger.error('Failed to clear vectors', error);
      throw error;
    } finally {
      client.release();
    }
  }

  /**
   * Get total count of stored vectors
   */
  async count(): Promise<number> {
    this.ensureInitialized();

    const client = await this.pool.connect();
    try {
      const result = await client.query<{ count: string }>('SELECT COUNT(*) AS count FROM doc_nodes');
      return parseInt(result.rows[0].count, 10);
    } catch (error) {
      this.logger.error('Failed to count vectors', error);
      throw error;
    } finally {
      client.release();
    }
  }

  /**
   * Rows are committed by storeBatch, nothing is buffered
   */
  async persist(): Promise<void> {
    this.logger.debug('PgVectorStore writes are already durable');
  }

  /**
   * Close the connection pool
   * Should be called on application shutdown
   */
  async close(): Promise<void> {
    try {
      await this.pool.end();
      this.logger.info('PgVectorStore connection pool closed');
    } catch (error) {
      this.logger.error('Error closing PgVectorStore pool', error);
      throw error;
    }
  }

  private toRowValues(embedding: EmbeddingVector): Array<string> {
    return [
      embedding.id,
      embedding.node.refDocId,
      embedding.node.text,
      JSON.stringify(embedding.node.metadata),
      this.vectorToSql(embedding.vector),
    ];
  }

  /**
   * Convert number array to PostgreSQL vector format
   */
  private vectorToSql(vector: number[]): string {
    return `[${vector.join(',')}]`;
  }

  /**
   * Ensure the store is initialized
   */
  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new Error('PgVectorStore not initialized. Call initialize() first.');
    }
  }
}
