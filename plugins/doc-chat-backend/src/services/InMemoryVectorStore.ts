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
 * In-memory vector store implementation
 * Provides vector storage and similarity search capabilities
 *
 * @packageDocumentation
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { Logger } from 'winston';
import { IVectorStore } from '../interfaces';
import { EmbeddingVector, SearchResult } from '../models';

export const VECTOR_STORE_FILE = 'vector_store.json';

interface PersistedVectorStore {
  version: 1;
  embeddings: EmbeddingVector[];
}

function isPersistedVectorStore(value: unknown): value is PersistedVectorStore {
  return (
    typeof value === 'object' &&
    value !== null &&
    'version' in value &&
    value.version === 1 &&
    'embeddings' in value &&
    Array.isArray(value.embeddings)
  );
}

/**
 * Calculate cosine similarity between two vectors
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vectors must have the same length (${a.length} vs ${b.length})`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);

  if (denominator === 0) {
    return 0;
  }

  return dotProduct / denominator;
}

/**
 * In-memory vector store using cosine similarity, persisted as one JSON file
 * in the storage directory.
 */
export class InMemoryVectorStore implements IVectorStore {
  private readonly logger: Logger;
  private readonly persistDir?: string;
  private readonly vectors: Map<string, EmbeddingVector> = new Map();

  constructor(logger: Logger, persistDir?: string) {
    this.logger = logger;
    this.persistDir = persistDir;
  }

  /**
   * Load a store written by persist(). Returns null when nothing was persisted there.
   */
  static async fromPersistDir(logger: Logger, persistDir: string): Promise<InMemoryVectorStore | null> {
    const file = path.join(persistDir, VECTOR_STORE_FILE);
    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(raw);
    if (!isPersistedVectorStore(parsed)) {
      throw new Error(`${file} is not a vector store file`);
    }

    const store = new InMemoryVectorStore(logger, persistDir);
    parsed.embeddings.forEach(embedding => store.vectors.set(embedding.id, embedding));
    logger.info(`Loaded ${store.vectors.size} vectors from ${file}`);
    return store;
  }

  async store(embedding: EmbeddingVector): Promise<void> {
    this.vectors.set(embedding.id, embedding);
    this.logger.debug(`Stored embedding: ${embedding.id}`);
  }

  async storeBatch(embeddings: EmbeddingVector[]): Promise<void> {
    embeddings.forEach(embedding => {
      this.vectors.set(embedding.id, embedding);
    });
    this.logger.info(`Stored batch of ${embeddings.length} embeddings`);
  }

  async search(queryVector: number[], topK: number, refDocIds: string[] = []): Promise<SearchResult[]> {
    const candidates =
      refDocIds.length > 0
        ? Array.from(this.vectors.values()).filter(v => refDocIds.includes(v.node.refDocId))
        : Array.from(this.vectors.values());

    const results: SearchResult[] = candidates.map(embedding => ({
      node: embedding.node,
      similarity: cosineSimilarity(queryVector, embedding.vector),
    }));

    // Sort by similarity (descending) and return top K
    results.sort((a, b) => b.similarity - a.similarity);
    const topResults = results.slice(0, topK);

    this.logger.info(`Found ${topResults.length} results for query (documents: ${refDocIds.join(', ') || 'all'})`);

    return topResults;
  }

  async clear(): Promise<void> {
    const count = this.vectors.size;
    this.vectors.clear();
    this.logger.info(`Cleared ${count} vectors from store`);
  }

  async count(): Promise<number> {
    return this.vectors.size;
  }

  async persist(): Promise<void> {
    if (!this.persistDir) {
      this.logger.debug('No storage directory configured, skipping persist');
      return;
    }

    await fs.mkdir(this.persistDir, { recursive: true });
    const file = path.join(this.persistDir, VECTOR_STORE_FILE);
    const payload: PersistedVectorStore = {
      version: 1,
      embeddings: Array.from(this.vectors.values()),
    };
    // Readers only ever see a complete file
    const tmp = `${file}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(payload));
    await fs.rename(tmp, file);
    this.logger.info(`Persisted ${payload.embeddings.length} vectors to ${file}`);
  }
}
