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
 * Configuration service implementation
 * Manages service configuration with type-safe access
 *
 * @packageDocumentation
 */

import { Config } from '@backstage/config';
import { IConfigService } from '../interfaces';
import { DocChatConfig, PostgresConfig, RAGStrategyName, VectorStoreConfig } from '../models';
import { readEnvConfig } from '../config/env';
import { ConfigError } from '../errors';

const RAG_STRATEGIES: readonly RAGStrategyName[] = ['condense-plus-context', 'simple'];

/**
 * Retriever fan-out when TOP_K is unset or 0
 */
export const DEFAULT_TOP_K = 2;

/**
 * Configuration service that wraps a Config reader
 * Follows Single Responsibility Principle
 */
export class ConfigService implements IConfigService {
  private readonly config: Config;
  private readonly cachedConfig: DocChatConfig;

  constructor(config: Config) {
    this.config = config;
    this.cachedConfig = this.loadConfig();
  }

  /**
   * Read configuration from environment variables
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): ConfigService {
    return new ConfigService(readEnvConfig(env));
  }

  /**
   * Load and validate configuration
   */
  private loadConfig(): DocChatConfig {
    const modelProvider = this.config.getOptionalString('docChat.modelProvider') || 'ollama';
    if (modelProvider !== 'ollama') {
      throw new ConfigError(`Invalid model provider: ${modelProvider}`);
    }

    const chunkSize = this.config.getOptionalNumber('docChat.chunkSize') || 1024;
    const chunkOverlap = this.config.getOptionalNumber('docChat.chunkOverlap') ?? 20;
    if (chunkOverlap < 0 || chunkOverlap >= chunkSize) {
      throw new ConfigError(
        `CHUNK_OVERLAP (${chunkOverlap}) must be at least 0 and smaller than CHUNK_SIZE (${chunkSize})`
      );
    }

    const topK = this.config.getOptionalNumber('docChat.rag.topK') || DEFAULT_TOP_K;
    if (topK < 0 || !Number.isInteger(topK)) {
      throw new ConfigError(`TOP_K must be a positive integer, got ${topK}`);
    }

    return {
      modelProvider,
      defaultModel: this.config.getOptionalString('docChat.model') || 'llama3.2',
      embeddingModel: this.config.getOptionalString('docChat.embedding.model') || 'nomic-embed-text',
      embeddingDim: this.config.getOptionalNumber('docChat.embedding.dim'),
      ollamaBaseUrl: this.config.getOptionalString('docChat.ollama.baseUrl') || 'http://127.0.0.1:11434',
      ollamaRequestTimeout: this.config.getOptionalNumber('docChat.ollama.requestTimeout') || 30,
      appHost: this.config.getOptionalString('app.host') || '0.0.0.0',
      appPort: this.config.getOptionalNumber('app.port') || 8000,
      environment: this.config.getOptionalString('app.environment') || 'development',
      logLevel: this.config.getOptionalString('app.logLevel') || 'info',
      ragStrategy: this.loadStrategyName(),
      defaultTopK: topK,
      chunkSize,
      chunkOverlap,
      contextWindow: this.config.getOptionalNumber('docChat.contextWindow') || 3900,
      systemPrompt: this.config.getOptionalString('docChat.prompts.system'),
      systemCitationPrompt: this.config.getOptionalString('docChat.prompts.citation'),
      dataDir: this.config.getOptionalString('docChat.dataDir') || 'data',
      storageDir: this.config.getOptionalString('docChat.storageDir') || 'storage',
      fileServerUrlPrefix: this.config.getOptionalString('docChat.fileServerUrlPrefix'),
      conversationStarters: (this.config.getOptionalString('docChat.conversationStarters') ?? '')
        .split('\n')
        .map(question => question.trim())
        .filter(question => question.length > 0),
      vectorStore: this.loadVectorStoreConfig(),
    };
  }

  private loadStrategyName(): RAGStrategyName {
    const name = this.config.getOptionalString('docChat.rag.strategy') || 'condense-plus-context';
    const match = RAG_STRATEGIES.find(strategy => strategy === name);
    if (!match) {
      throw new ConfigError(`Unknown RAG_STRATEGY '${name}', expected one of: ${RAG_STRATEGIES.join(', ')}`);
    }
    return match;
  }

  /**
   * Load vector store configuration
   */
  private loadVectorStoreConfig(): VectorStoreConfig {
    const type = this.config.getOptionalString('docChat.vectorStore.type') || 'memory';

    switch (type) {
      case 'postgresql':
        return {
          type: 'postgresql',
          postgresql: this.loadPostgresConfig(),
        };
      case 'memory':
        return { type: 'memory' };
      default:
        throw new ConfigError(`Unknown VECTOR_STORE '${type}', expected 'memory' or 'postgresql'`);
    }
  }

  /**
   * Load PostgreSQL configuration with validation
   */
  private loadPostgresConfig(): PostgresConfig {
    const prefix = 'docChat.vectorStore.postgresql';
    const password = this.config.getOptionalString(`${prefix}.password`) || '';

    if (!password) {
      throw new ConfigError('POSTGRES_PASSWORD is required when using the postgresql vector store');
    }

    return {
      host: this.config.getOptionalString(`${prefix}.host`) || 'localhost',
      port: this.config.getOptionalNumber(`${prefix}.port`) || 5432,
      database: this.config.getOptionalString(`${prefix}.database`) || 'doc_chat',
      user: this.config.getOptionalString(`${prefix}.user`) || 'doc_chat',
      password,
      ssl: this.config.getOptionalBoolean(`${prefix}.ssl`) ?? false,
      maxConnections: this.config.getOptionalNumber(`${prefix}.maxConnections`) || 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    };
  }

  getConfig(): DocChatConfig {
    return this.cachedConfig;
  }

  /**
   * Get vector store type
   */
  getVectorStoreType(): VectorStoreConfig['type'] {
    return this.cachedConfig.vectorStore.type;
  }

  /**
   * Get PostgreSQL configuration
   * Throws error if not configured
   */
  getPostgresConfig(): PostgresConfig {
    if (this.cachedConfig.vectorStore.type !== 'postgresql' || !this.cachedConfig.vectorStore.postgresql) {
      throw new ConfigError('PostgreSQL vector store is not configured');
    }
    return this.cachedConfig.vectorStore.postgresql;
  }
}
