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
 * Service interfaces following SOLID principles
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import {
  ChatMessage,
  DocChatConfig,
  DocumentNode,
  EmbeddingVector,
  SearchResult,
  SourceDocument,
} from '../models';
import type { IndexingResult, RAGAnswer, RAGStream } from '../rag/types';

/**
 * Interface for LLM service operations
 * Single Responsibility: Handles all LLM-related operations
 */
export interface ILLMService {
  /**
   * Generate a chat completion
   */
  chat(messages: ChatMessage[], model?: string): Promise<string>;

  /**
   * Generate a chat completion token by token
   */
  streamChat(messages: ChatMessage[], model?: string): AsyncIterable<string>;

  /**
   * Generate embeddings for text inputs
   */
  generateEmbeddings(inputs: string[], model?: string): Promise<number[][]>;

  /**
   * Whether the model server answers
   */
  healthCheck(): Promise<boolean>;
}

/**
 * Interface for vector store operations
 * Single Responsibility: Manages vector storage and retrieval
 */
export interface IVectorStore {
  /**
   * Store an embedding vector
   */
  store(embedding: EmbeddingVector): Promise<void>;

  /**
   * Store multiple embedding vectors in batch
   */
  storeBatch(embeddings: EmbeddingVector[]): Promise<void>;

  /**
   * Search for similar vectors, restricted to the given documents when any are named
   */
  search(queryVector: number[], topK: number, refDocIds?: string[]): Promise<SearchResult[]>;

  /**
   * Clear all stored vectors
   */
  clear(): Promise<void>;

  /**
   * Get total count of stored vectors
   */
  count(): Promise<number>;

  /**
   * Make stored vectors durable
   */
  persist(): Promise<void>;
}

/**
 * Hands out the vector store to use for one operation.
 * Serving reads a cached copy of the persisted index, generating writes a fresh one.
 */
export interface IVectorStoreProvider {
  getVectorStore(): Promise<IVectorStore>;

  /**
   * Drop any cached store so the next call reloads it
   */
  invalidate(): void;
}

/**
 * Interface for loading source documents
 */
export interface IDocumentLoader {
  loadDocuments(): Promise<SourceDocument[]>;
}

/**
 * Interface for document processing
 * Single Responsibility: Handles document chunking and preparation
 */
export interface IDocumentProcessor {
  /**
   * Chunk a document into nodes
   */
  chunkDocument(document: SourceDocument): DocumentNode[];

  /**
   * Extract text content from various formats
   */
  extractText(content: string, format?: string): string;

  /**
   * Estimate the number of LLM tokens in a text
   */
  estimateTokens(text: string): number;
}

/**
 * Interface for RAG operations
 * Single Responsibility: Orchestrates the RAG pipeline
 */
export interface IRAGService {
  /**
   * Load, chunk, embed and persist every document of the data directory
   */
  indexAllDocuments(): Promise<IndexingResult>;

  /**
   * Answer the last user message given the previous conversation
   */
  chat(message: string, history: ChatMessage[], documentIds?: string[]): Promise<RAGAnswer>;

  /**
   * Same as chat, streaming the answer
   */
  streamChat(message: string, history: ChatMessage[], documentIds?: string[]): Promise<RAGStream>;

  /**
   * Number of nodes in the index, null when nothing was generated
   */
  countNodes(): Promise<number | null>;
}

/**
 * Interface for configuration management
 * Single Responsibility: Manages service configuration
 */
export interface IConfigService {
  /**
   * Get the complete configuration
   */
  getConfig(): DocChatConfig;
}

/**
 * Dependencies for service construction
 */
export interface ServiceDependencies {
  logger: Logger;
  config: IConfigService;
}

/**
 * Dependencies for RAG service construction
 */
export interface RAGServiceDependencies extends ServiceDependencies {
  llmService: ILLMService;
  vectorStoreProvider: IVectorStoreProvider;
  documentProcessor: IDocumentProcessor;
  documentLoader: IDocumentLoader;
}
