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
 * Domain models and data structures
 *
 * @packageDocumentation
 */

export type MessageRole = 'system' | 'user' | 'assistant';

/**
 * Represents a chat message in the conversation
 */
export interface ChatMessage {
  role: MessageRole;
  content: string;
}

/**
 * Metadata attached to documents and nodes.
 * Keys follow the snake_case names used in source links and citations.
 */
export type NodeMetadata = Record<string, string | number | boolean | null>;

/**
 * A file loaded from the data directory (or one page of it)
 */
export interface SourceDocument {
  id: string;
  text: string;
  metadata: NodeMetadata;
}

/**
 * A chunk of a document, the unit that is embedded, retrieved and cited
 */
export interface DocumentNode {
  id: string;
  refDocId: string;
  text: string;
  metadata: NodeMetadata;
}

/**
 * Represents an embedding vector with its associated node
 */
export interface EmbeddingVector {
  id: string;
  vector: number[];
  node: DocumentNode;
}

/**
 * Represents a similarity search result
 */
export interface SearchResult {
  node: DocumentNode;
  similarity: number;
}

/**
 * Content of a file attached to a chat message.
 * Plain text files carry their text, uploaded files a list of document ids.
 */
export type FileContent =
  | { type: 'text'; value: string }
  | { type: 'ref'; value: string[] };

export interface ChatFile {
  id: string;
  content: FileContent;
  filename: string;
  filesize: number;
  filetype: string;
}

export interface DocumentFileAnnotation {
  type: 'document_file';
  data: { files: ChatFile[] };
}

export interface GenericAnnotation {
  type: string;
  data: unknown;
}

export type MessageAnnotation = DocumentFileAnnotation | GenericAnnotation;

/**
 * A message as received by the chat endpoints
 */
export interface RequestMessage extends ChatMessage {
  annotations?: MessageAnnotation[];
}

/**
 * Request payload for both chat endpoints
 */
export interface ChatData {
  messages: RequestMessage[];
  data?: unknown;
}

/**
 * Retrieved node as exposed to API clients
 */
export interface SourceNode {
  id: string;
  metadata: NodeMetadata;
  score: number | null;
  text: string;
  url: string | null;
}

/**
 * Response payload of the non-streaming chat endpoint
 */
export interface ChatResult {
  result: ChatMessage;
  nodes: SourceNode[];
}

export interface ChatConfigResponse {
  starterQuestions: string[] | null;
}

/**
 * Ollama chat API response structure
 */
export interface OllamaChatResponse {
  model: string;
  created_at: string;
  message: {
    role: string;
    content: string;
  };
  done: boolean;
}

/**
 * One line of a streamed Ollama chat response
 */
export interface OllamaChatChunk {
  model?: string;
  message?: {
    role: string;
    content: string;
  };
  done: boolean;
  error?: string;
}

/**
 * Ollama embed API response structure
 */
export interface OllamaEmbedResponse {
  model: string;
  embeddings: number[][];
}

/**
 * PostgreSQL connection configuration
 */
export interface PostgresConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl?: boolean;
  maxConnections?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
}

/**
 * Vector store configuration
 */
export interface VectorStoreConfig {
  type: 'memory' | 'postgresql';
  postgresql?: PostgresConfig;
}

export type RAGStrategyName = 'condense-plus-context' | 'simple';

/**
 * Configuration for the chat service
 */
export interface DocChatConfig {
  modelProvider: 'ollama';
  defaultModel: string;
  embeddingModel: string;
  embeddingDim?: number;
  ollamaBaseUrl: string;
  /** Seconds */
  ollamaRequestTimeout: number;
  appHost: string;
  appPort: number;
  environment: string;
  logLevel: string;
  ragStrategy: RAGStrategyName;
  defaultTopK: number;
  chunkSize: number;
  chunkOverlap: number;
  contextWindow: number;
  systemPrompt?: string;
  systemCitationPrompt?: string;
  dataDir: string;
  storageDir: string;
  fileServerUrlPrefix?: string;
  conversationStarters: string[];
  vectorStore: VectorStoreConfig;
}
