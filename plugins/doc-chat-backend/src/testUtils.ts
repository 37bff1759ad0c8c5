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
 * Shared fixtures for the backend tests
 *
 * @packageDocumentation
 */

import { jest } from '@jest/globals';
import { createLogger, transports, Logger } from 'winston';
import { ConfigService } from './services/ConfigService';
import { DocumentNode, SearchResult } from './models';
import {
  IDocumentLoader,
  IDocumentProcessor,
  ILLMService,
  IVectorStore,
  IVectorStoreProvider,
  RAGServiceDependencies,
} from './interfaces';

/**
 * Logger that writes nothing; spy on its methods to assert messages
 */
export function createTestLogger(): Logger {
  return createLogger({
    level: 'debug',
    silent: true,
    transports: [new transports.Console({ silent: true })],
  });
}

export function createTestConfig(env: NodeJS.ProcessEnv = {}): ConfigService {
  return ConfigService.fromEnv(env);
}

export function createNode(id: string, text: string, overrides: Partial<DocumentNode> = {}): DocumentNode {
  return {
    id,
    refDocId: 'guide.md',
    text,
    metadata: { file_name: 'guide.md' },
    ...overrides,
  };
}

export function createResult(node: DocumentNode, similarity = 0.9): SearchResult {
  return { node, similarity };
}

/**
 * Strategy and RAG service dependencies with every collaborator mocked
 */
export interface MockedRAGDependencies extends RAGServiceDependencies {
  llmService: jest.Mocked<ILLMService>;
  vectorStore: jest.Mocked<IVectorStore>;
  vectorStoreProvider: jest.Mocked<IVectorStoreProvider>;
  documentProcessor: jest.Mocked<IDocumentProcessor>;
  documentLoader: jest.Mocked<IDocumentLoader>;
}

/**
 * Token estimate of one token per word
 */
export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export function createRAGDependencies(env: NodeJS.ProcessEnv = {}): MockedRAGDependencies {
  const vectorStore: jest.Mocked<IVectorStore> = {
    store: jest.fn<IVectorStore['store']>(),
    storeBatch: jest.fn<IVectorStore['storeBatch']>().mockResolvedValue(undefined),
    search: jest.fn<IVectorStore['search']>().mockResolvedValue([]),
    clear: jest.fn<IVectorStore['clear']>().mockResolvedValue(undefined),
    count: jest.fn<IVectorStore['count']>().mockResolvedValue(0),
    persist: jest.fn<IVectorStore['persist']>().mockResolvedValue(undefined),
  };

  return {
    logger: createTestLogger(),
    config: createTestConfig(env),
    llmService: {
      chat: jest.fn<ILLMService['chat']>().mockResolvedValue('answer'),
      streamChat: jest.fn<ILLMService['streamChat']>(),
      generateEmbeddings: jest
        .fn<ILLMService['generateEmbeddings']>()
        .mockImplementation(async inputs => inputs.map(() => [0.5, 0.5])),
      healthCheck: jest.fn<ILLMService['healthCheck']>().mockResolvedValue(true),
    },
    vectorStore,
    vectorStoreProvider: {
      getVectorStore: jest.fn<IVectorStoreProvider['getVectorStore']>().mockResolvedValue(vectorStore),
      invalidate: jest.fn<IVectorStoreProvider['invalidate']>(),
    },
    documentProcessor: {
      chunkDocument: jest.fn<IDocumentProcessor['chunkDocument']>().mockReturnValue([]),
      extractText: jest.fn<IDocumentProcessor['extractText']>(),
      estimateTokens: jest.fn<IDocumentProcessor['estimateTokens']>().mockImplementation(countWords),
    },
    documentLoader: {
      loadDocuments: jest.fn<IDocumentLoader['loadDocuments']>().mockResolvedValue([]),
    },
  };
}

export async function collect(tokens: AsyncIterable<string>): Promise<string[]> {
  const collected: string[] = [];
  for await (const token of tokens) {
    collected.push(token);
  }
  return collected;
}
