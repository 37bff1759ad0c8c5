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
 * RAG Service implementation
 * Orchestrates the Retrieval-Augmented Generation pipeline
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IRAGService, RAGServiceDependencies, IVectorStoreProvider } from '../interfaces';
import { ChatMessage } from '../models';
import { RAGStrategyFactory } from '../rag';
import { IndexingResult, IRAGStrategy, RAGAnswer, RAGStream } from '../rag/types';
import { IndexNotFoundError } from '../errors';

/**
 * Service that orchestrates the RAG pipeline
 * Follows Single Responsibility and Open/Closed principles
 */
export class RAGService implements IRAGService {
  private readonly logger: Logger;
  private readonly vectorStoreProvider: IVectorStoreProvider;
  private readonly strategy: IRAGStrategy;

  private indexingInProgress = false;

  constructor(dependencies: RAGServiceDependencies) {
    this.logger = dependencies.logger;
    this.vectorStoreProvider = dependencies.vectorStoreProvider;
    this.strategy = RAGStrategyFactory.create(dependencies);
  }

  /**
   * Load, chunk, embed and persist every document of the data directory
   */
  async indexAllDocuments(): Promise<IndexingResult> {
    if (this.indexingInProgress) {
      throw new Error('Indexing already in progress');
    }

    try {
      this.indexingInProgress = true;
      this.logger.info('Starting full document indexing');

      return await this.strategy.indexAll();
    } catch (error) {
      this.logger.error(`Indexing failed: ${error}`);
      throw error;
    } finally {
      this.indexingInProgress = false;
    }
  }

  async chat(message: string, history: ChatMessage[], documentIds?: string[]): Promise<RAGAnswer> {
    try {
      return await this.strategy.answer({ query: message, history, refDocIds: documentIds });
    } catch (error) {
      this.logger.error(`Answer generation failed: ${error}`);
      throw error;
    }
  }

  async streamChat(message: string, history: ChatMessage[], documentIds?: string[]): Promise<RAGStream> {
    try {
      return await this.strategy.streamAnswer({ query: message, history, refDocIds: documentIds });
    } catch (error) {
      this.logger.error(`Answer generation failed: ${error}`);
      throw error;
    }
  }

  async countNodes(): Promise<number | null> {
    try {
      const vectorStore = await this.vectorStoreProvider.getVectorStore();
      return await vectorStore.count();
    } catch (error) {
      if (error instanceof IndexNotFoundError) {
        return null;
      }
      throw error;
    }
  }
}
