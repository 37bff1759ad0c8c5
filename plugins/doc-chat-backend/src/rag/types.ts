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
 * RAG domain types and interfaces
 *
 * @packageDocumentation
 */

import { ChatMessage, RAGStrategyName, SearchResult } from '../models';

/**
 * Context object passed between strategy steps.
 */
export interface RAGContext {
  query: string;
  history?: ChatMessage[];
  topK?: number;
  refDocIds?: string[];
  model?: string;
}

/**
 * Response returned by a strategy when answering a question.
 */
export interface RAGAnswer {
  answer: string;
  sources: SearchResult[];
  model: string;
}

/**
 * Streaming counterpart of RAGAnswer. Retrieval is finished when it is
 * returned, so sources are known before the first token.
 */
export interface RAGStream {
  tokens: AsyncIterable<string>;
  sources: SearchResult[];
  model: string;
}

/**
 * Totals of a generate run.
 */
export interface IndexingResult {
  documents: number;
  nodes: number;
}

/**
 * Contract implemented by all RAG strategies.
 */
export interface IRAGStrategy {
  readonly name: RAGStrategyName;

  /**
   * Rebuild the index from every document of the data directory.
   */
  indexAll(): Promise<IndexingResult>;

  /**
   * Retrieve nodes for the provided query.
   */
  retrieve(context: RAGContext): Promise<SearchResult[]>;

  /**
   * Produce an answer (and supporting sources) for the provided query.
   */
  answer(context: RAGContext): Promise<RAGAnswer>;

  /**
   * Produce an answer as a token stream.
   */
  streamAnswer(context: RAGContext): Promise<RAGStream>;
}
