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

import type { Logger } from 'winston';
import { IndexingResult, IRAGStrategy, RAGAnswer, RAGContext, RAGStream } from '../types';
import {
  ILLMService,
  IVectorStoreProvider,
  IDocumentProcessor,
  IDocumentLoader,
  IConfigService,
  RAGServiceDependencies,
} from '../../interfaces';
import { ChatMessage, DocumentNode, EmbeddingVector, RAGStrategyName, SearchResult } from '../../models';
import { buildSystemMessage } from '../prompts';
import { fitHistoryToTokenLimit } from '../memory';

/**
 * Number of nodes embedded per Ollama request while generating
 */
export const EMBED_BATCH_SIZE = 10;

interface PreparedChat {
  messages: ChatMessage[];
  sources: SearchResult[];
  model: string;
}

/**
 * Context chat: retrieve with the user message as is, then answer with the
 * retrieved nodes in the system message and the trimmed history.
 */
export class SimpleRAGStrategy implements IRAGStrategy {
  readonly name: RAGStrategyName = 'simple';

  protected readonly logger: Logger;
  protected readonly llmService: ILLMService;
  protected readonly vectorStoreProvider: IVectorStoreProvider;
  protected readonly documentProcessor: IDocumentProcessor;
  protected readonly documentLoader: IDocumentLoader;
  protected readonly configService: IConfigService;

  constructor(dependencies: RAGServiceDependencies) {
    this.logger = dependencies.logger;
    this.llmService = dependencies.llmService;
    this.vectorStoreProvider = dependencies.vectorStoreProvider;
    this.documentProcessor = dependencies.documentProcessor;
    this.documentLoader = dependencies.documentLoader;
    this.configService = dependencies.config;
  }

  async indexAll(): Promise<IndexingResult> {
    this.logger.info(`[${this.name}] Starting full document indexing`);

    const documents = await this.documentLoader.loadDocuments();
    const nodes = documents.flatMap(document => this.documentProcessor.chunkDocument(document));
    this.logger.info(`[${this.name}] Indexing ${nodes.length} nodes from ${documents.length} documents`);

    // Process nodes in batches to avoid overwhelming the model server
    const batches: EmbeddingVector[][] = [];
    for (let i = 0; i < nodes.length; i += EMBED_BATCH_SIZE) {
      batches.push(await this.embedNodes(nodes.slice(i, i + EMBED_BATCH_SIZE)));
      this.logger.info(`Embedded ${Math.min(i + EMBED_BATCH_SIZE, nodes.length)}/${nodes.length} nodes`);
    }

    // The old index stays in place until every node has its vector
    const vectorStore = await this.vectorStoreProvider.getVectorStore();
    await vectorStore.clear();
    for (const batch of batches) {
      await vectorStore.storeBatch(batch);
    }

    await vectorStore.persist();
    this.vectorStoreProvider.invalidate();

    this.logger.info(`[${this.name}] Indexing complete. Total vectors stored: ${await vectorStore.count()}`);
    return { documents: documents.length, nodes: nodes.length };
  }

  private async embedNodes(nodes: DocumentNode[]): Promise<EmbeddingVector[]> {
    const vectors = await this.llmService.generateEmbeddings(nodes.map(node => node.text));
    return nodes.map((node, index) => ({
      id: node.id,
      vector: vectors[index],
      node,
    }));
  }

  async retrieve(context: RAGContext): Promise<SearchResult[]> {
    const topK = context.topK ?? this.configService.getConfig().defaultTopK;
    this.logger.info(`[${this.name}] Retrieving context (topK=${topK})`);

    // Load first so a missing index fails before any model call
    const vectorStore = await this.vectorStoreProvider.getVectorStore();

    const [queryVector] = await this.llmService.generateEmbeddings([context.query]);
    const results = await vectorStore.search(queryVector, topK, context.refDocIds);

    this.logger.info(`[${this.name}] Retrieved ${results.length} relevant nodes`);
    return results;
  }

  async answer(context: RAGContext): Promise<RAGAnswer> {
    const { messages, sources, model } = await this.prepare(context);

    const answer = await this.llmService.chat(messages, model);
    this.logger.info(`[${this.name}] Successfully generated answer`);

    return { answer, sources, model };
  }

  async streamAnswer(context: RAGContext): Promise<RAGStream> {
    const { messages, sources, model } = await this.prepare(context);

    return {
      tokens: this.llmService.streamChat(messages, model),
      sources,
      model,
    };
  }

  /**
   * Query used for retrieval
   */
  protected async resolveQuery(context: RAGContext): Promise<string> {
    return context.query;
  }

  private async prepare(context: RAGContext): Promise<PreparedChat> {
    const config = this.configService.getConfig();
    const model = context.model || config.defaultModel;

    const query = await this.resolveQuery(context);
    const sources = await this.retrieve({ ...context, query });
    if (sources.length === 0) {
      this.logger.warn(`[${this.name}] No relevant context found, answering without it`);
    }

    const systemMessage = buildSystemMessage(config, sources);
    const estimate = (text: string) => this.documentProcessor.estimateTokens(text);
    const historyBudget = config.contextWindow - estimate(systemMessage) - estimate(context.query);
    const history = fitHistoryToTokenLimit(context.history ?? [], historyBudget, estimate);

    const messages: ChatMessage[] = [];
    if (systemMessage) {
      messages.push({ role: 'system', content: systemMessage });
    }
    messages.push(...history, { role: 'user', content: context.query });

    return { messages, sources, model };
  }
}
