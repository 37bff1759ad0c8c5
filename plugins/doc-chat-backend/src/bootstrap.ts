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
 * Service wiring shared by the server and the generate command
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import {
  ConfigService,
  OllamaLLMService,
  VectorStoreFactory,
  DocumentProcessor,
  FileDocumentLoader,
  RAGService,
} from './services';
import { VectorStoreMode } from './services/VectorStoreFactory';

export interface DocChatServices {
  logger: Logger;
  config: ConfigService;
  llmService: OllamaLLMService;
  ragService: RAGService;
  /**
   * Release connections held by the vector store
   */
  close(): Promise<void>;
}

/**
 * Initialize services following Dependency Injection pattern
 */
export async function createServices(
  configService: ConfigService,
  logger: Logger,
  mode: VectorStoreMode
): Promise<DocChatServices> {
  const llmService = new OllamaLLMService({ logger, config: configService });

  // Create vector store using factory (supports both in-memory and PostgreSQL)
  const { provider, close } = await VectorStoreFactory.create(configService, logger, mode);

  const documentProcessor = new DocumentProcessor(logger, configService);
  const documentLoader = new FileDocumentLoader(logger, configService);

  const ragService = new RAGService({
    logger,
    config: configService,
    llmService,
    vectorStoreProvider: provider,
    documentProcessor,
    documentLoader,
  });

  return { logger, config: configService, llmService, ragService, close };
}
