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
 * Express router for the chat API
 * Handles HTTP requests and orchestrates services
 *
 * @packageDocumentation
 */

import express, { Request, Response, Router } from 'express';
import type { Logger } from 'winston';
import { IConfigService, ILLMService, IRAGService } from './interfaces';
import { ChatConfigResponse, ChatData, ChatResult } from './models';
import { RAGStream } from './rag/types';
import { errorMessage, RequestValidationError } from './errors';
import { getChatDocumentIds, getHistoryMessages, getLastMessageContent, parseChatData } from './api/ChatRequest';
import { toSourceNodes } from './api/SourceNodes';
import { convertData, convertError, convertText, sourcesData } from './api/dataStream';

/**
 * Services the router needs
 */
export interface ApiEnvironment {
  logger: Logger;
  config: IConfigService;
  llmService: ILLMService;
  ragService: IRAGService;
}

function sendError(res: Response, error: unknown, description: string): void {
  if (error instanceof RequestValidationError) {
    res.status(400).json({ error: 'Invalid chat request', message: error.message });
    return;
  }
  res.status(500).json({ error: description, message: errorMessage(error) });
}

/**
 * Create and configure the API router, mounted under `/api`
 */
export function createApiRouter(env: ApiEnvironment): Router {
  const router = Router();
  router.use(express.json({ limit: '10mb' }));

  const { logger, config, llmService, ragService } = env;

  /**
   * POST /api/chat
   * Answer the conversation as a data stream
   */
  router.post('/chat', async (req: Request, res: Response) => {
    let data: ChatData;
    try {
      data = parseChatData(req.body);
    } catch (error) {
      logger.warn(`Rejected chat request: ${errorMessage(error)}`);
      sendError(res, error, 'Failed to process question');
      return;
    }

    let disconnected = false;
    res.once('close', () => {
      disconnected = !res.writableFinished;
    });

    let stream: RAGStream;
    let iterator: AsyncIterator<string>;
    let first: IteratorResult<string>;
    try {
      stream = await ragService.streamChat(
        getLastMessageContent(data, logger),
        getHistoryMessages(data),
        getChatDocumentIds(data)
      );
      // Pull the first token so a model failure can still become an HTTP error
      iterator = stream.tokens[Symbol.asyncIterator]();
      first = await iterator.next();
    } catch (error) {
      logger.error(`Error in chat engine: ${errorMessage(error)}`);
      if (!disconnected) {
        res.status(500).json({ detail: `Error in chat engine: ${errorMessage(error)}` });
      }
      return;
    }

    if (disconnected) {
      logger.info('Client disconnected before the first token, stopping the chat stream');
      await iterator.return?.();
      return;
    }

    res.status(200);
    res.setHeader('Content-Type', 'text/plain; charset=utf-8');
    res.setHeader('X-Vercel-AI-Data-Stream', 'v1');
    res.write(convertText(''));

    try {
      let result = first;
      while (!result.done && !disconnected) {
        res.write(convertText(result.value));
        result = await iterator.next();
      }

      if (disconnected) {
        logger.info('Client disconnected, stopping the chat stream');
        await iterator.return?.();
        return;
      }

      res.write(convertData(sourcesData(toSourceNodes(stream.sources, config.getConfig(), logger))));
    } catch (error) {
      logger.error(`Chat stream failed: ${errorMessage(error)}`);
      res.write(convertError(`Error in chat engine: ${errorMessage(error)}`));
    }
    res.end();
  });

  /**
   * POST /api/chat/request
   * Answer the conversation in one response
   */
  router.post('/chat/request', async (req: Request, res: Response) => {
    try {
      const data = parseChatData(req.body);
      const lastMessageContent = getLastMessageContent(data, logger);

      logger.info(`Processing question: "${lastMessageContent.substring(0, 50)}..."`);

      const answer = await ragService.chat(lastMessageContent, getHistoryMessages(data), getChatDocumentIds(data));

      const response: ChatResult = {
        result: { role: 'assistant', content: answer.answer },
        nodes: toSourceNodes(answer.sources, config.getConfig(), logger),
      };
      res.json(response);
    } catch (error) {
      logger.error(`Failed to process question: ${errorMessage(error)}`);
      sendError(res, error, 'Failed to process question');
    }
  });

  /**
   * GET /api/chat/config
   * Starter questions for chat clients
   */
  router.get('/chat/config', (_req: Request, res: Response) => {
    const starters = config.getConfig().conversationStarters;
    const response: ChatConfigResponse = {
      starterQuestions: starters.length > 0 ? starters : null,
    };
    res.json(response);
  });

  /**
   * GET /api/health
   * Health check endpoint
   */
  router.get('/health', async (_req: Request, res: Response) => {
    try {
      const ollamaHealthy = await llmService.healthCheck();
      const nodeCount = await ragService.countNodes();
      const appConfig = config.getConfig();

      res.json({
        status: ollamaHealthy && nodeCount !== null ? 'healthy' : 'degraded',
        ollama: ollamaHealthy,
        nodeCount,
        config: {
          defaultModel: appConfig.defaultModel,
          embeddingModel: appConfig.embeddingModel,
          ragStrategy: appConfig.ragStrategy,
        },
      });
    } catch (error) {
      logger.error(`Health check failed: ${errorMessage(error)}`);
      res.status(500).json({
        status: 'unhealthy',
        error: errorMessage(error),
      });
    }
  });

  return router;
}
