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
 * LLM Service implementation for Ollama integration
 * Handles all interactions with the Ollama API
 *
 * @packageDocumentation
 */

import fetch, { RequestInit, Response } from 'node-fetch';
import { StringDecoder } from 'string_decoder';
import type { Logger } from 'winston';
import { ILLMService, IConfigService, ServiceDependencies } from '../interfaces';
import { ChatMessage, OllamaChatChunk, OllamaChatResponse, OllamaEmbedResponse } from '../models';
import { errorMessage, OllamaError } from '../errors';

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface OllamaLLMServiceDependencies extends ServiceDependencies {
  fetchImpl?: FetchFn;
}

/**
 * Service for interacting with Ollama LLM
 * Follows Single Responsibility and Dependency Inversion principles
 */
export class OllamaLLMService implements ILLMService {
  private readonly logger: Logger;
  private readonly configService: IConfigService;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetch: FetchFn;

  constructor(dependencies: OllamaLLMServiceDependencies) {
    this.logger = dependencies.logger;
    this.configService = dependencies.config;
    const config = this.configService.getConfig();
    this.baseUrl = config.ollamaBaseUrl.replace(/\/+$/, '');
    this.timeoutMs = config.ollamaRequestTimeout * 1000;
    this.fetch = dependencies.fetchImpl ?? fetch;
  }

  /**
   * Generate a chat completion using Ollama
   */
  async chat(messages: ChatMessage[], model?: string): Promise<string> {
    const modelName = model || this.configService.getConfig().defaultModel;

    this.logger.info(`Generating chat completion with model: ${modelName}`);

    try {
      const response = await this.fetch(`${this.baseUrl}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: modelName,
          messages,
          stream: false,
        }),
        timeout: this.timeoutMs,
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new OllamaError(`Ollama API error (${response.status}): ${errorText}`, response.status);
      }

      const json = (await response.json()) as OllamaChatResponse;

      if (!json.message || typeof json.message.content !== 'string') {
        throw new OllamaError('Invalid response format from Ollama');
      }

      return json.message.content;
    } catch (error) {
      this.logger.error(`Failed to generate chat completion: ${error}`);
      throw this.wrap('Chat completion failed', error);
    }
  }

  /**
   * Stream a chat completion; yields content deltas as Ollama produces them
   */
  async *streamChat(messages: ChatMessage[], model?: string): AsyncGenerator<string> {
    const modelName = model || this.configService.getConfig().defaultModel;

    this.logger.info(`Streaming chat completion with model: ${modelName}`);

    // node-fetch drops its timeout once the headers are in, so reading the body has its own idle timer
    const controller = new AbortController();
    let timedOut = false;
    const startIdleTimer = () =>
      setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, this.timeoutMs);

    const response = await this.openChatStream(messages, modelName, controller.signal);
    const decoder = new StringDecoder('utf8');
    let buffer = '';
    let idleTimer = startIdleTimer();

    try {
      for await (const chunk of response.body) {
        clearTimeout(idleTimer);
        buffer += typeof chunk === 'string' ? chunk : decoder.write(chunk);

        let newline = buffer.indexOf('\n');
        while (newline >= 0) {
          const line = buffer.slice(0, newline).trim();
          buffer = buffer.slice(newline + 1);
          newline = buffer.indexOf('\n');

          if (!line) continue;
          const parsed = this.parseChunk(line);
          if (parsed.content) yield parsed.content;
          if (parsed.done) return;
        }
        idleTimer = startIdleTimer();
      }
    } catch (error) {
      if (timedOut) {
        const seconds = this.timeoutMs / 1000;
        this.logger.error(`Chat stream stalled: no data from Ollama for ${seconds}s`);
        throw new OllamaError(`Chat stream failed: no data from Ollama for ${seconds}s`);
      }
      throw error;
    } finally {
      clearTimeout(idleTimer);
      // Releases the connection when the caller stops early
      controller.abort();
    }

    buffer += decoder.end();
    const rest = buffer.trim();
    if (rest) {
      const parsed = this.parseChunk(rest);
      if (parsed.content) yield parsed.content;
    }
  }

  private async openChatStream(messages: ChatMessage[], modelName: string, signal: AbortSignal): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetch(`${this.baseUrl}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: modelName,
          messages,
          stream: true,
        }),
        timeout: this.timeoutMs,
        signal,
      });
    } catch (error) {
      this.logger.error(`Failed to start chat stream: ${error}`);
      throw this.wrap('Chat stream failed', error);
    }

    if (!response.ok) {
      const errorText = await response.text();
      this.logger.error(`Failed to start chat stream: ${response.status} ${errorText}`);
      throw new OllamaError(`Chat stream failed: Ollama API error (${response.status}): ${errorText}`, response.status);
    }
    return response;
  }

  private parseChunk(line: string): { content: string; done: boolean } {
    let chunk: OllamaChatChunk;
    try {
      chunk = JSON.parse(line) as OllamaChatChunk;
    } catch {
      throw new OllamaError(`Invalid stream line from Ollama: ${line}`);
    }
    if (chunk.error) {
      throw new OllamaError(`Ollama stream error: ${chunk.error}`);
    }
    return { content: chunk.message?.content ?? '', done: chunk.done };
  }

  /**
   * Generate embeddings using Ollama
   */
  async generateEmbeddings(inputs: string[], model?: string): Promise<number[][]> {
    const config = this.configService.getConfig();
    const modelName = model || config.embeddingModel;

    this.logger.info(`Generating embeddings for ${inputs.length} inputs with model: ${modelName}`);

    try {
      const response = await this.fetch(`${this.baseUrl}/api/embed`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: modelName,
          input: inputs,
        }),
        timeout: this.timeoutMs,
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new OllamaError(`Ollama API error (${response.status}): ${errorText}`, response.status);
      }

      const json = (await response.json()) as OllamaEmbedResponse;

      if (!json.embeddings || !Array.isArray(json.embeddings)) {
        throw new OllamaError('Invalid embeddings response format from Ollama');
      }
      if (json.embeddings.length !== inputs.length) {
        throw new OllamaError(`Expected ${inputs.length} embeddings, got ${json.embeddings.length}`);
      }

      const expectedDim = config.embeddingDim;
      if (expectedDim !== undefined) {
        const mismatch = json.embeddings.find(vector => vector.length !== expectedDim);
        if (mismatch) {
          throw new OllamaError(
            `Embedding dimension mismatch: EMBEDDING_DIM is ${expectedDim}, ${modelName} returned ${mismatch.length}`
          );
        }
      }

      this.logger.debug(`Successfully generated ${json.embeddings.length} embeddings`);
      return json.embeddings;
    } catch (error) {
      this.logger.error(`Failed to generate embeddings: ${error}`);
      throw this.wrap('Embedding generation failed', error);
    }
  }

  /**
   * Health check for Ollama service
   */
  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.fetch(`${this.baseUrl}/api/tags`, { timeout: this.timeoutMs });
      return response.ok;
    } catch (error) {
      this.logger.error(`Ollama health check failed: ${error}`);
      return false;
    }
  }

  private wrap(prefix: string, error: unknown): OllamaError {
    const status = error instanceof OllamaError ? error.status : undefined;
    return new OllamaError(`${prefix}: ${errorMessage(error)}`, status);
  }
}
