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
 * API client for the doc-chat backend
 * Provides a clean interface for communicating with the backend
 *
 * @packageDocumentation
 */

import fetch, { FetchError, RequestInit, Response } from 'node-fetch';
import { StringDecoder } from 'string_decoder';
import { ChatConfig, ChatMessage, ChatResult, HealthResponse, SourceNode } from './types';
import { DataStreamPart, DataStreamParser } from '../stream/DataStreamParser';
import { isChatMessage, isRecord, isSourceNode } from './guards';

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface DocChatApiOptions {
  /**
   * Limit on waiting for the response headers, and on each silence while a
   * streamed answer is read. 0 waits forever.
   */
  timeoutMs?: number;
  fetchImpl?: FetchFn;
}

/**
 * Callbacks for a streamed answer
 */
export interface StreamHandlers {
  onToken?: (token: string) => void;
  onSources?: (nodes: SourceNode[]) => void;
}

export interface StreamChatResult {
  content: string;
  sources: SourceNode[];
}

/**
 * Failed call to the chat API
 */
export class DocChatApiError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'DocChatApiError';
    this.status = status;
  }
}

export function isTimeoutError(error: unknown): boolean {
  return error instanceof FetchError && (error.type === 'request-timeout' || error.type === 'body-timeout');
}

async function readErrorMessage(response: Response): Promise<string> {
  if (!response.headers.get('content-type')?.includes('application/json')) {
    return (await response.text()) || `Request failed: ${response.status}`;
  }

  const body: unknown = await response.json();
  if (isRecord(body)) {
    for (const key of ['detail', 'message', 'error']) {
      const value = body[key];
      if (typeof value === 'string' && value) {
        return value;
      }
    }
  }
  return `Request failed: ${response.status}`;
}

/**
 * API client for chat operations
 * Follows Single Responsibility Principle
 */
export class DocChatApi {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetch: FetchFn;

  constructor(baseUrl: string = 'http://localhost:8000/api', options: DocChatApiOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 0;
    this.fetch = options.fetchImpl ?? fetch;
  }

  /**
   * Ask the conversation's last question and stream the answer
   */
  async streamChat(messages: ChatMessage[], handlers: StreamHandlers = {}): Promise<StreamChatResult> {
    const url = `${this.baseUrl}/chat`;
    const controller = new AbortController();
    const response = await this.post('/chat', { messages }, controller.signal);

    const parser = new DataStreamParser();
    const decoder = new StringDecoder('utf8');
    const result: StreamChatResult = { content: '', sources: [] };

    const handle = (parts: DataStreamPart[]) => {
      for (const part of parts) {
        switch (part.type) {
          case 'text':
            result.content += part.value;
            handlers.onToken?.(part.value);
            break;
          case 'sources':
            result.sources = part.nodes;
            handlers.onSources?.(part.nodes);
            break;
          case 'error':
            throw new DocChatApiError(part.message);
          default:
            break;
        }
      }
    };

    let timedOut = false;
    let idleTimer: NodeJS.Timeout | undefined;
    const startIdleTimer = () => {
      if (this.timeoutMs > 0) {
        idleTimer = setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, this.timeoutMs);
      }
    };

    startIdleTimer();
    try {
      for await (const chunk of response.body) {
        clearTimeout(idleTimer);
        handle(parser.push(typeof chunk === 'string' ? chunk : decoder.write(chunk)));
        startIdleTimer();
      }
    } catch (error) {
      if (timedOut) {
        throw new FetchError(`network timeout while reading ${url}`, 'body-timeout');
      }
      throw error;
    } finally {
      clearTimeout(idleTimer);
      controller.abort();
    }
    handle(parser.push(decoder.end()));
    handle(parser.flush());

    return result;
  }

  /**
   * Ask the conversation's last question and wait for the whole answer
   */
  async chatRequest(messages: ChatMessage[]): Promise<ChatResult> {
    const response = await this.post('/chat/request', { messages });
    const body: unknown = await response.json();

    if (!isRecord(body) || !isChatMessage(body.result) || !Array.isArray(body.nodes)) {
      throw new DocChatApiError('Unexpected chat response');
    }
    return { result: body.result, nodes: body.nodes.filter(isSourceNode) };
  }

  /**
   * Starter questions configured on the server
   */
  async getConfig(): Promise<ChatConfig> {
    const response = await this.get('/chat/config');
    const body: unknown = await response.json();

    if (!isRecord(body)) {
      throw new DocChatApiError('Unexpected config response');
    }
    const questions = body.starterQuestions;
    return {
      starterQuestions: Array.isArray(questions)
        ? questions.filter((question): question is string => typeof question === 'string')
        : null,
    };
  }

  /**
   * Health check
   */
  async healthCheck(): Promise<HealthResponse> {
    const response = await this.get('/health');
    const body: unknown = await response.json();

    if (!isRecord(body)) {
      throw new DocChatApiError('Unexpected health response');
    }

    const { status, ollama, nodeCount, config } = body;
    if (
      (status !== 'healthy' && status !== 'degraded' && status !== 'unhealthy') ||
      typeof ollama !== 'boolean' ||
      !(typeof nodeCount === 'number' || nodeCount === null) ||
      !isRecord(config)
    ) {
      throw new DocChatApiError('Unexpected health response');
    }

    return {
      status,
      ollama,
      nodeCount,
      config: {
        defaultModel: String(config.defaultModel ?? ''),
        embeddingModel: String(config.embeddingModel ?? ''),
        ragStrategy: String(config.ragStrategy ?? ''),
      },
    };
  }

  private async post(path: string, payload: unknown, signal?: AbortSignal): Promise<Response> {
    const response = await this.fetch(`${this.baseUrl}${path}`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(payload),
      timeout: this.timeoutMs,
      signal,
    });

    if (!response.ok) {
      throw new DocChatApiError(await readErrorMessage(response), response.status);
    }
    return response;
  }

  private async get(path: string): Promise<Response> {
    const response = await this.fetch(`${this.baseUrl}${path}`, { timeout: this.timeoutMs });

    if (!response.ok) {
      throw new DocChatApiError(await readErrorMessage(response), response.status);
    }
    return response;
  }
}
