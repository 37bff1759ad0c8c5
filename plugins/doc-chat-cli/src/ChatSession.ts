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
 * Conversation state for one chat session
 *
 * @packageDocumentation
 */

import { ChatMessage, SourceNode } from './api/types';
import type { StreamChatResult, StreamHandlers } from './api/DocChatApi';

/**
 * Part of the API client the session talks to
 */
export interface ChatClient {
  streamChat(messages: ChatMessage[], handlers?: StreamHandlers): Promise<StreamChatResult>;
}

export class ChatSession {
  private readonly client: ChatClient;
  private messages: ChatMessage[] = [];

  loading = false;
  error: string | null = null;
  lastSources: SourceNode[] = [];

  constructor(client: ChatClient) {
    this.client = client;
  }

  get history(): readonly ChatMessage[] {
    return this.messages;
  }

  /**
   * Send a question with the whole conversation. The answer joins the
   * conversation only when it arrived completely.
   */
  async ask(question: string, handlers: StreamHandlers = {}): Promise<StreamChatResult> {
    this.messages.push({ role: 'user', content: question });
    this.loading = true;
    this.error = null;

    try {
      const result = await this.client.streamChat([...this.messages], handlers);
      this.messages.push({ role: 'assistant', content: result.content });
      this.lastSources = result.sources;
      return result;
    } catch (err) {
      this.error = err instanceof Error ? err.message : 'Failed to get answer';
      throw err;
    } finally {
      this.loading = false;
    }
  }

  reset(): void {
    this.messages = [];
    this.loading = false;
    this.error = null;
    this.lastSources = [];
  }
}
