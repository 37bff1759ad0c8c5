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
 * Payloads exchanged with the chat API
 *
 * @packageDocumentation
 */

export type MessageRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

/**
 * Node the answer was generated from
 */
export interface SourceNode {
  id: string;
  metadata: Record<string, unknown>;
  score: number | null;
  text: string;
  url: string | null;
}

/**
 * Response of the non-streaming chat endpoint
 */
export interface ChatResult {
  result: ChatMessage;
  nodes: SourceNode[];
}

export interface ChatConfig {
  starterQuestions: string[] | null;
}

/**
 * Health check response
 */
export interface HealthResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  ollama: boolean;
  nodeCount: number | null;
  config: {
    defaultModel: string;
    embeddingModel: string;
    ragStrategy: string;
  };
}
