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
 * Prompt construction for the chat strategies
 *
 * @packageDocumentation
 */

import { ChatMessage, DocChatConfig, SearchResult } from '../models';

export const CONTEXT_INSTRUCTIONS =
  "Use the following context to answer the user's question. If the answer cannot be found in the context, say so.";

export const CONTEXT_SEPARATOR = '\n\n---\n\n';

/**
 * One retrieved node as shown to the model. The node id is included when
 * the model is asked to cite, so that `[citation:<node_id>]()` can refer to it.
 */
export function formatContextNode(result: SearchResult, index: number, withNodeId: boolean): string {
  const { node } = result;
  const source = [`file_name: ${node.metadata.file_name ?? node.refDocId}`];
  if (node.metadata.page_label !== undefined && node.metadata.page_label !== null) {
    source.push(`page_label: ${node.metadata.page_label}`);
  }

  const lines = [`[${index + 1}] ${source.join(', ')}`];
  if (withNodeId) {
    lines.push(`node_id: ${node.id}`);
  }
  lines.push(node.text);
  return lines.join('\n');
}

export function buildContextString(sources: SearchResult[], withNodeIds: boolean): string {
  return sources.map((result, index) => formatContextNode(result, index, withNodeIds)).join(CONTEXT_SEPARATOR);
}

/**
 * System message: configured system prompt, citation prompt and retrieved context,
 * each only when present. Empty when there is nothing to say.
 */
export function buildSystemMessage(
  config: Pick<DocChatConfig, 'systemPrompt' | 'systemCitationPrompt'>,
  sources: SearchResult[]
): string {
  const citationPrompt = config.systemCitationPrompt?.trim();
  const parts = [config.systemPrompt?.trim(), citationPrompt].filter(
    (part): part is string => part !== undefined && part.length > 0
  );

  if (sources.length > 0) {
    parts.push(`${CONTEXT_INSTRUCTIONS}\n\nContext:\n${buildContextString(sources, Boolean(citationPrompt))}`);
  }

  return parts.join('\n\n');
}

/**
 * Prompt asking the model to turn a follow-up message into a standalone question
 */
export function buildCondensePrompt(history: ChatMessage[], question: string): string {
  const transcript = history.map(message => `${message.role}: ${message.content}`).join('\n');

  return `Given the conversation below and a follow up message from the user, rewrite the follow up message as a standalone question that can be understood without the conversation. Keep the language of the follow up message. Reply with the question only.

Conversation:
${transcript}

Follow up message: ${question}
Standalone question:`;
}
