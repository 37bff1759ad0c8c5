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
 * Validation and helpers for the chat request payload
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import {
  ChatData,
  ChatFile,
  ChatMessage,
  DocumentFileAnnotation,
  FileContent,
  MessageAnnotation,
  MessageRole,
  RequestMessage,
} from '../models';
import { RequestValidationError } from '../errors';

const ROLES: readonly MessageRole[] = ['system', 'user', 'assistant'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFileContent(value: unknown): value is FileContent {
  if (!isRecord(value)) {
    return false;
  }
  if (value.type === 'text') {
    return typeof value.value === 'string';
  }
  if (value.type === 'ref') {
    return Array.isArray(value.value) && value.value.every(id => typeof id === 'string');
  }
  return false;
}

function isChatFile(value: unknown): value is ChatFile {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    isFileContent(value.content) &&
    typeof value.filename === 'string' &&
    typeof value.filesize === 'number' &&
    typeof value.filetype === 'string'
  );
}

export function isDocumentFileAnnotation(annotation: MessageAnnotation): annotation is DocumentFileAnnotation {
  return (
    annotation.type === 'document_file' &&
    isRecord(annotation.data) &&
    Array.isArray(annotation.data.files) &&
    annotation.data.files.every(isChatFile)
  );
}

function parseRole(value: unknown, index: number): MessageRole {
  const role = ROLES.find(candidate => candidate === value);
  if (!role) {
    throw new RequestValidationError(`messages[${index}].role must be one of: ${ROLES.join(', ')}`);
  }
  return role;
}

function parseAnnotations(value: unknown, index: number): MessageAnnotation[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new RequestValidationError(`messages[${index}].annotations must be an array`);
  }
  return value.map(annotation => {
    if (!isRecord(annotation) || typeof annotation.type !== 'string') {
      throw new RequestValidationError(`messages[${index}].annotations must have a string type`);
    }
    return { type: annotation.type, data: annotation.data };
  });
}

function parseMessage(value: unknown, index: number): RequestMessage {
  if (!isRecord(value)) {
    throw new RequestValidationError(`messages[${index}] must be an object`);
  }
  if (typeof value.content !== 'string') {
    throw new RequestValidationError(`messages[${index}].content must be a string`);
  }

  const message: RequestMessage = { role: parseRole(value.role, index), content: value.content };
  const annotations = parseAnnotations(value.annotations, index);
  if (annotations) {
    message.annotations = annotations;
  }
  return message;
}

/**
 * Validate a request body. The conversation must end with a user message.
 */
export function parseChatData(body: unknown): ChatData {
  if (!isRecord(body) || !Array.isArray(body.messages)) {
    throw new RequestValidationError('Request body must have a messages array');
  }
  if (body.messages.length === 0) {
    throw new RequestValidationError('There is not any message in the chat');
  }

  const messages = body.messages.map(parseMessage);
  if (messages[messages.length - 1].role !== 'user') {
    throw new RequestValidationError('Last message must be from user');
  }

  return { messages, data: body.data };
}

function fileContentText(content: FileContent): string {
  return typeof content.value === 'string' ? content.value : content.value.join('\n');
}

/**
 * Context text contributed by an annotation. Only CSV document files have any.
 */
export function annotationToContent(annotation: MessageAnnotation, logger?: Logger): string | null {
  if (!isDocumentFileAnnotation(annotation)) {
    logger?.warn(`The annotation ${annotation.type} is not supported for generating context content`);
    return null;
  }

  const csvFiles = annotation.data.files.filter(file => file.filetype === 'csv');
  if (csvFiles.length === 0) {
    return null;
  }
  return `Use data from following CSV raw content\n${csvFiles
    .map(file => `\`\`\`csv\n${fileContentText(file.content)}\n\`\`\``)
    .join('\n')}`;
}

/**
 * Last message content, extended with the annotation content of the newest
 * user message that has some
 */
export function getLastMessageContent(data: ChatData, logger?: Logger): string {
  const lastMessage = data.messages[data.messages.length - 1];

  for (const message of [...data.messages].reverse()) {
    if (message.role !== 'user' || !message.annotations) {
      continue;
    }
    const contents = message.annotations
      .map(annotation => annotationToContent(annotation, logger))
      .filter((content): content is string => content !== null);
    if (contents.length > 0) {
      return `${lastMessage.content}\n${contents.join('\n')}`;
    }
  }

  return lastMessage.content;
}

export function getHistoryMessages(data: ChatData): ChatMessage[] {
  return data.messages.slice(0, -1).map(({ role, content }) => ({ role, content }));
}

/**
 * Document ids referenced by files attached to user messages, without duplicates
 */
export function getChatDocumentIds(data: ChatData): string[] {
  const ids = new Set<string>();
  for (const message of data.messages) {
    if (message.role !== 'user' || !message.annotations) {
      continue;
    }
    for (const annotation of message.annotations) {
      if (!isDocumentFileAnnotation(annotation)) {
        continue;
      }
      for (const file of annotation.data.files) {
        if (file.content.type === 'ref') {
          file.content.value.forEach(id => ids.add(id));
        }
      }
    }
  }
  return Array.from(ids);
}
