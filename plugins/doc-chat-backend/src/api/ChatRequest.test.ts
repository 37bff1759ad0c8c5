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

import { describe, expect, it, jest } from '@jest/globals';
import {
  annotationToContent,
  getChatDocumentIds,
  getHistoryMessages,
  getLastMessageContent,
  parseChatData,
} from './ChatRequest';
import { ChatData, DocumentFileAnnotation } from '../models';
import { createTestLogger } from '../testUtils';

const csvAnnotation: DocumentFileAnnotation = {
  type: 'document_file',
  data: {
    files: [
      {
        id: 'f1',
        content: { type: 'text', value: 'name,count\napples,3' },
        filename: 'fruit.csv',
        filesize: 20,
        filetype: 'csv',
      },
    ],
  },
};

const refAnnotation: DocumentFileAnnotation = {
  type: 'document_file',
  data: {
    files: [
      { id: 'f2', content: { type: 'ref', value: ['doc-1', 'doc-2'] }, filename: 'a.pdf', filesize: 10, filetype: 'pdf' },
      { id: 'f3', content: { type: 'ref', value: ['doc-2', 'doc-3'] }, filename: 'b.pdf', filesize: 10, filetype: 'pdf' },
    ],
  },
};

describe('parseChatData', () => {
  it('accepts a conversation that ends with the user', () => {
    const data = parseChatData({
      messages: [
        { role: 'user', content: 'Hi' },
        { role: 'assistant', content: 'Hello' },
        { role: 'user', content: 'What is in the docs?', annotations: [csvAnnotation] },
      ],
    });

    expect(data.messages).toHaveLength(3);
    expect(data.messages[2].annotations).toEqual([csvAnnotation]);
  });

  it('rejects a body without messages', () => {
    expect(() => parseChatData({})).toThrow('Request body must have a messages array');
    expect(() => parseChatData('messages')).toThrow('Request body must have a messages array');
  });

  it('rejects an empty conversation', () => {
    expect(() => parseChatData({ messages: [] })).toThrow('There is not any message in the chat');
  });

  it('rejects a conversation that ends with the assistant', () => {
    expect(() =>
      parseChatData({
        messages: [
          { role: 'user', content: 'Hi' },
          { role: 'assistant', content: 'Hello' },
        ],
      })
    ).toThrow('Last message must be from user');
  });

  it('rejects unknown roles and missing content', () => {
    expect(() => parseChatData({ messages: [{ role: 'bot', content: 'Hi' }] })).toThrow(
      'messages[0].role must be one of: system, user, assistant'
    );
    expect(() => parseChatData({ messages: [{ role: 'user' }] })).toThrow('messages[0].content must be a string');
  });

  it('rejects annotations without a type', () => {
    expect(() => parseChatData({ messages: [{ role: 'user', content: 'Hi', annotations: [{ data: {} }] }] })).toThrow(
      'messages[0].annotations must have a string type'
    );
  });
});

describe('annotationToContent', () => {
  it('wraps CSV files in fenced blocks', () => {
    expect(annotationToContent(csvAnnotation)).toBe(
      'Use data from following CSV raw content\n```csv\nname,count\napples,3\n```'
    );
  });

  it('has nothing to add for other document files', () => {
    expect(annotationToContent(refAnnotation)).toBeNull();
  });

  it('warns about annotation types it does not support', () => {
    const logger = createTestLogger();
    const warn = jest.spyOn(logger, 'warn');

    expect(annotationToContent({ type: 'image', data: { url: 'x' } }, logger)).toBeNull();
    expect(warn).toHaveBeenCalledWith('The annotation image is not supported for generating context content');
  });
});

describe('conversation helpers', () => {
  const data: ChatData = {
    messages: [
      { role: 'user', content: 'Summarise this', annotations: [csvAnnotation, refAnnotation] },
      { role: 'assistant', content: 'Apples: 3' },
      { role: 'user', content: 'And pears?' },
    ],
  };

  it('adds the newest annotation content to the last message', () => {
    expect(getLastMessageContent(data)).toBe(
      'And pears?\nUse data from following CSV raw content\n```csv\nname,count\napples,3\n```'
    );
  });

  it('returns the last message alone without annotations', () => {
    expect(getLastMessageContent({ messages: [{ role: 'user', content: 'Plain' }] })).toBe('Plain');
  });

  it('returns every message but the last as history', () => {
    expect(getHistoryMessages(data)).toEqual([
      { role: 'user', content: 'Summarise this' },
      { role: 'assistant', content: 'Apples: 3' },
    ]);
  });

  it('collects referenced document ids once', () => {
    expect(getChatDocumentIds(data)).toEqual(['doc-1', 'doc-2', 'doc-3']);
  });
});
