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
import { FetchError } from 'node-fetch';
import { ChatClient, ChatSession } from './ChatSession';
import { ChatIO, describeError, isExitCommand, runChatLoop, WELCOME } from './chatLoop';
import { DocChatApiError } from './api/DocChatApi';

const createIO = (answers: string[]) => {
  const output: string[] = [];
  const io: ChatIO = {
    question: async () => answers.shift() ?? 'exit',
    write: text => {
      output.push(text);
    },
  };
  return { io, output };
};

describe('runChatLoop', () => {
  it('streams answers with their cited sources until the user quits', async () => {
    const streamChat = jest.fn<ChatClient['streamChat']>().mockImplementation(async (_messages, handlers) => {
      handlers?.onToken?.('It is a tool ');
      handlers?.onToken?.('[citation:n1]().');
      return {
        content: 'It is a tool [citation:n1]().',
        sources: [{ id: 'n1', metadata: { file_name: 'guide.md' }, score: 0.9, text: 'A tool.', url: null }],
      };
    });
    const { io, output } = createIO(['', 'What is it?', 'QUIT']);

    await runChatLoop(new ChatSession({ streamChat }), io, ['What is this?']);

    expect(output.join('')).toBe(
      `${WELCOME}\nTry asking:\n  - What is this?\n\n` +
        'It is a tool [citation:n1]().\n\nSources:\n[1] guide.md\n\n' +
        'Exiting chat session.\n'
    );
    expect(streamChat).toHaveBeenCalledTimes(1);
  });

  it('reports a failed question and goes on', async () => {
    const streamChat = jest
      .fn<ChatClient['streamChat']>()
      .mockRejectedValueOnce(new DocChatApiError('Error in chat engine: boom', 500))
      .mockResolvedValueOnce({ content: 'Fine.', sources: [] });
    const { io, output } = createIO(['First?', 'Second?', 'exit']);

    await runChatLoop(new ChatSession({ streamChat }), io);

    expect(output.join('')).toBe(
      `${WELCOME}\n` + '\nServer error (500): Error in chat engine: boom\n\n' + '\n\n' + 'Exiting chat session.\n'
    );
  });
});

describe('isExitCommand', () => {
  it('accepts exit and quit in any case', () => {
    expect(isExitCommand(' Exit ')).toBe(true);
    expect(isExitCommand('quit')).toBe(true);
    expect(isExitCommand('exit now')).toBe(false);
  });
});

describe('describeError', () => {
  it('suggests a longer timeout on a read timeout', () => {
    expect(describeError(new FetchError('network timeout at: http://localhost:8000/api/chat', 'request-timeout'))).toBe(
      'ReadTimeout: The server took too long to respond. Try increasing OLLAMA_REQUEST_TIMEOUT'
    );
  });

  it('treats a stalled streamed answer as a read timeout', () => {
    expect(describeError(new FetchError('network timeout while reading http://localhost:8000/api/chat', 'body-timeout'))).toBe(
      'ReadTimeout: The server took too long to respond. Try increasing OLLAMA_REQUEST_TIMEOUT'
    );
  });

  it('describes server and connection errors', () => {
    expect(describeError(new DocChatApiError('Unexpected chat response'))).toBe('Server error: Unexpected chat response');
    expect(describeError(new Error('connect ECONNREFUSED'))).toBe(
      'An error occurred while requesting: connect ECONNREFUSED'
    );
  });
});
