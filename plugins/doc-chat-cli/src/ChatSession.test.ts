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
import { ChatClient, ChatSession } from './ChatSession';

const node = { id: 'n1', metadata: { file_name: 'guide.md' }, score: 0.9, text: 'Install.', url: null };

const createClient = (): jest.Mocked<ChatClient> => ({
  streamChat: jest.fn<ChatClient['streamChat']>(),
});

describe('ChatSession', () => {
  it('sends the whole conversation and keeps the answer', async () => {
    const client = createClient();
    client.streamChat
      .mockResolvedValueOnce({ content: 'A tool.', sources: [node] })
      .mockResolvedValueOnce({ content: 'Use npm.', sources: [] });
    const session = new ChatSession(client);

    await session.ask('What is it?');
    await session.ask('How do I install it?');

    expect(client.streamChat.mock.calls[1][0]).toEqual([
      { role: 'user', content: 'What is it?' },
      { role: 'assistant', content: 'A tool.' },
      { role: 'user', content: 'How do I install it?' },
    ]);
    expect(session.history).toHaveLength(4);
    expect(session.lastSources).toEqual([]);
    expect(session.loading).toBe(false);
  });

  it('keeps the question and records the error when the request fails', async () => {
    const client = createClient();
    client.streamChat.mockRejectedValue(new Error('connect ECONNREFUSED'));
    const session = new ChatSession(client);

    await expect(session.ask('Hello?')).rejects.toThrow('connect ECONNREFUSED');

    expect(session.error).toBe('connect ECONNREFUSED');
    expect(session.loading).toBe(false);
    expect(session.history).toEqual([{ role: 'user', content: 'Hello?' }]);
  });

  it('starts over after a reset', async () => {
    const client = createClient();
    client.streamChat.mockResolvedValue({ content: 'A tool.', sources: [node] });
    const session = new ChatSession(client);
    await session.ask('What is it?');

    session.reset();

    expect(session.history).toEqual([]);
    expect(session.lastSources).toEqual([]);
  });
});
