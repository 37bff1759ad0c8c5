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

import { describe, expect, it } from '@jest/globals';
import { fitHistoryToTokenLimit } from './memory';
import { ChatMessage } from '../models';

const countWords = (text: string): number => text.split(' ').length;

const history: ChatMessage[] = [
  { role: 'user', content: 'one two three' },
  { role: 'assistant', content: 'four five' },
  { role: 'user', content: 'six' },
  { role: 'assistant', content: 'seven eight' },
];

describe('fitHistoryToTokenLimit', () => {
  it('keeps everything that fits', () => {
    expect(fitHistoryToTokenLimit(history, 100, countWords)).toEqual(history);
  });

  it('keeps the newest messages and drops a leading assistant reply', () => {
    // 'seven eight' + 'six' + 'four five' fit in 5, the reply at the front goes
    expect(fitHistoryToTokenLimit(history, 5, countWords)).toEqual([
      { role: 'user', content: 'six' },
      { role: 'assistant', content: 'seven eight' },
    ]);
  });

  it('stops at the first message that does not fit', () => {
    expect(fitHistoryToTokenLimit(history, 1, countWords)).toEqual([]);
  });

  it('returns nothing for an empty history', () => {
    expect(fitHistoryToTokenLimit([], 10, countWords)).toEqual([]);
  });
});
