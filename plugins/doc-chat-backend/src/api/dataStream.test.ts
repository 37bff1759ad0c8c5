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
import { convertData, convertError, convertText, sourcesData } from './dataStream';

describe('data stream parts', () => {
  it('encodes text tokens as JSON strings', () => {
    expect(convertText('Hello "world"\n')).toBe('0:"Hello \\"world\\"\\n"\n');
    expect(convertText('')).toBe('0:""\n');
  });

  it('encodes errors', () => {
    expect(convertError('Error in chat engine: boom')).toBe('3:"Error in chat engine: boom"\n');
  });

  it('wraps data in an array', () => {
    const part = convertData(
      sourcesData([{ id: 'n1', metadata: { file_name: 'guide.md' }, score: 0.5, text: 'Install.', url: null }])
    );

    expect(part).toBe(
      '8:[{"type":"sources","data":{"nodes":[{"id":"n1","metadata":{"file_name":"guide.md"},"score":0.5,"text":"Install.","url":null}]}}]\n'
    );
  });
});
