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
import { extractCitations, formatSourceLine, formatSources } from './citations';
import { SourceNode } from './api/types';

const manual: SourceNode = {
  id: 'node-a',
  metadata: { file_name: 'manual.pdf', page_label: 3 },
  score: 0.8,
  text: 'Run the installer.',
  url: 'http://localhost:8000/api/files/data/manual.pdf',
};
const guide: SourceNode = { id: 'node-b', metadata: { file_name: 'guide.md' }, score: 0.7, text: 'Open it.', url: null };

describe('extractCitations', () => {
  it('returns each cited node id once, in order', () => {
    expect(
      extractCitations('First [citation:node-b](). Then [citation:node-a]() and again [citation:node-b]().')
    ).toEqual(['node-b', 'node-a']);
  });

  it('ignores markers that are not citations', () => {
    expect(extractCitations('See [citation:node-a](http://x) or [citation: node-a]()')).toEqual([]);
  });
});

describe('formatSourceLine', () => {
  it('names the file, page and link', () => {
    expect(formatSourceLine(manual, 1)).toBe('[1] manual.pdf, page 3 - http://localhost:8000/api/files/data/manual.pdf');
  });

  it('uses the node id without a file name', () => {
    expect(formatSourceLine({ ...guide, metadata: {} }, 2)).toBe('[2] node-b');
  });
});

describe('formatSources', () => {
  it('lists the cited nodes it knows', () => {
    expect(formatSources('Open it [citation:node-b](), run it [citation:node-x]().', [manual, guide])).toBe(
      '[1] guide.md'
    );
  });

  it('is empty without citations', () => {
    expect(formatSources('No citations here.', [manual])).toBe('');
  });
});
