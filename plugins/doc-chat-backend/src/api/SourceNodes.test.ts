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
import * as path from 'path';
import { getUrlFromMetadata, toSourceNode } from './SourceNodes';
import { createNode, createResult, createTestLogger } from '../testUtils';

const options = { fileServerUrlPrefix: 'http://localhost:8000/api/files', dataDir: 'data' };

describe('getUrlFromMetadata', () => {
  it('links files of the data directory by their relative path', () => {
    const filePath = path.resolve('data', 'guides', 'install.md');

    expect(getUrlFromMetadata({ file_name: 'install.md', file_path: filePath }, options)).toBe(
      'http://localhost:8000/api/files/data/guides/install.md'
    );
  });

  it('links uploaded private files', () => {
    expect(getUrlFromMetadata({ file_name: 'notes.pdf', private: 'true' }, options)).toBe(
      'http://localhost:8000/api/files/output/uploaded/notes.pdf'
    );
  });

  it('links pipeline files by pipeline id', () => {
    expect(getUrlFromMetadata({ file_name: 'notes.pdf', pipeline_id: 'p1' }, options)).toBe(
      'http://localhost:8000/api/files/output/llamacloud/p1$notes.pdf'
    );
  });

  it('falls back to the URL entry', () => {
    expect(getUrlFromMetadata({ URL: 'https://example.com/page' }, options)).toBe('https://example.com/page');
    expect(getUrlFromMetadata({ file_name: 'notes.pdf' }, options)).toBeNull();
  });

  it('warns when no prefix is configured', () => {
    const logger = createTestLogger();
    const warn = jest.spyOn(logger, 'warn');

    expect(getUrlFromMetadata({ file_name: 'install.md', file_path: '/tmp/install.md' }, { dataDir: 'data' }, logger)).toBeNull();
    expect(warn).toHaveBeenCalledWith("FILESERVER_URL_PREFIX is not set, source nodes won't link to the file server");
  });
});

describe('toSourceNode', () => {
  it('exposes the node with its score and link', () => {
    const node = createNode('n1', 'Run the installer.', { metadata: { file_name: 'guide.md', URL: 'https://example.com/guide' } });

    expect(toSourceNode(createResult(node, 0.42), options)).toEqual({
      id: 'n1',
      metadata: { file_name: 'guide.md', URL: 'https://example.com/guide' },
      score: 0.42,
      text: 'Run the installer.',
      url: 'https://example.com/guide',
    });
  });

  it('has no score for a similarity that is not a number', () => {
    expect(toSourceNode(createResult(createNode('n1', 'text'), NaN), options).score).toBeNull();
  });
});
