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

import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DocumentProcessor } from './DocumentProcessor';
import { FileDocumentLoader } from './FileDocumentLoader';
import { createTestConfig, createTestLogger } from '../testUtils';

describe('FileDocumentLoader', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'doc-chat-data-'));
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  const write = async (relativePath: string, content: string) => {
    const file = path.join(dataDir, relativePath);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, content);
  };

  const createLoader = (dir = dataDir) => {
    const logger = createTestLogger();
    return { loader: new FileDocumentLoader(logger, createTestConfig({ DATA_DIR: dir })), logger };
  };

  it('loads supported files recursively with their relative path as id', async () => {
    await write('guide.md', 'Guide text');
    await write('sub/notes.txt', 'Notes');
    await write('.hidden.txt', 'secret');
    await write('image.png', 'not text');

    const { loader } = createLoader();
    const documents = await loader.loadDocuments();

    expect(documents.map(document => document.id)).toEqual(['guide.md', 'sub/notes.txt']);
    expect(documents[0].text).toBe('Guide text');
    expect(documents[0].metadata).toEqual({
      file_name: 'guide.md',
      file_path: path.join(dataDir, 'guide.md'),
      file_type: 'md',
      file_size: 10,
      creation_date: expect.stringMatching(/^\d{4}-\d{2}-\d{2}$/),
      last_modified_date: expect.stringMatching(/^\d{4}-\d{2}-\d{2}$/),
    });
  });

  it('reads a pdf through its text sidecar, one document per page', async () => {
    await write('report.pdf', '%PDF-1.4');
    await write('report.txt', 'Page one\fPage two\f\f');

    const { loader } = createLoader();
    const documents = await loader.loadDocuments();

    expect(documents.map(document => [document.id, document.text, document.metadata.page_label])).toEqual([
      ['report.pdf', 'Page one', '1'],
      ['report.pdf', 'Page two', '2'],
    ]);
    expect(documents[0].metadata.file_type).toBe('pdf');
    expect(documents[0].metadata.file_size).toBe(8);
  });

  it('gives the nodes of every page the file as their document', async () => {
    await write('report.pdf', '%PDF-1.4');
    await write('report.txt', 'Page one\fPage two');

    const { loader, logger } = createLoader();
    const processor = new DocumentProcessor(logger, createTestConfig({ DATA_DIR: dataDir }));
    const nodes = (await loader.loadDocuments()).flatMap(document => processor.chunkDocument(document));

    expect(nodes.map(node => [node.refDocId, node.text, node.metadata.page_label])).toEqual([
      ['report.pdf', 'Page one', '1'],
      ['report.pdf', 'Page two', '2'],
    ]);
  });

  it('skips a pdf without sidecar', async () => {
    await write('scan.pdf', '%PDF-1.4');

    const { loader, logger } = createLoader();
    const warn = jest.spyOn(logger, 'warn');

    await expect(loader.loadDocuments()).resolves.toEqual([]);
    expect(warn).toHaveBeenCalledWith(`Skipping ${path.join(dataDir, 'scan.pdf')}: no text sidecar scan.txt found`);
  });

  it('returns nothing when the data directory does not exist', async () => {
    const missing = path.join(dataDir, 'missing');
    const { loader, logger } = createLoader(missing);
    const warn = jest.spyOn(logger, 'warn');

    await expect(loader.loadDocuments()).resolves.toEqual([]);
    expect(warn).toHaveBeenCalledWith(`Data directory ${missing} does not exist, no documents loaded`);
  });
});
