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

import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { cosineSimilarity, InMemoryVectorStore, VECTOR_STORE_FILE } from './InMemoryVectorStore';
import { EmbeddingVector } from '../models';
import { createNode, createTestLogger } from '../testUtils';

const embedding = (id: string, vector: number[], refDocId = 'guide.md'): EmbeddingVector => ({
  id,
  vector,
  node: createNode(id, `text of ${id}`, { refDocId }),
});

describe('cosineSimilarity', () => {
  it('is 1 for parallel and 0 for orthogonal vectors', () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 3])).toBe(0);
  });

  it('is 0 when a vector has no length', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('rejects vectors of different sizes', () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow('Vectors must have the same length (1 vs 2)');
  });
});

describe('InMemoryVectorStore', () => {
  let storageDir: string;

  beforeEach(async () => {
    storageDir = await fs.mkdtemp(path.join(os.tmpdir(), 'doc-chat-storage-'));
  });

  afterEach(async () => {
    await fs.rm(storageDir, { recursive: true, force: true });
  });

  it('returns the top k nodes by similarity', async () => {
    const store = new InMemoryVectorStore(createTestLogger());
    await store.storeBatch([embedding('a', [1, 0]), embedding('b', [0, 1]), embedding('c', [1, 1])]);

    const results = await store.search([1, 0.1], 2);

    expect(results.map(result => result.node.id)).toEqual(['a', 'c']);
    expect(results[0].similarity).toBeGreaterThan(results[1].similarity);
  });

  it('restricts the search to the given documents', async () => {
    const store = new InMemoryVectorStore(createTestLogger());
    await store.storeBatch([embedding('a', [1, 0], 'one.md'), embedding('b', [0.9, 0.1], 'two.md')]);

    const results = await store.search([1, 0], 5, ['two.md']);

    expect(results.map(result => result.node.id)).toEqual(['b']);
  });

  it('replaces a vector stored under the same id and clears everything', async () => {
    const store = new InMemoryVectorStore(createTestLogger());
    await store.store(embedding('a', [1, 0]));
    await store.store(embedding('a', [0, 1]));

    expect(await store.count()).toBe(1);

    await store.clear();
    expect(await store.count()).toBe(0);
  });

  it('persists to the storage directory and loads back', async () => {
    const store = new InMemoryVectorStore(createTestLogger(), storageDir);
    await store.storeBatch([embedding('a', [1, 0]), embedding('b', [0, 1])]);
    await store.persist();

    const loaded = await InMemoryVectorStore.fromPersistDir(createTestLogger(), storageDir);

    expect(loaded).not.toBeNull();
    expect(await loaded?.count()).toBe(2);
    const results = await loaded?.search([0, 1], 1);
    expect(results?.[0].node).toEqual(createNode('b', 'text of b'));
  });

  it('loads nothing from an empty storage directory', async () => {
    await expect(InMemoryVectorStore.fromPersistDir(createTestLogger(), storageDir)).resolves.toBeNull();
  });

  it('rejects a file that is not a vector store', async () => {
    await fs.writeFile(path.join(storageDir, VECTOR_STORE_FILE), JSON.stringify({ docstore: {} }));

    await expect(InMemoryVectorStore.fromPersistDir(createTestLogger(), storageDir)).rejects.toThrow(
      `${path.join(storageDir, VECTOR_STORE_FILE)} is not a vector store file`
    );
  });
});
