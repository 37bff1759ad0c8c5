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

import type { Logger } from 'winston';
import { IVectorStore, IVectorStoreProvider } from '../interfaces';
import { IndexNotFoundError } from '../errors';
import { InMemoryVectorStore } from './InMemoryVectorStore';

export const STORAGE_CACHE_TTL_MS = 5 * 60 * 1000;

/**
 * Serves the index persisted in the storage directory.
 * One global entry, reloaded from disk once it is older than the TTL, so a
 * new `generate` run shows up without restarting the server.
 */
export class StorageContextCache implements IVectorStoreProvider {
  private readonly logger: Logger;
  private readonly storageDir: string;
  private readonly ttlMs: number;
  private readonly now: () => number;

  private cached: { store: IVectorStore; loadedAt: number } | null = null;
  private pending: Promise<IVectorStore> | null = null;

  constructor(logger: Logger, storageDir: string, ttlMs = STORAGE_CACHE_TTL_MS, now: () => number = Date.now) {
    this.logger = logger;
    this.storageDir = storageDir;
    this.ttlMs = ttlMs;
    this.now = now;
  }

  async getVectorStore(): Promise<IVectorStore> {
    if (this.cached && this.now() - this.cached.loadedAt < this.ttlMs) {
      return this.cached.store;
    }

    // Concurrent requests share one load
    if (!this.pending) {
      this.pending = this.load().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  invalidate(): void {
    this.cached = null;
  }

  private async load(): Promise<IVectorStore> {
    this.logger.info(`Loading index from ${this.storageDir}...`);
    const store = await InMemoryVectorStore.fromPersistDir(this.logger, this.storageDir);
    if (!store) {
      throw new IndexNotFoundError();
    }
    this.cached = { store, loadedAt: this.now() };
    this.logger.info(`Finished loading index from ${this.storageDir}`);
    return store;
  }
}
