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

/**
 * Factory for creating vector store implementations
 * Implements Factory Pattern for vector store selection
 *
 * @packageDocumentation
 */

import * as path from 'path';
import type { Logger } from 'winston';
import { IVectorStore, IVectorStoreProvider } from '../interfaces';
import { ConfigService } from './ConfigService';
import { InMemoryVectorStore } from './InMemoryVectorStore';
import { PgVectorStore } from './PgVectorStore';
import { StorageContextCache } from './StorageContextCache';

/**
 * `serve` reads the generated index, `generate` writes a new one
 */
export type VectorStoreMode = 'serve' | 'generate';

export interface VectorStoreHandle {
  provider: IVectorStoreProvider;
  close(): Promise<void>;
}

/**
 * Provider for a store that lives for the whole process
 */
export class FixedVectorStoreProvider implements IVectorStoreProvider {
  private readonly store: IVectorStore;

  constructor(store: IVectorStore) {
    this.store = store;
  }

  async getVectorStore(): Promise<IVectorStore> {
    return this.store;
  }

  invalidate(): void {
    // Always current
  }
}

/**
 * Factory class for creating vector store instances
 * Follows Factory Pattern and Open/Closed Principle
 *
 * Usage:
 * ```typescript
 * const { provider, close } = await VectorStoreFactory.create(configService, logger, 'serve');
 * ```
 */
export class VectorStoreFactory {
  /**
   * Create a vector store provider based on configuration.
   * A configured PostgreSQL store that cannot be initialized is an error.
   */
  static async create(config: ConfigService, logger: Logger, mode: VectorStoreMode): Promise<VectorStoreHandle> {
    const vectorStoreType = config.getVectorStoreType();

    logger.info(`Creating vector store: ${vectorStoreType} (${mode})`);

    switch (vectorStoreType) {
      case 'postgresql': {
        const store = new PgVectorStore(logger, config.getPostgresConfig());
        await store.initialize();
        return {
          provider: new FixedVectorStoreProvider(store),
          close: () => store.close(),
        };
      }

      case 'memory':
      default: {
        const storageDir = path.resolve(config.getConfig().storageDir);
        const provider =
          mode === 'serve'
            ? new StorageContextCache(logger, storageDir)
            : new FixedVectorStoreProvider(new InMemoryVectorStore(logger, storageDir));
        return {
          provider,
          close: async () => undefined,
        };
      }
    }
  }
}
