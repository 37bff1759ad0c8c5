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

import { RAGServiceDependencies } from '../interfaces';
import { IRAGStrategy } from './types';
import { SimpleRAGStrategy } from './strategies/SimpleRAGStrategy';
import { CondensePlusContextStrategy } from './strategies/CondensePlusContextStrategy';

export * from './types';
export { SimpleRAGStrategy, CondensePlusContextStrategy };

/**
 * Picks the chat strategy named by RAG_STRATEGY
 */
export class RAGStrategyFactory {
  static create(dependencies: RAGServiceDependencies): IRAGStrategy {
    const strategy = dependencies.config.getConfig().ragStrategy;

    switch (strategy) {
      case 'simple':
        return new SimpleRAGStrategy(dependencies);
      case 'condense-plus-context':
      default:
        return new CondensePlusContextStrategy(dependencies);
    }
  }
}
