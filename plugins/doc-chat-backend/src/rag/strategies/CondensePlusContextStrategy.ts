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

import { RAGContext } from '../types';
import { RAGStrategyName } from '../../models';
import { buildCondensePrompt } from '../prompts';
import { SimpleRAGStrategy } from './SimpleRAGStrategy';

/**
 * Rewrites a follow-up message into a standalone question before retrieval.
 * The answer is still generated for the message as the user wrote it.
 */
export class CondensePlusContextStrategy extends SimpleRAGStrategy {
  readonly name: RAGStrategyName = 'condense-plus-context';

  protected async resolveQuery(context: RAGContext): Promise<string> {
    const history = context.history ?? [];
    if (history.length === 0) {
      return context.query;
    }

    const model = context.model || this.configService.getConfig().defaultModel;
    const condensed = await this.llmService.chat(
      [{ role: 'user', content: buildCondensePrompt(history, context.query) }],
      model
    );

    const question = condensed.trim();
    this.logger.debug(`[${this.name}] Condensed question: ${question}`);
    return question || context.query;
  }
}
