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
import { CondensePlusContextStrategy } from './CondensePlusContextStrategy';
import { SimpleRAGStrategy } from './SimpleRAGStrategy';
import { RAGStrategyFactory } from '..';
import { buildCondensePrompt } from '../prompts';
import { ChatMessage } from '../../models';
import { createRAGDependencies } from '../../testUtils';

const history: ChatMessage[] = [
  { role: 'user', content: 'What is the CLI?' },
  { role: 'assistant', content: 'A command line tool.' },
];

describe('CondensePlusContextStrategy', () => {
  it('retrieves with the message as is when there is no history', async () => {
    const deps = createRAGDependencies();

    await new CondensePlusContextStrategy(deps).answer({ query: 'What is the CLI?' });

    expect(deps.llmService.chat).toHaveBeenCalledTimes(1);
    expect(deps.llmService.generateEmbeddings).toHaveBeenCalledWith(['What is the CLI?']);
  });

  it('retrieves with the condensed question and answers the original message', async () => {
    const deps = createRAGDependencies();
    deps.llmService.chat.mockResolvedValueOnce('  How do I install the CLI?  ').mockResolvedValueOnce('Use npm.');

    const response = await new CondensePlusContextStrategy(deps).answer({ query: 'How do I install it?', history });

    expect(deps.llmService.chat.mock.calls[0]).toEqual([
      [{ role: 'user', content: buildCondensePrompt(history, 'How do I install it?') }],
      'llama3.2',
    ]);
    expect(deps.llmService.generateEmbeddings).toHaveBeenCalledWith(['How do I install the CLI?']);
    expect(deps.llmService.chat.mock.calls[1][0]).toEqual([...history, { role: 'user', content: 'How do I install it?' }]);
    expect(response.answer).toBe('Use npm.');
  });

  it('keeps the message when the model returns nothing', async () => {
    const deps = createRAGDependencies();
    deps.llmService.chat.mockResolvedValueOnce('   ');

    await new CondensePlusContextStrategy(deps).answer({ query: 'How do I install it?', history });

    expect(deps.llmService.generateEmbeddings).toHaveBeenCalledWith(['How do I install it?']);
  });
});

describe('RAGStrategyFactory', () => {
  it('creates the strategy named by RAG_STRATEGY', () => {
    expect(RAGStrategyFactory.create(createRAGDependencies({ RAG_STRATEGY: 'simple' }))).toBeInstanceOf(
      SimpleRAGStrategy
    );
    expect(RAGStrategyFactory.create(createRAGDependencies()).name).toBe('condense-plus-context');
  });
});
