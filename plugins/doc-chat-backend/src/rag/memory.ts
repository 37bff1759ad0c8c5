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

import { ChatMessage } from '../models';

/**
 * Keep the most recent messages that fit in `tokenLimit`.
 * The kept history never starts with an assistant message.
 */
export function fitHistoryToTokenLimit(
  history: ChatMessage[],
  tokenLimit: number,
  estimateTokens: (text: string) => number
): ChatMessage[] {
  const kept: ChatMessage[] = [];
  let used = 0;

  for (let i = history.length - 1; i >= 0; i--) {
    const tokens = estimateTokens(history[i].content);
    if (used + tokens > tokenLimit) {
      break;
    }
    kept.unshift(history[i]);
    used += tokens;
  }

  while (kept.length > 0 && kept[0].role === 'assistant') {
    kept.shift();
  }

  return kept;
}
