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
 * Incremental parser for the chat data stream.
 * Each part is one line `<type>:<json>`; network chunks may split a line.
 *
 * @packageDocumentation
 */

import { SourceNode } from '../api/types';
import { isRecord, isSourceNode } from '../api/guards';

export type DataStreamPart =
  | { type: 'text'; value: string }
  | { type: 'sources'; nodes: SourceNode[] }
  | { type: 'data'; value: unknown }
  | { type: 'error'; message: string };

function sourcesOf(item: unknown): SourceNode[] | null {
  if (!isRecord(item) || item.type !== 'sources' || !isRecord(item.data) || !Array.isArray(item.data.nodes)) {
    return null;
  }
  return item.data.nodes.filter(isSourceNode);
}

/**
 * Decode one complete line. Unknown part types are ignored.
 */
export function parseDataStreamLine(line: string): DataStreamPart[] {
  const separator = line.indexOf(':');
  if (separator < 0) {
    return [];
  }

  const prefix = line.slice(0, separator);
  const value: unknown = JSON.parse(line.slice(separator + 1));

  switch (prefix) {
    case '0':
      return typeof value === 'string' ? [{ type: 'text', value }] : [];
    case '3':
      return [{ type: 'error', message: typeof value === 'string' ? value : JSON.stringify(value) }];
    case '8': {
      const items: unknown[] = Array.isArray(value) ? value : [value];
      return items.map((item): DataStreamPart => {
        const nodes = sourcesOf(item);
        return nodes ? { type: 'sources', nodes } : { type: 'data', value: item };
      });
    }
    default:
      return [];
  }
}

export class DataStreamParser {
  private buffer = '';

  /**
   * Add a chunk and return the parts of every line it completed
   */
  push(chunk: string): DataStreamPart[] {
    this.buffer += chunk;
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';
    return lines.filter(line => line.length > 0).flatMap(parseDataStreamLine);
  }

  /**
   * Parse whatever is left once the stream ended
   */
  flush(): DataStreamPart[] {
    const rest = this.buffer;
    this.buffer = '';
    return rest.length > 0 ? parseDataStreamLine(rest) : [];
  }
}
