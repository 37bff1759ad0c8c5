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

import { SourceNode } from './api/types';

/**
 * Marker the model appends after a sentence taken from a node: `[citation:<node_id>]()`
 */
export const CITATION_PATTERN = /\[citation:([^\]\s]+)\]\(\)/g;

/**
 * Cited node ids, in the order they first appear
 */
export function extractCitations(text: string): string[] {
  const ids: string[] = [];
  for (const match of text.matchAll(CITATION_PATTERN)) {
    if (!ids.includes(match[1])) {
      ids.push(match[1]);
    }
  }
  return ids;
}

export function formatSourceLine(node: SourceNode, position: number): string {
  const fileName = typeof node.metadata.file_name === 'string' ? node.metadata.file_name : node.id;
  const page = node.metadata.page_label;

  let line = `[${position}] ${fileName}`;
  if (typeof page === 'string' || typeof page === 'number') {
    line += `, page ${page}`;
  }
  if (node.url) {
    line += ` - ${node.url}`;
  }
  return line;
}

/**
 * One line per source node cited in the answer. Empty when nothing known was cited.
 */
export function formatSources(answer: string, nodes: SourceNode[]): string {
  const byId = new Map(nodes.map(node => [node.id, node]));
  const cited = extractCitations(answer)
    .map(id => byId.get(id))
    .filter((node): node is SourceNode => node !== undefined);

  return cited.map((node, index) => formatSourceLine(node, index + 1)).join('\n');
}
