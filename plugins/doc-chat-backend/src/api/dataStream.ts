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
 * Line encoding of the streaming chat response (Vercel AI data stream).
 * Every part is `<prefix><json>\n`.
 *
 * @packageDocumentation
 */

import { SourceNode } from '../models';

export const TEXT_PREFIX = '0:';
export const ERROR_PREFIX = '3:';
export const DATA_PREFIX = '8:';

export interface SourcesData {
  type: 'sources';
  data: { nodes: SourceNode[] };
}

export function convertText(token: string): string {
  return `${TEXT_PREFIX}${JSON.stringify(token)}\n`;
}

export function convertData(data: SourcesData): string {
  return `${DATA_PREFIX}[${JSON.stringify(data)}]\n`;
}

export function convertError(message: string): string {
  return `${ERROR_PREFIX}${JSON.stringify(message)}\n`;
}

export function sourcesData(nodes: SourceNode[]): SourcesData {
  return { type: 'sources', data: { nodes } };
}
