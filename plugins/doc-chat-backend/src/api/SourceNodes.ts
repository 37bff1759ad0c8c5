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

import * as path from 'path';
import type { Logger } from 'winston';
import { DocChatConfig, NodeMetadata, SearchResult, SourceNode } from '../models';

export type SourceUrlOptions = Pick<DocChatConfig, 'fileServerUrlPrefix' | 'dataDir'>;

/**
 * Public link to the file a node came from.
 *
 * - `pipeline_id` set: `<prefix>/output/llamacloud/<pipeline_id>$<file_name>`
 * - `private` is "true": `<prefix>/output/uploaded/<file_name>`
 * - otherwise: `<prefix>/data/<file_path relative to the data directory>`
 *
 * Without a prefix or a file name the `URL` metadata entry is used, if any.
 */
export function getUrlFromMetadata(metadata: NodeMetadata, options: SourceUrlOptions, logger?: Logger): string | null {
  const urlPrefix = options.fileServerUrlPrefix;
  if (!urlPrefix) {
    logger?.warn("FILESERVER_URL_PREFIX is not set, source nodes won't link to the file server");
  }

  const fileName = metadata.file_name;
  if (urlPrefix && typeof fileName === 'string' && fileName) {
    const pipelineId = metadata.pipeline_id;
    if (pipelineId) {
      return `${urlPrefix}/output/llamacloud/${pipelineId}$${fileName}`;
    }

    if (metadata.private === 'true' || metadata.private === true) {
      return `${urlPrefix}/output/uploaded/${fileName}`;
    }

    const filePath = metadata.file_path;
    if (typeof filePath === 'string' && filePath) {
      const relativePath = path.relative(path.resolve(options.dataDir), filePath);
      return `${urlPrefix}/data/${relativePath.split(path.sep).join('/')}`;
    }
  }

  return typeof metadata.URL === 'string' ? metadata.URL : null;
}

export function toSourceNode(result: SearchResult, options: SourceUrlOptions, logger?: Logger): SourceNode {
  const { node, similarity } = result;
  return {
    id: node.id,
    metadata: node.metadata,
    score: Number.isFinite(similarity) ? similarity : null,
    text: node.text,
    url: getUrlFromMetadata(node.metadata, options, logger),
  };
}

export function toSourceNodes(results: SearchResult[], options: SourceUrlOptions, logger?: Logger): SourceNode[] {
  return results.map(result => toSourceNode(result, options, logger));
}
