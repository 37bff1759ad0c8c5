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
 * File loader for the data directory
 * Reads every supported file below DATA_DIR into source documents
 *
 * @packageDocumentation
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { Logger } from 'winston';
import { IConfigService, IDocumentLoader } from '../interfaces';
import { NodeMetadata, SourceDocument } from '../models';

export const TEXT_EXTENSIONS = new Set([
  '.txt',
  '.md',
  '.markdown',
  '.csv',
  '.json',
  '.html',
  '.htm',
  '.xml',
  '.yaml',
  '.yml',
]);

/**
 * Page separator emitted by text extractors such as pdftotext
 */
const PAGE_BREAK = '\f';

function sidecarPath(pdfPath: string): string {
  return pdfPath.slice(0, -path.extname(pdfPath).length) + '.txt';
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Loads files from the data directory.
 * The path relative to the data directory is the document id; a file with
 * form feeds becomes one document per page.
 */
export class FileDocumentLoader implements IDocumentLoader {
  private readonly logger: Logger;
  private readonly configService: IConfigService;

  constructor(logger: Logger, configService: IConfigService) {
    this.logger = logger;
    this.configService = configService;
  }

  async loadDocuments(): Promise<SourceDocument[]> {
    const dataDir = path.resolve(this.configService.getConfig().dataDir);

    let files: string[];
    try {
      files = await this.listFiles(dataDir);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        this.logger.warn(`Data directory ${dataDir} does not exist, no documents loaded`);
        return [];
      }
      this.logger.error(`Failed to read data directory ${dataDir}: ${error}`);
      throw error;
    }

    // Sidecar texts are read as part of their PDF
    const sidecars = new Set(
      files.filter(file => path.extname(file).toLowerCase() === '.pdf').map(file => sidecarPath(file))
    );

    const documents: SourceDocument[] = [];
    for (const file of files.filter(candidate => !sidecars.has(candidate)).sort()) {
      documents.push(...(await this.loadFile(dataDir, file)));
    }

    this.logger.info(`Loaded ${documents.length} documents from ${files.length} files in ${dataDir}`);
    return documents;
  }

  private async listFiles(dir: string): Promise<string[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    const files: string[] = [];

    for (const entry of entries) {
      if (entry.name.startsWith('.')) {
        continue;
      }
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        files.push(...(await this.listFiles(fullPath)));
      } else if (entry.isFile()) {
        files.push(fullPath);
      }
    }

    return files;
  }

  private async loadFile(dataDir: string, filePath: string): Promise<SourceDocument[]> {
    const extension = path.extname(filePath).toLowerCase();
    const textPath = await this.resolveTextPath(filePath, extension);
    if (!textPath) {
      return [];
    }

    try {
      const [text, stats] = await Promise.all([fs.readFile(textPath, 'utf8'), fs.stat(filePath)]);
      const id = path.relative(dataDir, filePath).split(path.sep).join('/');
      const baseMetadata: NodeMetadata = {
        file_name: path.basename(filePath),
        file_path: filePath,
        file_type: extension.slice(1),
        file_size: stats.size,
        creation_date: stats.birthtime.toISOString().slice(0, 10),
        last_modified_date: stats.mtime.toISOString().slice(0, 10),
      };

      const pages = text.split(PAGE_BREAK);
      if (pages.length === 1) {
        return [{ id, text, metadata: baseMetadata }];
      }

      return pages
        .map((pageText, index) => ({
          id,
          text: pageText,
          metadata: { ...baseMetadata, page_label: String(index + 1) },
        }))
        .filter(page => page.text.trim().length > 0);
    } catch (error) {
      this.logger.error(`Failed to read ${filePath}: ${error}`);
      throw error;
    }
  }

  /**
   * PDFs are read through a sidecar text file next to them
   */
  private async resolveTextPath(filePath: string, extension: string): Promise<string | null> {
    if (TEXT_EXTENSIONS.has(extension)) {
      return filePath;
    }

    if (extension === '.pdf') {
      const sidecar = sidecarPath(filePath);
      try {
        await fs.access(sidecar);
        return sidecar;
      } catch {
        this.logger.warn(`Skipping ${filePath}: no text sidecar ${path.basename(sidecar)} found`);
        return null;
      }
    }

    this.logger.debug(`Skipping unsupported file ${filePath}`);
    return null;
  }
}
