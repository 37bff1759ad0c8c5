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
 * Document processor for chunking and text extraction
 * Handles document preparation for embedding
 *
 * @packageDocumentation
 */

import { randomUUID } from 'crypto';
import type { Logger } from 'winston';
import { IDocumentProcessor, IConfigService } from '../interfaces';
import { DocumentNode, SourceDocument } from '../models';

const MARKUP_TYPES = new Set(['md', 'markdown', 'html', 'htm', 'xml']);

/**
 * Service for processing documents into nodes
 * Follows Single Responsibility Principle
 */
export class DocumentProcessor implements IDocumentProcessor {
  private readonly logger: Logger;
  private readonly configService: IConfigService;
  private readonly createId: () => string;

  constructor(logger: Logger, configService: IConfigService, createId: () => string = randomUUID) {
    this.logger = logger;
    this.configService = configService;
    this.createId = createId;
  }

  /**
   * Chunk a document into nodes with overlap.
   * Sizes are counted in whitespace-separated words.
   */
  chunkDocument(document: SourceDocument): DocumentNode[] {
    const config = this.configService.getConfig();
    const chunkSize = config.chunkSize;
    const chunkOverlap = config.chunkOverlap;

    const format = typeof document.metadata.file_type === 'string' ? document.metadata.file_type : undefined;
    const cleanContent = this.extractText(document.text, format);

    if (!cleanContent) {
      this.logger.warn(`No content to chunk for document: ${document.id}`);
      return [];
    }

    const texts: string[] = [];
    const words = cleanContent.split(/\s+/);

    let currentIndex = 0;
    while (currentIndex < words.length) {
      texts.push(words.slice(currentIndex, currentIndex + chunkSize).join(' '));
      if (currentIndex + chunkSize >= words.length) {
        break;
      }
      // Move forward, accounting for overlap
      currentIndex += chunkSize - chunkOverlap;
    }

    const nodes = texts.map((text, chunkIndex) => ({
      id: this.createId(),
      refDocId: document.id,
      text,
      metadata: {
        ...document.metadata,
        chunk_index: chunkIndex,
        total_chunks: texts.length,
      },
    }));

    this.logger.debug(`Created ${nodes.length} nodes for ${document.id}`);

    return nodes;
  }

  /**
   * Extract clean text from content.
   * Markup formats lose tags, links and formatting; every format gets normalized whitespace.
   */
  extractText(content: string, format?: string): string {
    let text = content;

    if (format && MARKUP_TYPES.has(format)) {
      // Remove markdown code fences but keep the code
      text = text.replace(/```[^\n]*\n([\s\S]*?)```/g, '$1');
      text = text.replace(/`([^`]+)`/g, '$1');

      // Remove HTML tags
      text = text.replace(/<[^>]*>/g, ' ');

      // Remove markdown links but keep the text
      text = text.replace(/\[([^\]]+)\]\([^)]+\)/g, '$1');

      // Remove markdown headers
      text = text.replace(/^#+\s+/gm, '');

      // Remove markdown emphasis
      text = text.replace(/(\*\*|__|\*|~~)(\S[\s\S]*?)\1/g, '$2');
    }

    return text.replace(/\s+/g, ' ').trim();
  }

  /**
   * Estimate token count (rough approximation)
   */
  estimateTokens(text: string): number {
    const trimmed = text.trim();
    if (!trimmed) {
      return 0;
    }
    // Rough estimation: ~1.3 tokens per word
    return Math.ceil(trimmed.split(/\s+/).length * 1.3);
  }
}
