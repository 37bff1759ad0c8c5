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
 * Doc Chat CLI
 *
 * Terminal client for the doc-chat API
 *
 * @packageDocumentation
 */

export * from './api/types';
export { DocChatApi, DocChatApiError, isTimeoutError } from './api/DocChatApi';
export type { DocChatApiOptions, FetchFn, StreamChatResult, StreamHandlers } from './api/DocChatApi';
export { DataStreamParser, parseDataStreamLine } from './stream/DataStreamParser';
export type { DataStreamPart } from './stream/DataStreamParser';
export { ChatSession } from './ChatSession';
export type { ChatClient } from './ChatSession';
export { extractCitations, formatSources, CITATION_PATTERN } from './citations';
export { runChatLoop, isExitCommand, describeError } from './chatLoop';
export type { ChatIO } from './chatLoop';
export { readCliConfig } from './config';
export type { CliConfig } from './config';
