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

export interface CliConfig {
  apiUrl: string;
  /** Milliseconds */
  timeoutMs: number;
}

export const DEFAULT_TIMEOUT_SECONDS = 30;

function positiveNumber(raw: string | undefined): number | undefined {
  if (!raw || !raw.trim()) {
    return undefined;
  }
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 ? value : undefined;
}

/**
 * The API lives on the local server unless DOC_CHAT_API_URL says otherwise.
 * The server's OLLAMA_REQUEST_TIMEOUT bounds each request.
 */
export function readCliConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const port = positiveNumber(env.APP_PORT) ?? 8000;
  const timeoutSeconds = positiveNumber(env.OLLAMA_REQUEST_TIMEOUT) ?? DEFAULT_TIMEOUT_SECONDS;

  return {
    apiUrl: env.DOC_CHAT_API_URL?.trim() || `http://localhost:${port}/api`,
    timeoutMs: timeoutSeconds * 1000,
  };
}
