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
 * Maps environment variables onto the configuration tree read by ConfigService
 *
 * @packageDocumentation
 */

import { ConfigReader } from '@backstage/config';
import { ConfigError } from '../errors';

type EnvValueType = 'string' | 'number' | 'boolean';

interface EnvBinding {
  env: string;
  path: string;
  type: EnvValueType;
}

type ConfigValue = string | number | boolean | ConfigTree;

interface ConfigTree {
  [key: string]: ConfigValue;
}

export const ENV_BINDINGS: readonly EnvBinding[] = [
  { env: 'MODEL_PROVIDER', path: 'docChat.modelProvider', type: 'string' },
  { env: 'MODEL', path: 'docChat.model', type: 'string' },
  { env: 'EMBEDDING_MODEL', path: 'docChat.embedding.model', type: 'string' },
  { env: 'EMBEDDING_DIM', path: 'docChat.embedding.dim', type: 'number' },
  { env: 'OLLAMA_BASE_URL', path: 'docChat.ollama.baseUrl', type: 'string' },
  { env: 'OLLAMA_REQUEST_TIMEOUT', path: 'docChat.ollama.requestTimeout', type: 'number' },
  { env: 'APP_HOST', path: 'app.host', type: 'string' },
  { env: 'APP_PORT', path: 'app.port', type: 'number' },
  { env: 'ENVIRONMENT', path: 'app.environment', type: 'string' },
  { env: 'LOG_LEVEL', path: 'app.logLevel', type: 'string' },
  { env: 'RAG_STRATEGY', path: 'docChat.rag.strategy', type: 'string' },
  { env: 'TOP_K', path: 'docChat.rag.topK', type: 'number' },
  { env: 'CHUNK_SIZE', path: 'docChat.chunkSize', type: 'number' },
  { env: 'CHUNK_OVERLAP', path: 'docChat.chunkOverlap', type: 'number' },
  { env: 'CONTEXT_WINDOW', path: 'docChat.contextWindow', type: 'number' },
  { env: 'SYSTEM_PROMPT', path: 'docChat.prompts.system', type: 'string' },
  { env: 'SYSTEM_CITATION_PROMPT', path: 'docChat.prompts.citation', type: 'string' },
  { env: 'DATA_DIR', path: 'docChat.dataDir', type: 'string' },
  { env: 'STORAGE_DIR', path: 'docChat.storageDir', type: 'string' },
  { env: 'FILESERVER_URL_PREFIX', path: 'docChat.fileServerUrlPrefix', type: 'string' },
  { env: 'CONVERSATION_STARTERS', path: 'docChat.conversationStarters', type: 'string' },
  { env: 'VECTOR_STORE', path: 'docChat.vectorStore.type', type: 'string' },
  { env: 'POSTGRES_HOST', path: 'docChat.vectorStore.postgresql.host', type: 'string' },
  { env: 'POSTGRES_PORT', path: 'docChat.vectorStore.postgresql.port', type: 'number' },
  { env: 'POSTGRES_DB', path: 'docChat.vectorStore.postgresql.database', type: 'string' },
  { env: 'POSTGRES_USER', path: 'docChat.vectorStore.postgresql.user', type: 'string' },
  { env: 'POSTGRES_PASSWORD', path: 'docChat.vectorStore.postgresql.password', type: 'string' },
  { env: 'POSTGRES_SSL', path: 'docChat.vectorStore.postgresql.ssl', type: 'boolean' },
  { env: 'POSTGRES_MAX_CONNECTIONS', path: 'docChat.vectorStore.postgresql.maxConnections', type: 'number' },
];

function convert(binding: EnvBinding, raw: string): string | number | boolean {
  switch (binding.type) {
    case 'number': {
      const value = Number(raw);
      if (!Number.isFinite(value)) {
        throw new ConfigError(`${binding.env} must be a number, got '${raw}'`);
      }
      return value;
    }
    case 'boolean': {
      const normalized = raw.trim().toLowerCase();
      if (['true', '1', 'yes'].includes(normalized)) return true;
      if (['false', '0', 'no'].includes(normalized)) return false;
      throw new ConfigError(`${binding.env} must be a boolean, got '${raw}'`);
    }
    default:
      return raw;
  }
}

function assign(tree: ConfigTree, path: string, value: string | number | boolean): void {
  const segments = path.split('.');
  let node = tree;
  for (const segment of segments.slice(0, -1)) {
    const next = node[segment];
    if (typeof next === 'object') {
      node = next;
    } else {
      const created: ConfigTree = {};
      node[segment] = created;
      node = created;
    }
  }
  node[segments[segments.length - 1]] = value;
}

/**
 * Build the configuration tree from environment variables.
 * Unset and empty variables are left out so defaults apply.
 */
export function envToConfigData(env: NodeJS.ProcessEnv): ConfigTree {
  const tree: ConfigTree = {};
  for (const binding of ENV_BINDINGS) {
    const raw = env[binding.env];
    if (raw === undefined || raw.trim() === '') {
      continue;
    }
    assign(tree, binding.path, convert(binding, raw));
  }
  return tree;
}

export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigReader {
  return new ConfigReader(envToConfigData(env), 'env');
}
