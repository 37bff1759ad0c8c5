#!/usr/bin/env node
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

import 'dotenv/config';
import { createInterface } from 'readline/promises';
import { DocChatApi } from './api/DocChatApi';
import { ChatSession } from './ChatSession';
import { describeError, runChatLoop } from './chatLoop';
import { readCliConfig } from './config';

async function main(): Promise<void> {
  const { apiUrl, timeoutMs } = readCliConfig();
  const api = new DocChatApi(apiUrl, { timeoutMs });

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  // Ctrl+D ends the session like exit
  rl.once('close', () => {
    process.stdout.write('\n');
    process.exit(0);
  });

  let starterQuestions: string[] = [];
  try {
    starterQuestions = (await api.getConfig()).starterQuestions ?? [];
  } catch (error) {
    process.stdout.write(`Could not load starter questions. ${describeError(error)}\n`);
  }

  await runChatLoop(new ChatSession(api), {
    question: prompt => rl.question(prompt),
    write: text => {
      process.stdout.write(text);
    },
  }, starterQuestions);

  rl.close();
}

main().catch(error => {
  console.error(describeError(error));
  process.exit(1);
});
