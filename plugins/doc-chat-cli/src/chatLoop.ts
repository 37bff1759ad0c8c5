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
 * Interactive question and answer loop
 *
 * @packageDocumentation
 */

import { ChatSession } from './ChatSession';
import { DocChatApiError, isTimeoutError } from './api/DocChatApi';
import { formatSources } from './citations';

export const WELCOME = `Hi, I'm your chat assistant allowing you to gain knowledge from your personal data.

Interactive chat session started. Type 'exit' or 'quit' to end.
`;

export const PROMPT = 'Ask your question: ';

const EXIT_COMMANDS = ['exit', 'quit'];

/**
 * Terminal the loop reads from and writes to
 */
export interface ChatIO {
  question(prompt: string): Promise<string>;
  write(text: string): void;
}

export function isExitCommand(input: string): boolean {
  return EXIT_COMMANDS.includes(input.trim().toLowerCase());
}

export function describeError(error: unknown): string {
  if (isTimeoutError(error)) {
    return 'ReadTimeout: The server took too long to respond. Try increasing OLLAMA_REQUEST_TIMEOUT';
  }
  if (error instanceof DocChatApiError) {
    return error.status ? `Server error (${error.status}): ${error.message}` : `Server error: ${error.message}`;
  }
  return `An error occurred while requesting: ${error instanceof Error ? error.message : String(error)}`;
}

/**
 * Ask questions until the user types exit or quit. A failed question is
 * reported and the loop goes on.
 */
export async function runChatLoop(session: ChatSession, io: ChatIO, starterQuestions: string[] = []): Promise<void> {
  io.write(WELCOME);
  if (starterQuestions.length > 0) {
    io.write(`\nTry asking:\n${starterQuestions.map(question => `  - ${question}`).join('\n')}\n`);
  }
  io.write('\n');

  for (;;) {
    const question = (await io.question(PROMPT)).trim();
    if (!question) {
      continue;
    }
    if (isExitCommand(question)) {
      io.write('Exiting chat session.\n');
      return;
    }

    try {
      const result = await session.ask(question, { onToken: token => io.write(token) });
      io.write('\n');

      const sources = formatSources(result.content, result.sources);
      if (sources) {
        io.write(`\nSources:\n${sources}\n`);
      }
    } catch (error) {
      io.write(`\n${describeError(error)}\n`);
    }
    io.write('\n');
  }
}
