/**
 * Multi-query interactive mode: one agent, queries read until quit or the
 * end of input. A failing query is reported and the session goes on.
 */

import { errorMessage } from '@taskloop/todo-contracts';
import type { ProcessResult, TaskloopAgent, TodosSummary } from '@taskloop/todo-core';
import { formatResult } from './format.js';

export type SessionInput =
  | { type: 'skip' }
  | { type: 'exit' }
  | { type: 'help' }
  | { type: 'stats' }
  | { type: 'query'; text: string };

const EXIT_COMMANDS = new Set(['quit', 'exit']);
const HELP_COMMANDS = new Set(['help', '?']);
const STATS_COMMANDS = new Set(['stats']);

export function classifySessionInput(input: string): SessionInput {
  const text = input.trim();
  if (!text) {
    return { type: 'skip' };
  }
  const command = text.toLowerCase();
  if (EXIT_COMMANDS.has(command)) {
    return { type: 'exit' };
  }
  if (HELP_COMMANDS.has(command)) {
    return { type: 'help' };
  }
  if (STATS_COMMANDS.has(command)) {
    return { type: 'stats' };
  }
  return { type: 'query', text };
}

export function formatSessionHelp(): string[] {
  return [
    '',
    '📚 Interactive mode commands:',
    '- Enter any query to process it',
    "- 'stats' - Show todo statistics for the last query",
    "- 'help' - Show this help",
    "- 'quit' or 'exit' - Leave interactive mode",
  ];
}

export function formatSessionStats({ statistics }: TodosSummary): string[] {
  return [
    '',
    '📊 Current agent statistics:',
    `- Total todos: ${statistics.total}`,
    `- Completed: ${statistics.completed}`,
    `- Failed: ${statistics.failed}`,
    `- Pending: ${statistics.pending}`,
  ];
}

export interface InteractiveSessionDeps {
  agent: Pick<TaskloopAgent, 'processQuery' | 'todosSummary'>;
  /** Resolves to undefined when the input has ended */
  ask: (prompt: string) => Promise<string | undefined>;
  write: (line: string) => void;
  afterQuery?: (outcome: ProcessResult) => Promise<void>;
}

export async function runInteractiveSession({ agent, ask, write, afterQuery }: InteractiveSessionDeps): Promise<void> {
  write('🤖 taskloop interactive mode');
  write("Type 'quit' or 'exit' to stop, 'help' for commands.");
  write('-'.repeat(50));

  for (;;) {
    const line = await ask('\n📝 Enter your query: ');
    if (line === undefined) {
      break;
    }

    const input = classifySessionInput(line);
    if (input.type === 'exit') {
      break;
    }
    switch (input.type) {
      case 'skip':
        continue;
      case 'help':
        formatSessionHelp().forEach(write);
        continue;
      case 'stats':
        formatSessionStats(agent.todosSummary()).forEach(write);
        continue;
      case 'query':
        write(`\n🔄 Processing: ${input.text}`);
        try {
          const outcome = await agent.processQuery(input.text);
          formatResult(outcome).forEach(write);
          await afterQuery?.(outcome);
        } catch (error) {
          write(`❌ Error: ${errorMessage(error)}`);
        }
    }
  }

  write('👋 Goodbye!');
}
