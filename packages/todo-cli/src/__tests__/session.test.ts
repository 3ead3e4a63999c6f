import { describe, it, expect, vi } from 'vitest';
import type { ILogger } from '@taskloop/todo-contracts';
import { TaskloopAgent } from '@taskloop/todo-core';
import { classifySessionInput, runInteractiveSession } from '../session.js';

const createMockLogger = (): ILogger => ({
  info: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  debug: vi.fn(),
});

function scriptedAsk(answers: string[]): (prompt: string) => Promise<string | undefined> {
  return async () => answers.shift();
}

describe('classifySessionInput', () => {
  it('recognizes session commands case-insensitively', () => {
    expect(classifySessionInput('  ')).toEqual({ type: 'skip' });
    expect(classifySessionInput('QUIT')).toEqual({ type: 'exit' });
    expect(classifySessionInput('exit')).toEqual({ type: 'exit' });
    expect(classifySessionInput('help')).toEqual({ type: 'help' });
    expect(classifySessionInput('Stats')).toEqual({ type: 'stats' });
  });

  it('treats anything else as a query', () => {
    expect(classifySessionInput('  Calculate 2+2 ')).toEqual({ type: 'query', text: 'Calculate 2+2' });
  });
});

describe('runInteractiveSession', () => {
  it('runs several queries on one agent and stops at quit', async () => {
    const agent = new TaskloopAgent({ logger: createMockLogger() });
    const processQuery = vi.spyOn(agent, 'processQuery');
    const lines: string[] = [];
    const afterQuery = vi.fn(async () => {});

    await runInteractiveSession({
      agent,
      ask: scriptedAsk(['Calculate 2+2', '', 'stats', 'Calculate 3+3', 'quit', 'never read']),
      write: (line) => lines.push(line),
      afterQuery,
    });

    expect(processQuery.mock.calls).toEqual([['Calculate 2+2'], ['Calculate 3+3']]);
    expect(afterQuery).toHaveBeenCalledTimes(2);
    expect(lines).toContain('📋 Query: Calculate 3+3');
    const stats = lines.indexOf('📊 Current agent statistics:');
    expect(lines.slice(stats, stats + 5)).toEqual([
      '📊 Current agent statistics:',
      '- Total todos: 1',
      '- Completed: 1',
      '- Failed: 0',
      '- Pending: 0',
    ]);
    expect(lines.at(-1)).toBe('👋 Goodbye!');
  });

  it('reports a failing query and keeps going', async () => {
    const lines: string[] = [];
    const agent = new TaskloopAgent({ logger: createMockLogger() });
    vi.spyOn(agent, 'processQuery').mockRejectedValueOnce(new Error('planner offline'));

    await runInteractiveSession({
      agent,
      ask: scriptedAsk(['Calculate 1+1', 'help', 'Calculate 5+5']),
      write: (line) => lines.push(line),
    });

    expect(lines).toContain('❌ Error: planner offline');
    expect(lines).toContain("- 'quit' or 'exit' - Leave interactive mode");
    expect(lines).toContain('📋 Query: Calculate 5+5');
    expect(lines.at(-1)).toBe('👋 Goodbye!');
  });
});
