import { describe, it, expect, vi } from 'vitest';
import type { ILogger } from '@taskloop/todo-contracts';
import { TaskloopAgent } from '@taskloop/todo-core';
import { formatResult } from '../format.js';

const createMockLogger = (): ILogger => ({
  info: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  debug: vi.fn(),
});

describe('formatResult', () => {
  it('summarizes a finished run', async () => {
    const agent = new TaskloopAgent({ logger: createMockLogger() });
    const outcome = await agent.processQuery('Calculate 2+2');

    expect(formatResult(outcome)).toEqual([
      '',
      '📋 Query: Calculate 2+2',
      'Plan: fallback (1 todos)',
      'Termination: all_done after 1 iteration(s)',
      'Todos: 1 completed, 0 failed, 0 pending',
      '  ✅ Calculate 2+2',
    ]);
  });

  it('points at the budget when it ran out', async () => {
    const agent = new TaskloopAgent({ config: { maxIterations: 1 }, logger: createMockLogger() });
    const lines = formatResult(await agent.processQuery('Tell me about whales'));

    expect(lines.slice(-3)).toEqual([
      '  ⏳ Implement the solution step by step',
      'Blocked: 2 todo(s) waiting on unfinished dependencies',
      'Iteration budget spent; raise --max-iterations to run more of the plan.',
    ]);
  });
});
