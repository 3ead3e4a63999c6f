import { describe, it, expect } from 'vitest';
import type { ReasoningProvider } from '@taskloop/todo-contracts';
import { SessionPlanner, fallbackPlan } from '../session/session-planner.js';
import { extractTodoContent, parseReasoningSteps } from '../session/step-parser.js';
import { TextReasoningProvider } from '../session/text-reasoning-provider.js';
import { createMockLogger } from './helpers.js';

const COMPLETION = [
  'Some preamble the model added',
  '## Step 1: Gather data',
  'The totals come from two sources.',
  'Action: Collect both monthly reports',
  'Confidence: 0.8',
  '',
  '## Step 2: Compare',
  'Compare the totals line by line.',
  'Confidence: 1.7',
].join('\n');

describe('parseReasoningSteps', () => {
  it('splits a completion into steps at step headings', () => {
    const steps = parseReasoningSteps(COMPLETION, () => new Date('2026-03-01T10:00:00.000Z'));

    expect(steps).toHaveLength(2);
    expect(steps[0]).toMatchObject({
      description: '## Step 1: Gather data',
      reasoning: '## Step 1: Gather data\nThe totals come from two sources.\nAction: Collect both monthly reports',
      confidence: 0.8,
      createdAt: '2026-03-01T10:00:00.000Z',
    });
    expect(steps[1]?.confidence).toBe(1);
    expect(steps[0]?.id).not.toBe(steps[1]?.id);
  });

  it('returns nothing for unstructured text', () => {
    expect(parseReasoningSteps('Just do it.')).toEqual([]);
  });
});

describe('extractTodoContent', () => {
  it('prefers an action line without its label', () => {
    expect(extractTodoContent('## Step 1\nContext first.\nAction: Collect both monthly reports')).toBe(
      'Collect both monthly reports',
    );
  });

  it('keeps verb keywords as part of the content', () => {
    expect(extractTodoContent('Create: a summary file')).toBe('Create: a summary file');
  });

  it('falls back to the first substantial non-heading line', () => {
    expect(extractTodoContent('## Step 2: Compare\nok\nCompare the totals line by line.')).toBe(
      'Compare the totals line by line.',
    );
  });

  it('truncates when nothing else fits', () => {
    expect(extractTodoContent('Step 3')).toBe('Step 3');
    const heading = `## ${'y'.repeat(120)}`;
    expect(extractTodoContent(heading)).toBe(`## ${'y'.repeat(97)}...`);
  });
});

describe('fallbackPlan', () => {
  it('adds a verification todo for compound arithmetic', () => {
    expect(fallbackPlan('Calculate 15*3+10-5').map((t) => t.content)).toEqual([
      'Calculate 15*3+10-5',
      'Verify calculation result for 15*3+10-5',
    ]);
  });

  it('keeps simple arithmetic to a single todo', () => {
    expect(fallbackPlan('2+2=').map((t) => t.content)).toEqual(['Calculate 2+2']);
  });

  it('uses the fixed planning and generic plans', () => {
    expect(fallbackPlan('Plan a product launch')[0]?.content).toBe('Research and gather information about the topic');
    expect(fallbackPlan('Tell me about whales').map((t) => t.content)).toEqual([
      'Analyze and understand the request',
      'Research relevant information and context',
      'Develop a structured approach to address the request',
      'Implement the solution step by step',
    ]);
  });
});

describe('SessionPlanner', () => {
  it('chains a fallback plan when no provider is configured', async () => {
    const logger = createMockLogger();
    const session = await new SessionPlanner({ logger }).createSession('Calculate 15*3+10-5');

    const [first, second] = session.store.all();
    expect(session.planSource).toBe('fallback');
    expect(session.status).toBe('active');
    expect(first).toMatchObject({ content: 'Calculate 15*3+10-5', priority: 1, dependencies: [] });
    expect(second?.priority).toBe(2);
    expect(second?.dependencies).toEqual([first?.id]);
    expect(logger.info).toHaveBeenCalledWith('Using fallback plan', { category: 'arithmetic', todos: 2 });
  });

  it('falls back when the provider throws', async () => {
    const logger = createMockLogger();
    const provider: ReasoningProvider = {
      analyze: async () => {
        throw new Error('offline');
      },
    };

    const session = await new SessionPlanner({ provider, logger }).createSession('Plan a product launch');

    expect(session.planSource).toBe('fallback');
    expect(session.store.statistics().total).toBe(4);
    expect(logger.warn).toHaveBeenCalledWith('Reasoning failed, falling back', { error: 'offline' });
  });

  it('falls back when the provider finds no steps', async () => {
    const logger = createMockLogger();
    const provider = new TextReasoningProvider(async () => 'no structure here');

    const session = await new SessionPlanner({ provider, logger }).createSession('Tell me about whales');

    expect(session.planSource).toBe('fallback');
    expect(logger.warn).toHaveBeenCalledWith('Reasoning produced no steps');
  });

  it('creates one chained todo per reasoning step', async () => {
    const prompts: string[] = [];
    const provider = new TextReasoningProvider(async (prompt) => {
      prompts.push(prompt);
      return COMPLETION;
    });

    const session = await new SessionPlanner({ provider, thinkingDepth: 2 }).createSession('Compare monthly totals');

    expect(session.planSource).toBe('reasoning');
    expect(prompts[0]).toContain('in up to 2 levels of detail');
    expect(prompts[0]?.endsWith('Query: Compare monthly totals')).toBe(true);

    const todos = session.store.all();
    expect(todos.map((t) => t.content)).toEqual(['Collect both monthly reports', 'Compare the totals line by line.']);
    expect(todos[1]?.dependencies).toEqual([todos[0]?.id]);
    expect(todos.map((t) => t.metadata)).toEqual(session.steps.map((step) => ({ stepId: step.id })));
    expect(todos[0]?.reasoning).toBe(session.steps[0]?.reasoning);
  });
});
