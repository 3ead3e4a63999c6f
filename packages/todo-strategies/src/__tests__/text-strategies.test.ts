import { describe, it, expect } from 'vitest';
import type { Todo } from '@taskloop/todo-contracts';
import { createDefaultStrategies } from '../index.js';
import {
  analyzeGenericTodo,
  extractPlanningElements,
  extractResearchTopics,
  PLANNING_CATEGORIES,
  PlanningStrategy,
} from '../text-strategies.js';

function makeTodo(content: string): Todo {
  return {
    id: 'todo-1',
    content,
    status: 'in_progress',
    priority: 1,
    dependencies: [],
    createdAt: '2026-01-01T00:00:00.000Z',
    metadata: {},
  };
}

describe('extractResearchTopics', () => {
  it('picks up "about" phrases and quoted topics', () => {
    expect(extractResearchTopics('Research about caching strategies, then summarize')).toEqual([
      'caching strategies',
    ]);
    expect(extractResearchTopics('Find papers on "vector search"')).toEqual(['vector search']);
  });

  it('falls back to the whole content', () => {
    expect(extractResearchTopics('  Search the docs ')).toEqual(['Search the docs']);
  });
});

describe('PlanningStrategy', () => {
  it('only lists categories the todo mentions', () => {
    expect(extractPlanningElements('Plan the goal and schedule')).toEqual({
      objectives: ['Define clear objectives'],
      tasks: [],
      timeline: ['Set realistic timeline'],
      resources: [],
      considerations: ['Review feasibility', 'Consider potential obstacles', 'Plan for contingencies'],
    });
  });

  it('returns every category in rendering order', () => {
    expect(Object.keys(extractPlanningElements('Anything'))).toEqual([...PLANNING_CATEGORIES]);
  });

  it('renders a planning framework', async () => {
    const result = await new PlanningStrategy().execute(makeTodo('Plan the goal and schedule'));
    expect(result.output).toBe(
      [
        'Planning task: Plan the goal and schedule',
        'Planning framework created:',
        '',
        'Objectives:',
        '  - Define clear objectives',
        '',
        'Timeline:',
        '  - Set realistic timeline',
        '',
        'Considerations:',
        '  - Review feasibility',
        '  - Consider potential obstacles',
        '  - Plan for contingencies',
      ].join('\n'),
    );
  });
});

describe('analyzeGenericTodo', () => {
  it('grades complexity and flags urgency', () => {
    const analysis = analyzeGenericTodo('Fix the login bug before the deadline');
    expect(analysis.complexity).toBe('medium');
    expect(analysis.description).toBe('Problem-solving task');
    expect(analysis.considerations).toEqual(['Time-sensitive - prioritize accordingly']);
  });

  it('treats short review todos as low complexity', () => {
    const analysis = analyzeGenericTodo('Review it');
    expect(analysis.complexity).toBe('low');
    expect(analysis.description).toBe('Review or verification task');
  });
});

describe('createDefaultStrategies', () => {
  it('registers one strategy per execution kind', () => {
    const strategies = createDefaultStrategies();
    expect(Object.keys(strategies)).toEqual(['math', 'file', 'research', 'planning', 'generic']);
    for (const [kind, strategy] of Object.entries(strategies)) {
      expect(strategy.kind).toBe(kind);
    }
  });
});
