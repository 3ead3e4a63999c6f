/**
 * Rule-based strategies for non-numeric todos. They analyse the todo text and
 * produce a structured plan of action; none of them touch the outside world.
 */

import type { ExecutionOutcome, ExecutionStrategy, Todo } from '@taskloop/todo-contracts';

export class FileStrategy implements ExecutionStrategy {
  readonly kind = 'file' as const;

  async execute(todo: Todo): Promise<ExecutionOutcome> {
    const content = todo.content.toLowerCase();
    let output: string;
    let feedback: string;

    if (content.includes('create') || content.includes('write')) {
      output = 'File operation identified. Files would be created or written according to the todo.';
      feedback = 'File creation todo processed (simulated)';
    } else if (content.includes('save')) {
      output = 'Save operation identified. Data would be persisted to the appropriate storage.';
      feedback = 'Save operation processed (simulated)';
    } else {
      output = 'Generic file operation identified.';
      feedback = 'File operation processed';
    }

    return {
      success: true,
      output,
      feedback,
      details: { executionType: 'file_operation', operationType: 'file_management' },
    };
  }
}

export function extractResearchTopics(content: string): string[] {
  const topics: string[] = [];

  for (const match of content.toLowerCase().matchAll(/about\s+([^,.!?]+)/g)) {
    const topic = match[1]?.trim();
    if (topic) {
      topics.push(topic);
    }
  }
  for (const match of content.matchAll(/"([^"]+)"/g)) {
    if (match[1]) {
      topics.push(match[1]);
    }
  }

  return topics.length > 0 ? topics : [content.trim()];
}

export class ResearchStrategy implements ExecutionStrategy {
  readonly kind = 'research' as const;

  async execute(todo: Todo): Promise<ExecutionOutcome> {
    const topics = extractResearchTopics(todo.content);
    const lines = [
      `Research task: ${todo.content}`,
      `Identified ${topics.length} research area(s):`,
      ...topics.map((topic, i) => `  ${i + 1}. ${topic}`),
      '',
      'Next steps:',
      '- Query search APIs or internal knowledge bases',
      '- Compile and summarize findings',
      '- Organize information by relevance',
    ];

    return {
      success: true,
      output: lines.join('\n'),
      feedback: `Research todo analyzed. Found ${topics.length} areas to investigate.`,
      details: { executionType: 'research', researchTopics: topics },
    };
  }
}

export const PLANNING_CATEGORIES = ['objectives', 'tasks', 'timeline', 'resources', 'considerations'] as const;

export type PlanningCategory = (typeof PLANNING_CATEGORIES)[number];

export type PlanningElements = Record<PlanningCategory, string[]>;

export function extractPlanningElements(content: string): PlanningElements {
  const lower = content.toLowerCase();
  const has = (words: string[]) => words.some((word) => lower.includes(word));

  return {
    objectives: has(['goal', 'objective', 'aim']) ? ['Define clear objectives'] : [],
    tasks: has(['task', 'step', 'action']) ? ['Break down into actionable tasks'] : [],
    timeline: has(['time', 'schedule', 'deadline', 'when']) ? ['Set realistic timeline'] : [],
    resources: has(['resource', 'budget', 'cost', 'need']) ? ['Identify required resources'] : [],
    considerations: ['Review feasibility', 'Consider potential obstacles', 'Plan for contingencies'],
  };
}

export class PlanningStrategy implements ExecutionStrategy {
  readonly kind = 'planning' as const;

  async execute(todo: Todo): Promise<ExecutionOutcome> {
    const elements = extractPlanningElements(todo.content);
    const lines = [`Planning task: ${todo.content}`, 'Planning framework created:'];

    for (const category of PLANNING_CATEGORIES) {
      const items = elements[category];
      if (items.length === 0) {
        continue;
      }
      lines.push('', `${category.charAt(0).toUpperCase()}${category.slice(1)}:`);
      lines.push(...items.map((item) => `  - ${item}`));
    }

    return {
      success: true,
      output: lines.join('\n'),
      feedback: 'Planning structure created and organized',
      details: { executionType: 'planning', planningElements: elements },
    };
  }
}

export interface GenericAnalysis {
  description: string;
  complexity: 'low' | 'medium' | 'high';
  steps: string[];
  considerations: string[];
}

export function analyzeGenericTodo(content: string): GenericAnalysis {
  const lower = content.toLowerCase();
  const wordCount = content.trim().split(/\s+/).length;
  const complexity = wordCount < 5 ? 'low' : wordCount > 15 ? 'high' : 'medium';

  let description = 'General task requiring attention';
  if (['implement', 'create', 'build'].some((w) => lower.includes(w))) {
    description = 'Implementation or creation task';
  } else if (['fix', 'solve', 'resolve'].some((w) => lower.includes(w))) {
    description = 'Problem-solving task';
  } else if (['review', 'check', 'verify'].some((w) => lower.includes(w))) {
    description = 'Review or verification task';
  }

  const considerations: string[] = [];
  if (complexity === 'high') {
    considerations.push('Consider breaking into smaller subtasks');
  }
  if (['deadline', 'urgent', 'asap'].some((w) => lower.includes(w))) {
    considerations.push('Time-sensitive - prioritize accordingly');
  }

  return {
    description,
    complexity,
    steps: [
      'Understand the requirement clearly',
      'Gather necessary information/resources',
      'Execute the task step by step',
      'Verify completion and quality',
    ],
    considerations,
  };
}

export class GenericStrategy implements ExecutionStrategy {
  readonly kind = 'generic' as const;

  async execute(todo: Todo): Promise<ExecutionOutcome> {
    const analysis = analyzeGenericTodo(todo.content);
    const lines = [`Task: ${todo.content}`, `Analysis: ${analysis.description}`];

    lines.push('', 'Suggested execution steps:');
    lines.push(...analysis.steps.map((step, i) => `  ${i + 1}. ${step}`));

    if (analysis.considerations.length > 0) {
      lines.push('', 'Important considerations:');
      lines.push(...analysis.considerations.map((c) => `  - ${c}`));
    }

    return {
      success: true,
      output: lines.join('\n'),
      feedback: 'Generic todo processed and analyzed',
      details: { executionType: 'generic', analysis },
    };
  }
}
