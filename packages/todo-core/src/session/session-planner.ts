/**
 * @module @taskloop/todo-core/session/session-planner
 * Builds a session's initial plan from a query.
 *
 * The reasoning provider is asked first; one todo is created per step and
 * chained on the previous one. If the provider throws, is missing or returns
 * no steps, a deterministic fallback plan is built from the query category.
 */

import { randomUUID } from 'node:crypto';
import { classifyQuery } from '@taskloop/todo-classifier';
import { errorMessage, noopLogger } from '@taskloop/todo-contracts';
import type {
  DependencyPolicy,
  ILogger,
  PlanSource,
  QueryCategory,
  ReasoningProvider,
  ReasoningStep,
} from '@taskloop/todo-contracts';
import { TodoStore } from '../store/todo-store.js';
import type { Session } from './session.js';
import { extractTodoContent } from './step-parser.js';

export interface SessionPlannerOptions {
  provider?: ReasoningProvider;
  thinkingDepth?: number;
  dependencyPolicy?: DependencyPolicy;
  logger?: ILogger;
}

export interface PlannedTodo {
  content: string;
  reasoning: string;
}

const PLANNING_PLAN: PlannedTodo[] = [
  {
    content: 'Research and gather information about the topic',
    reasoning: 'Good planning starts with thorough research',
  },
  {
    content: 'Break down the plan into major components',
    reasoning: 'Decomposing complex plans makes them manageable',
  },
  {
    content: 'Set priorities and establish timeline',
    reasoning: 'Prioritization and timing are key to successful execution',
  },
  {
    content: 'Create detailed action items for each component',
    reasoning: 'Specific actions make plans actionable',
  },
];

const GENERIC_PLAN: PlannedTodo[] = [
  {
    content: 'Analyze and understand the request',
    reasoning: 'Understanding the core request is essential',
  },
  {
    content: 'Research relevant information and context',
    reasoning: 'Background research provides necessary context',
  },
  {
    content: 'Develop a structured approach to address the request',
    reasoning: 'A systematic approach ensures comprehensive coverage',
  },
  {
    content: 'Implement the solution step by step',
    reasoning: 'Step-by-step implementation reduces complexity',
  },
];

/**
 * Deterministic plan for a query, in execution order.
 */
export function fallbackPlan(query: string, category: QueryCategory = classifyQuery(query)): PlannedTodo[] {
  switch (category) {
    case 'arithmetic': {
      const expression = query
        .trim()
        .replace(/=\s*$/, '')
        .trim()
        .replace(/^(calculate|compute)\s+/i, '');
      const plan: PlannedTodo[] = [
        { content: `Calculate ${expression}`, reasoning: `Perform mathematical calculation: ${expression}` },
      ];
      if (expression.split(/\s+/).length > 3 || /[*/()]/.test(expression)) {
        plan.push({
          content: `Verify calculation result for ${expression}`,
          reasoning: 'Double-check the calculation for accuracy',
        });
      }
      return plan;
    }
    case 'planning':
      return PLANNING_PLAN.map((todo) => ({ ...todo }));
    case 'generic':
      return GENERIC_PLAN.map((todo) => ({ ...todo }));
  }
}

export class SessionPlanner {
  private readonly provider?: ReasoningProvider;
  private readonly thinkingDepth: number;
  private readonly dependencyPolicy: DependencyPolicy;
  private readonly logger: ILogger;

  constructor(options: SessionPlannerOptions = {}) {
    this.provider = options.provider;
    this.thinkingDepth = options.thinkingDepth ?? 3;
    this.dependencyPolicy = options.dependencyPolicy ?? 'strict';
    this.logger = options.logger ?? noopLogger;
  }

  async createSession(query: string): Promise<Session> {
    const store = new TodoStore({ dependencyPolicy: this.dependencyPolicy });
    const steps = await this.reason(query);
    let planSource: PlanSource;

    if (steps.length > 0) {
      planSource = 'reasoning';
      chain(
        store,
        steps.map((step) => ({ content: extractTodoContent(step.reasoning), reasoning: step.reasoning })),
        steps.map((step) => ({ stepId: step.id })),
      );
    } else {
      planSource = 'fallback';
      const category = classifyQuery(query);
      chain(store, fallbackPlan(query, category), []);
      this.logger.info('Using fallback plan', { category, todos: store.statistics().total });
    }

    const now = new Date().toISOString();
    return {
      id: randomUUID(),
      query,
      steps,
      store,
      planSource,
      status: 'active',
      createdAt: now,
      updatedAt: now,
    };
  }

  private async reason(query: string): Promise<ReasoningStep[]> {
    if (!this.provider) {
      return [];
    }
    try {
      const steps = await this.provider.analyze(query, { thinkingDepth: this.thinkingDepth });
      if (steps.length === 0) {
        this.logger.warn('Reasoning produced no steps');
      }
      return steps;
    } catch (error) {
      this.logger.warn('Reasoning failed, falling back', { error: errorMessage(error) });
      return [];
    }
  }
}

/** Priority follows plan order; each todo waits for the one before it */
function chain(store: TodoStore, plan: PlannedTodo[], metadata: Record<string, unknown>[]): void {
  let previous: string | undefined;
  plan.forEach((todo, i) => {
    previous = store.create({
      content: todo.content,
      reasoning: todo.reasoning,
      priority: i + 1,
      dependencies: previous ? [previous] : [],
      metadata: metadata[i],
    }).id;
  });
}
