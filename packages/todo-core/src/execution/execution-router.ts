/**
 * @module @taskloop/todo-core/execution/execution-router
 * Routes a todo to the strategy registered for its execution kind.
 *
 * The router never throws: a strategy that throws or rejects produces a
 * failed RoutedExecution instead. An ExecutionError hint lands in
 * `details.hint`.
 */

import { ExecutionError, errorMessage, noopLogger } from '@taskloop/todo-contracts';
import type {
  ExecutionClassifier,
  ExecutionKind,
  ExecutionLogEntry,
  ExecutionOutcome,
  ExecutionStrategy,
  ExecutionSummary,
  ILogger,
  RoutedExecution,
  Todo,
} from '@taskloop/todo-contracts';

export interface ExecutionRouterOptions {
  classifier: ExecutionClassifier;
  /** Must contain at least the generic strategy */
  strategies: Partial<Record<ExecutionKind, ExecutionStrategy>> & { generic: ExecutionStrategy };
  logger?: ILogger;
}

export class ExecutionRouter {
  private readonly classifier: ExecutionClassifier;
  private readonly strategies: ExecutionRouterOptions['strategies'];
  private readonly logger: ILogger;
  private readonly log: ExecutionLogEntry[] = [];

  constructor(options: ExecutionRouterOptions) {
    this.classifier = options.classifier;
    this.strategies = options.strategies;
    this.logger = options.logger ?? noopLogger;
  }

  classify(todo: Todo): ExecutionKind {
    return this.classifier.classify(todo);
  }

  async execute(todo: Todo): Promise<RoutedExecution> {
    const executionKind = this.classify(todo);
    const strategy = this.strategies[executionKind] ?? this.strategies.generic;
    const startedAt = Date.now();

    let outcome: ExecutionOutcome;
    try {
      outcome = await strategy.execute(todo);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn('Todo execution failed', { todoId: todo.id, executionKind, error: message });
      outcome = {
        success: false,
        error: message,
        feedback: `Failed to execute todo: ${message}`,
      };
      if (error instanceof ExecutionError && error.hint) {
        outcome.details = { hint: error.hint };
      }
    }

    const result: RoutedExecution = { ...outcome, executionKind, durationMs: Date.now() - startedAt };
    this.log.push({
      todoId: todo.id,
      todoContent: todo.content,
      executionKind,
      success: result.success,
      error: result.error,
      durationMs: result.durationMs,
      timestamp: new Date().toISOString(),
    });

    return result;
  }

  entries(): readonly ExecutionLogEntry[] {
    return [...this.log];
  }

  summary(recent = 5): ExecutionSummary {
    const total = this.log.length;
    const successful = this.log.filter((entry) => entry.success).length;
    const duration = this.log.reduce((sum, entry) => sum + entry.durationMs, 0);

    return {
      totalExecutions: total,
      successful,
      failed: total - successful,
      successRate: total > 0 ? (successful / total) * 100 : 0,
      averageDurationMs: total > 0 ? duration / total : 0,
      recent: recent > 0 ? this.log.slice(-recent) : [],
    };
  }

  clear(): void {
    this.log.length = 0;
  }
}
