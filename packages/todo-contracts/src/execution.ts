/**
 * Execution contract between the orchestration core and the strategies that
 * actually do the work.
 */

import type { Todo } from './todo.js';

export type ExecutionKind = 'math' | 'file' | 'research' | 'planning' | 'generic';

export const EXECUTION_KINDS: readonly ExecutionKind[] = ['math', 'file', 'research', 'planning', 'generic'];

export interface ExecutionOutcome {
  success: boolean;
  output?: string;
  feedback: string;
  error?: string;
  details?: Record<string, unknown>;
}

export interface RoutedExecution extends ExecutionOutcome {
  executionKind: ExecutionKind;
  durationMs: number;
}

/**
 * Chooses a capability tag by inspecting a todo.
 */
export interface ExecutionClassifier {
  classify(todo: Todo): ExecutionKind;
}

export interface ExecutionStrategy {
  readonly kind: ExecutionKind;
  execute(todo: Todo): Promise<ExecutionOutcome>;
}

export interface ExecutionLogEntry {
  todoId: string;
  todoContent: string;
  executionKind: ExecutionKind;
  success: boolean;
  error?: string;
  durationMs: number;
  timestamp: string;
}

export interface ExecutionSummary {
  totalExecutions: number;
  successful: number;
  failed: number;
  /** 0-100 */
  successRate: number;
  averageDurationMs: number;
  recent: ExecutionLogEntry[];
}

export type RemediationKind = 'retry' | 'skip' | 'modify' | 'break_down';

/**
 * Produces ranked remediation suggestions for a failed todo and maps a
 * suggestion back onto the action it implies.
 */
export interface RemediationAdvisor {
  suggest(todo: Todo, error: string | undefined): string[];
  classify(suggestion: string): RemediationKind;
}
