/**
 * Orchestration loop types: results, history, recovery outcomes and the
 * observer callbacks used for progress reporting.
 */

import type { BlockedTodo, Todo, TodoStatistics } from './todo.js';
import type { FeedbackSummary, GuidanceAction, ValidationDecision } from './feedback.js';
import type { RoutedExecution } from './execution.js';

export type LoopTermination = 'all_done' | 'budget_exhausted' | 'user_paused';

export type RecoveryOutcome =
  | { action: 'retried'; todoId: string; viaSuggestion?: number }
  | { action: 'skipped'; todoId: string; viaSuggestion?: number }
  | { action: 'modified'; todoId: string; content: string; viaSuggestion?: number }
  | { action: 'split'; todoId: string; createdIds: string[]; viaSuggestion?: number }
  | { action: 'unchanged'; todoId: string; reason: string };

export interface ExecutionHistoryEntry {
  iteration: number;
  todoId: string;
  todoContent: string;
  result: RoutedExecution;
  timestamp: string;
  validation?: ValidationDecision;
  recovery?: RecoveryOutcome;
}

export interface LoopResult {
  iterations: number;
  termination: LoopTermination;
  statistics: TodoStatistics;
  /** completed === total - failed */
  completed: boolean;
  feedbackSummary: FeedbackSummary;
  blocked: BlockedTodo[];
}

export type PlanEdit =
  | { type: 'add'; todoId: string }
  | { type: 'remove'; todoId: string }
  | { type: 'reorder'; order: string[] }
  | { type: 'skip'; todoId: string };

/**
 * Side-effect-only hooks; the loop never depends on what they do.
 */
export interface LoopObserver {
  onRunStarted?(info: { sessionId: string; query: string; todoCount: number }): void;
  onTodoStarted?(iteration: number, todo: Todo): void;
  onTodoCompleted?(iteration: number, todo: Todo, result: RoutedExecution): void;
  onTodoFailed?(iteration: number, todo: Todo, error: string): void;
  onRecovery?(outcome: RecoveryOutcome): void;
  onGuidance?(action: GuidanceAction): void;
  onPlanEdited?(edit: PlanEdit): void;
  onRunFinished?(result: LoopResult): void;
}
