/**
 * @module @taskloop/progress-reporter/reporter
 * Progress reporter for the orchestration loop.
 *
 * UX-only component: the loop never reads anything back from it.
 * Used for progress output in the CLI and for streaming to other frontends.
 */

import type {
  GuidanceAction,
  ILogger,
  LoopObserver,
  LoopResult,
  LoopTermination,
  PlanEdit,
  RecoveryOutcome,
  RoutedExecution,
  Todo,
} from '@taskloop/todo-contracts';
import type { ProgressCallback, ProgressEvent } from './types.js';

/**
 * LoopObserver that turns loop callbacks into progress events and log lines.
 *
 * @example
 * ```typescript
 * const reporter = new ProgressReporter(logger, (event) => {
 *   res.write(`data: ${JSON.stringify(event)}\n\n`);
 * });
 * const agent = new TaskloopAgent({ observer: reporter });
 * ```
 */
export class ProgressReporter implements LoopObserver {
  private events: ProgressEvent[] = [];
  private startTime = 0;

  constructor(
    private readonly logger: ILogger,
    private readonly onProgress?: ProgressCallback,
  ) {}

  onRunStarted(info: { sessionId: string; query: string; todoCount: number }): void {
    this.startTime = Date.now();
    this.emit({ type: 'run_started', timestamp: this.startTime, data: info });
    this.logger.info(`🎯 Run started: ${info.query} (${info.todoCount} todos)`);
  }

  onTodoStarted(iteration: number, todo: Todo): void {
    this.emit({
      type: 'todo_started',
      timestamp: Date.now(),
      data: { iteration, todoId: todo.id, content: todo.content },
    });
    this.logger.info(`▶️  [${iteration}] Starting: ${todo.content}`);
  }

  onTodoCompleted(iteration: number, todo: Todo, result: RoutedExecution): void {
    this.emit({
      type: 'todo_completed',
      timestamp: Date.now(),
      data: {
        iteration,
        todoId: todo.id,
        content: todo.content,
        executionKind: result.executionKind,
        durationMs: result.durationMs,
      },
    });
    this.logger.info(`✅ [${iteration}] Completed: ${todo.content}`);
  }

  onTodoFailed(iteration: number, todo: Todo, error: string): void {
    this.emit({
      type: 'todo_failed',
      timestamp: Date.now(),
      data: { iteration, todoId: todo.id, content: todo.content, error },
    });
    this.logger.error(`❌ [${iteration}] Failed: ${error}`);
  }

  onRecovery(outcome: RecoveryOutcome): void {
    this.emit({ type: 'todo_recovered', timestamp: Date.now(), data: outcome });
    this.logger.info(`🔧 Recovery: ${describeRecovery(outcome)}`);
  }

  onGuidance(action: GuidanceAction): void {
    this.emit({ type: 'guidance_received', timestamp: Date.now(), data: { action } });
    if (action !== 'continue') {
      this.logger.info(`🧭 Guidance: ${action}`);
    }
  }

  onPlanEdited(edit: PlanEdit): void {
    this.emit({ type: 'plan_edited', timestamp: Date.now(), data: edit });
    this.logger.info(`📝 Plan edited: ${edit.type}`);
  }

  onRunFinished(result: LoopResult): void {
    const totalDuration = this.startTime > 0 ? Date.now() - this.startTime : 0;
    const { statistics } = result;

    this.emit({
      type: 'run_finished',
      timestamp: Date.now(),
      data: {
        termination: result.termination,
        iterations: result.iterations,
        statistics,
        totalDuration,
      },
    });

    this.logger.info(
      `${this.getTerminationEmoji(result.termination)} Run finished (${result.termination}) after ${result.iterations} iteration(s) in ${(totalDuration / 1000).toFixed(1)}s`,
    );
    this.logger.info(
      `📊 ${statistics.completed}/${statistics.total} completed | ${statistics.failed} failed | ${statistics.pending} pending`,
    );
  }

  /**
   * Get all emitted events (for debugging/testing).
   */
  getEvents(): readonly ProgressEvent[] {
    return [...this.events];
  }

  clear(): void {
    this.events = [];
    this.startTime = 0;
  }

  private emit(event: ProgressEvent): void {
    this.events.push(event);
    this.onProgress?.(event);
  }

  private getTerminationEmoji(termination: LoopTermination): string {
    switch (termination) {
      case 'all_done':
        return '✅';
      case 'budget_exhausted':
        return '⏳';
      case 'user_paused':
        return '⏸️';
    }
  }
}

export function describeRecovery(outcome: RecoveryOutcome): string {
  const via = 'viaSuggestion' in outcome && outcome.viaSuggestion ? ` via suggestion ${outcome.viaSuggestion}` : '';
  switch (outcome.action) {
    case 'retried':
      return `retrying ${outcome.todoId}${via}`;
    case 'skipped':
      return `skipped ${outcome.todoId}${via}`;
    case 'modified':
      return `rewrote ${outcome.todoId} as '${outcome.content}'${via}`;
    case 'split':
      return `split ${outcome.todoId} into ${outcome.createdIds.length} subtask(s)${via}`;
    case 'unchanged':
      return `left ${outcome.todoId} unchanged (${outcome.reason})`;
  }
}
