/**
 * @module @taskloop/todo-core/orchestration/orchestration-loop
 * Iteration-bounded driver that runs one ready todo per iteration.
 *
 * Per iteration:
 * SelectNext → (ApprovalGate) → InProgress → Execute → (ValidationGate)
 * → Completed | Failed → (RecoveryGate) → next
 *
 * Terminates with all_done when nothing is ready, budget_exhausted when
 * maxIterations is reached, or user_paused from a guidance gate. The store is
 * left consistent in every case, so calling run() again resumes the plan.
 *
 * @example
 * ```typescript
 * const loop = new OrchestrationLoop(
 *   { store, scheduler, gateway, router, recovery, observer: reporter },
 *   { maxIterations: 5 },
 * );
 * const result = await loop.run();
 * console.log(result.termination, result.statistics);
 * ```
 */

import { noopLogger } from '@taskloop/todo-contracts';
import type {
  ExecutionHistoryEntry,
  ILogger,
  LoopObserver,
  LoopResult,
  LoopTermination,
  Todo,
  ValidationDecision,
} from '@taskloop/todo-contracts';
import type { ExecutionRouter } from '../execution/execution-router.js';
import type { FeedbackGateway } from '../feedback/feedback-gateway.js';
import { nonEmpty, requestInputOrGiveUp } from '../feedback/input.js';
import type { FailureRecoveryPlanner } from '../recovery/failure-recovery-planner.js';
import type { Scheduler } from '../store/scheduler.js';
import type { TodoStore } from '../store/todo-store.js';
import { PlanEditor, type PlanEditAction } from './plan-editor.js';

export interface OrchestrationLoopConfig {
  maxIterations: number;
  approvalGate: boolean;
  validationGate: boolean;
  /** Guidance before every N-th iteration (1, N+1, 2N+1, ...); 0 asks only before the first */
  guidanceInterval: number;
}

export const DEFAULT_LOOP_CONFIG: OrchestrationLoopConfig = {
  maxIterations: 10,
  approvalGate: true,
  validationGate: true,
  guidanceInterval: 3,
};

export interface OrchestrationLoopDeps {
  store: TodoStore;
  scheduler: Scheduler;
  gateway: FeedbackGateway;
  router: ExecutionRouter;
  recovery: FailureRecoveryPlanner;
  logger?: ILogger;
  observer?: LoopObserver;
}

export interface RunContext {
  sessionId: string;
  query: string;
}

export class OrchestrationLoop {
  private readonly store: TodoStore;
  private readonly scheduler: Scheduler;
  private readonly gateway: FeedbackGateway;
  private readonly router: ExecutionRouter;
  private readonly recovery: FailureRecoveryPlanner;
  private readonly logger: ILogger;
  private readonly observer?: LoopObserver;
  private readonly editor: PlanEditor;
  private readonly config: OrchestrationLoopConfig;
  private readonly executionHistory: ExecutionHistoryEntry[] = [];

  constructor(deps: OrchestrationLoopDeps, config: Partial<OrchestrationLoopConfig> = {}) {
    this.store = deps.store;
    this.scheduler = deps.scheduler;
    this.gateway = deps.gateway;
    this.router = deps.router;
    this.recovery = deps.recovery;
    this.logger = deps.logger ?? noopLogger;
    this.observer = deps.observer;
    this.config = { ...DEFAULT_LOOP_CONFIG, ...config };
    this.editor = new PlanEditor(this.store, this.scheduler, this.gateway, this.logger);
  }

  async run(context?: RunContext): Promise<LoopResult> {
    if (context) {
      this.observer?.onRunStarted?.({ ...context, todoCount: this.store.statistics().total });
    }

    let iteration = 0;
    let lastGuidanceAt = -1;
    let termination: LoopTermination;

    for (;;) {
      const ready = this.scheduler.readySet();
      if (ready.length === 0) {
        termination = 'all_done';
        break;
      }
      if (iteration >= this.config.maxIterations) {
        termination = 'budget_exhausted';
        break;
      }

      if (lastGuidanceAt !== iteration && this.guidanceDue(iteration)) {
        lastGuidanceAt = iteration;
        const action = await this.gateway.requestPlanGuidance(this.store.all(), ready[0]?.id);
        this.observer?.onGuidance?.(action);

        if (action === 'pause') {
          termination = 'user_paused';
          break;
        }
        if (action !== 'continue') {
          await this.editPlan(action);
          // Re-select: the edit may have changed what is ready
          continue;
        }
      }

      const todo = this.scheduler.next();
      if (!todo) {
        continue;
      }

      iteration += 1;
      this.logger.info('Iteration started', { iteration, todoId: todo.id, content: todo.content });
      await this.runIteration(iteration, todo);
    }

    const statistics = this.store.statistics();
    const result: LoopResult = {
      iterations: iteration,
      termination,
      statistics,
      completed: statistics.completed === statistics.total - statistics.failed,
      feedbackSummary: this.gateway.summary(),
      blocked: this.scheduler.blocked(),
    };

    this.logger.info('Orchestration finished', { termination, iterations: iteration, ...statistics });
    this.observer?.onRunFinished?.(result);
    return result;
  }

  history(): readonly ExecutionHistoryEntry[] {
    return [...this.executionHistory];
  }

  clearHistory(): void {
    this.executionHistory.length = 0;
  }

  private guidanceDue(iteration: number): boolean {
    const interval = this.config.guidanceInterval;
    return iteration === 0 || (interval > 0 && iteration % interval === 0);
  }

  private async editPlan(action: PlanEditAction): Promise<void> {
    const edit = await this.editor.apply(action);
    if (edit) {
      this.observer?.onPlanEdited?.(edit);
    }
  }

  private async runIteration(iteration: number, selected: Todo): Promise<void> {
    const executionKind = this.router.classify(selected);

    if (this.config.approvalGate) {
      const approval = await this.gateway.requestApproval(selected, { executionKind });

      if (approval === 'reject' || approval === 'skip') {
        const note = approval === 'reject' ? 'Rejected at approval gate' : 'Skipped at approval gate';
        this.store.setStatus(selected.id, 'failed');
        const failed = this.store.addFeedback(selected.id, note);
        this.observer?.onTodoFailed?.(iteration, failed, note);
        return;
      }
      if (approval === 'modify') {
        await this.replaceContent(selected, 'Enter modified content before execution:');
        return;
      }
    }

    const todo = this.store.setStatus(selected.id, 'in_progress');
    this.observer?.onTodoStarted?.(iteration, todo);

    const result = await this.router.execute(todo);
    const entry: ExecutionHistoryEntry = {
      iteration,
      todoId: todo.id,
      todoContent: todo.content,
      result,
      timestamp: new Date().toISOString(),
    };

    if (result.success) {
      const validation: ValidationDecision = this.config.validationGate
        ? await this.gateway.requestValidation(todo, result)
        : 'accept';
      entry.validation = validation;
      await this.applyValidation(iteration, todo, validation, result.feedback);
      if (validation === 'accept') {
        this.observer?.onTodoCompleted?.(iteration, this.store.require(todo.id), result);
      }
    } else {
      this.store.setStatus(todo.id, 'failed');
      const failed = this.store.addFeedback(todo.id, result.feedback);
      this.observer?.onTodoFailed?.(iteration, failed, result.error ?? result.feedback);

      const recovery = await this.recovery.recover(todo.id, { error: result.error, feedback: result.feedback });
      entry.recovery = recovery;
      this.observer?.onRecovery?.(recovery);
    }

    this.executionHistory.push(entry);
  }

  private async applyValidation(
    iteration: number,
    todo: Todo,
    validation: ValidationDecision,
    feedback: string,
  ): Promise<void> {
    switch (validation) {
      case 'accept':
        this.store.setStatus(todo.id, 'completed');
        this.store.addFeedback(todo.id, feedback);
        return;
      case 'retry':
        this.store.setStatus(todo.id, 'pending');
        this.store.addFeedback(todo.id, 'Result rejected at validation, retrying');
        return;
      case 'modify':
        this.store.setStatus(todo.id, 'pending');
        await this.replaceContent(todo, 'Enter modified content for the todo:');
        return;
      case 'skip': {
        const note = 'Result skipped at validation';
        this.store.setStatus(todo.id, 'failed');
        const failed = this.store.addFeedback(todo.id, note);
        this.observer?.onTodoFailed?.(iteration, failed, note);
        return;
      }
    }
  }

  /** The todo stays pending whether or not new content arrives */
  private async replaceContent(todo: Todo, prompt: string): Promise<void> {
    const content = await requestInputOrGiveUp(
      this.gateway,
      prompt,
      { context: { todoId: todo.id, currentContent: todo.content }, validate: nonEmpty },
      this.logger,
    );
    if (content !== undefined) {
      this.store.updateContent(todo.id, content);
    }
  }
}
