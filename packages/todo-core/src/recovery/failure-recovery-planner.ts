/**
 * @module @taskloop/todo-core/recovery/failure-recovery-planner
 * Turns a failed execution into a plan mutation chosen at the error gate.
 */

import { noopLogger } from '@taskloop/todo-contracts';
import type {
  ILogger,
  RecoveryOutcome,
  RemediationAdvisor,
  RemediationKind,
  Todo,
} from '@taskloop/todo-contracts';
import type { TodoStore } from '../store/todo-store.js';
import type { FeedbackGateway } from '../feedback/feedback-gateway.js';
import { nonEmpty, requestInputOrGiveUp } from '../feedback/input.js';

export interface FailureRecoveryPlannerOptions {
  store: TodoStore;
  gateway: FeedbackGateway;
  advisor: RemediationAdvisor;
  logger?: ILogger;
}

export interface FailureContext {
  error?: string;
  feedback: string;
}

/** Subtasks may be given one per line or separated by semicolons */
const SUBTASK_SEPARATOR = /\r?\n|;/;

export class FailureRecoveryPlanner {
  private readonly store: TodoStore;
  private readonly gateway: FeedbackGateway;
  private readonly advisor: RemediationAdvisor;
  private readonly logger: ILogger;

  constructor(options: FailureRecoveryPlannerOptions) {
    this.store = options.store;
    this.gateway = options.gateway;
    this.advisor = options.advisor;
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Only acts on a todo that is currently failed, so a second call for the
   * same failure is a no-op.
   *
   * @throws NotFoundError for an unknown todo id
   */
  async recover(todoId: string, failure: FailureContext): Promise<RecoveryOutcome> {
    const todo = this.store.require(todoId);
    if (todo.status !== 'failed') {
      return { action: 'unchanged', todoId, reason: `todo is ${todo.status}` };
    }

    const error = failure.error ?? failure.feedback;
    const suggestions = this.advisor.suggest(todo, failure.error);
    this.store.recordFeedback({ todoId, kind: 'error', message: error, suggestions });

    const decision = await this.gateway.requestErrorHandling(todo, error, suggestions);

    let outcome: RecoveryOutcome;
    if (decision.action === 'suggestion') {
      const suggestion = suggestions[decision.index - 1];
      const kind = suggestion === undefined ? 'retry' : this.advisor.classify(suggestion);
      outcome = await this.apply(todo, kind, decision.index);
    } else {
      outcome = await this.apply(todo, decision.action);
    }

    this.logger.info('Recovery applied', { todoId, action: outcome.action });
    return outcome;
  }

  private async apply(todo: Todo, kind: RemediationKind, viaSuggestion?: number): Promise<RecoveryOutcome> {
    switch (kind) {
      case 'retry':
        this.store.setStatus(todo.id, 'pending');
        return { action: 'retried', todoId: todo.id, viaSuggestion };

      case 'skip':
        this.store.addFeedback(todo.id, 'Skipped after failure');
        return { action: 'skipped', todoId: todo.id, viaSuggestion };

      case 'modify': {
        const content = await this.ask('Enter modified content for the todo:', todo);
        if (content === undefined) {
          return { action: 'unchanged', todoId: todo.id, reason: 'no new content provided' };
        }
        this.store.updateContent(todo.id, content);
        this.store.setStatus(todo.id, 'pending');
        return { action: 'modified', todoId: todo.id, content, viaSuggestion };
      }

      case 'break_down': {
        const answer = await this.ask('Enter subtasks, one per line:', todo);
        const subtasks = (answer ?? '')
          .split(SUBTASK_SEPARATOR)
          .map((line) => line.trim())
          .filter((line) => line.length > 0);
        if (subtasks.length === 0) {
          return { action: 'unchanged', todoId: todo.id, reason: 'no subtasks provided' };
        }

        const createdIds = subtasks.map(
          (content) =>
            this.store.create({
              content,
              priority: todo.priority,
              metadata: { source: 'break_down', parentId: todo.id },
            }).id,
        );
        this.store.addFeedback(todo.id, `Broken down into ${createdIds.length} subtask(s)`);
        return { action: 'split', todoId: todo.id, createdIds, viaSuggestion };
      }
    }
  }

  private ask(prompt: string, todo: Todo): Promise<string | undefined> {
    return requestInputOrGiveUp(
      this.gateway,
      prompt,
      { context: { todoId: todo.id, currentContent: todo.content }, validate: nonEmpty },
      this.logger,
    );
  }
}
