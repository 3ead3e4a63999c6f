/**
 * @module @taskloop/todo-core/orchestration/plan-editor
 * Applies the plan edits a guidance gate can ask for.
 *
 * Every edit that needs details (new content, which todo, new order) asks
 * through an input request. An edit whose input is exhausted is dropped.
 * `modify` first asks which of add, remove or reorder to make.
 */

import type { GuidanceAction, ILogger, PlanEdit, Todo } from '@taskloop/todo-contracts';
import type { FeedbackGateway } from '../feedback/feedback-gateway.js';
import { nonEmpty, requestInputOrGiveUp } from '../feedback/input.js';
import type { Scheduler } from '../store/scheduler.js';
import type { TodoStore } from '../store/todo-store.js';

export type PlanEditAction = Exclude<GuidanceAction, 'continue' | 'pause'>;

export type PlanEditChoice = Extract<PlanEditAction, 'add_todo' | 'remove_todo' | 'reorder'>;

const EDIT_CHOICES: Record<string, PlanEditChoice> = {
  add: 'add_todo',
  add_todo: 'add_todo',
  remove: 'remove_todo',
  remove_todo: 'remove_todo',
  reorder: 'reorder',
};

export class PlanEditor {
  constructor(
    private readonly store: TodoStore,
    private readonly scheduler: Scheduler,
    private readonly gateway: FeedbackGateway,
    private readonly logger: ILogger,
  ) {}

  async apply(action: PlanEditAction): Promise<PlanEdit | undefined> {
    switch (action) {
      case 'skip_current':
        return this.skipCurrent();
      case 'add_todo':
        return this.addTodo();
      case 'remove_todo':
        return this.removeTodo();
      case 'reorder':
        return this.reorder();
      case 'modify':
        return this.chooseEdit();
    }
  }

  async chooseEdit(): Promise<PlanEdit | undefined> {
    const answer = await requestInputOrGiveUp(
      this.gateway,
      'Which plan edit? (add, remove, reorder):',
      { validate: (response) => parseEditChoice(response) !== undefined },
      this.logger,
    );
    const choice = answer === undefined ? undefined : parseEditChoice(answer);
    return choice ? this.apply(choice) : undefined;
  }

  /** Marks the todo that would run next as failed */
  skipCurrent(): PlanEdit | undefined {
    const next = this.scheduler.next();
    if (!next) {
      return undefined;
    }
    this.store.setStatus(next.id, 'failed');
    this.store.addFeedback(next.id, 'Skipped by user during plan guidance');
    this.logger.info('Todo skipped by guidance', { todoId: next.id });
    return { type: 'skip', todoId: next.id };
  }

  /** New todos go after everything else: lowest priority, no dependencies */
  async addTodo(): Promise<PlanEdit | undefined> {
    const content = await requestInputOrGiveUp(
      this.gateway,
      'Enter the content of the new todo:',
      { validate: nonEmpty },
      this.logger,
    );
    if (content === undefined) {
      return undefined;
    }

    const priorities = this.store.all().map((todo) => todo.priority);
    const priority = priorities.length > 0 ? Math.max(...priorities) + 1 : 1;
    const todo = this.store.create({ content, priority, metadata: { source: 'user' } });
    this.logger.info('Todo added by guidance', { todoId: todo.id, priority });
    return { type: 'add', todoId: todo.id };
  }

  async removeTodo(): Promise<PlanEdit | undefined> {
    const todos = this.store.all();
    if (todos.length === 0) {
      return undefined;
    }

    const answer = await requestInputOrGiveUp(
      this.gateway,
      `${numbered(todos)}\nEnter the number of the todo to remove (1-${todos.length}):`,
      { validate: (response) => parseIndex(response, todos.length) !== undefined },
      this.logger,
    );
    const index = answer === undefined ? undefined : parseIndex(answer, todos.length);
    const target = index === undefined ? undefined : todos[index];
    if (!target) {
      return undefined;
    }

    this.store.remove(target.id);
    this.logger.info('Todo removed by guidance', { todoId: target.id });
    return { type: 'remove', todoId: target.id };
  }

  /**
   * Reassigns priorities 1..n to the pending todos in the order given as a
   * comma-separated permutation of their list numbers.
   */
  async reorder(): Promise<PlanEdit | undefined> {
    const pending = this.store.byStatus('pending');
    if (pending.length < 2) {
      return undefined;
    }

    const answer = await requestInputOrGiveUp(
      this.gateway,
      `${numbered(pending)}\nEnter the new order as comma-separated numbers (e.g. 2,1,3):`,
      { validate: (response) => parsePermutation(response, pending.length) !== undefined },
      this.logger,
    );
    const permutation = answer === undefined ? undefined : parsePermutation(answer, pending.length);
    if (!permutation) {
      return undefined;
    }

    const order: string[] = [];
    permutation.forEach((index, position) => {
      const todo = pending[index];
      if (todo) {
        this.store.setPriority(todo.id, position + 1);
        order.push(todo.id);
      }
    });
    this.logger.info('Plan reordered by guidance', { order });
    return { type: 'reorder', order };
  }
}

function numbered(todos: readonly Todo[]): string {
  return todos.map((todo, i) => `${i + 1}. ${todo.content}`).join('\n');
}

export function parseEditChoice(response: string): PlanEditChoice | undefined {
  const key = response.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(EDIT_CHOICES, key) ? EDIT_CHOICES[key] : undefined;
}

/** 1-based answer to 0-based index */
export function parseIndex(response: string, count: number): number | undefined {
  const trimmed = response.trim();
  if (!/^\d+$/.test(trimmed)) {
    return undefined;
  }
  const value = Number(trimmed);
  return value >= 1 && value <= count ? value - 1 : undefined;
}

export function parsePermutation(response: string, count: number): number[] | undefined {
  const parts = response.split(',').map((part) => parseIndex(part, count));
  const indices: number[] = [];
  for (const part of parts) {
    if (part === undefined) {
      return undefined;
    }
    indices.push(part);
  }
  return indices.length === count && new Set(indices).size === count ? indices : undefined;
}
