/**
 * @module @taskloop/todo-core/store/todo-store
 * Authoritative in-memory store for a session's todos and feedback ledger.
 *
 * Every read returns a frozen snapshot; the only way to change a todo is
 * through the store's methods.
 */

import { randomUUID } from 'node:crypto';
import { DependencyError, NotFoundError } from '@taskloop/todo-contracts';
import type {
  CreateTodoInput,
  DependencyPolicy,
  FeedbackEntry,
  RecordFeedbackInput,
  Todo,
  TodoStatistics,
  TodoStatus,
} from '@taskloop/todo-contracts';

export interface TodoStoreOptions {
  dependencyPolicy?: DependencyPolicy;
  /** Injectable for tests */
  now?: () => Date;
}

type MutableTodo = {
  -readonly [K in keyof Todo]: Todo[K];
};

export class TodoStore {
  private readonly todos = new Map<string, MutableTodo>();
  private readonly feedbackEntries = new Map<string, FeedbackEntry>();
  private readonly dependencyPolicy: DependencyPolicy;
  private readonly now: () => Date;

  constructor(options: TodoStoreOptions = {}) {
    this.dependencyPolicy = options.dependencyPolicy ?? 'strict';
    this.now = options.now ?? (() => new Date());
  }

  create(input: CreateTodoInput): Todo {
    const dependencies = [...(input.dependencies ?? [])];

    if (this.dependencyPolicy === 'strict') {
      const unknown = dependencies.filter((dep) => !this.todos.has(dep));
      if (unknown.length > 0) {
        throw new DependencyError(unknown);
      }
    }

    let id = randomUUID();
    while (this.todos.has(id)) {
      id = randomUUID();
    }

    const todo: MutableTodo = {
      id,
      content: input.content,
      status: 'pending',
      priority: input.priority ?? 1,
      dependencies,
      createdAt: this.timestamp(),
      metadata: { ...(input.metadata ?? {}) },
    };
    if (input.reasoning !== undefined) {
      todo.reasoning = input.reasoning;
    }

    this.todos.set(id, todo);
    return snapshot(todo);
  }

  get(id: string): Todo | undefined {
    const todo = this.todos.get(id);
    return todo ? snapshot(todo) : undefined;
  }

  require(id: string): Todo {
    return snapshot(this.mutable(id));
  }

  has(id: string): boolean {
    return this.todos.has(id);
  }

  setStatus(id: string, status: TodoStatus): Todo {
    const todo = this.mutable(id);
    const now = this.timestamp();
    todo.status = status;
    todo.updatedAt = now;
    if (status === 'completed') {
      todo.completedAt = now;
    } else {
      delete todo.completedAt;
    }
    return snapshot(todo);
  }

  /**
   * Appends a free-text note to the todo's feedback field.
   */
  addFeedback(id: string, text: string): Todo {
    const todo = this.mutable(id);
    todo.feedback = todo.feedback ? `${todo.feedback}\n${text}` : text;
    todo.updatedAt = this.timestamp();
    return snapshot(todo);
  }

  updateContent(id: string, content: string): Todo {
    const todo = this.mutable(id);
    todo.content = content;
    todo.updatedAt = this.timestamp();
    return snapshot(todo);
  }

  setPriority(id: string, priority: number): Todo {
    const todo = this.mutable(id);
    todo.priority = priority;
    todo.updatedAt = this.timestamp();
    return snapshot(todo);
  }

  /**
   * Deletes a todo and drops it from the dependency lists of its dependents.
   */
  remove(id: string): Todo {
    const removed = this.mutable(id);
    this.todos.delete(id);

    for (const todo of this.todos.values()) {
      if (todo.dependencies.includes(id)) {
        todo.dependencies = todo.dependencies.filter((dep) => dep !== id);
        todo.updatedAt = this.timestamp();
      }
    }

    return snapshot(removed);
  }

  /** Insertion (creation) order */
  all(): Todo[] {
    return [...this.todos.values()].map(snapshot);
  }

  byStatus(status: TodoStatus): Todo[] {
    return this.all().filter((todo) => todo.status === status);
  }

  statistics(): TodoStatistics {
    const stats: TodoStatistics = { total: 0, pending: 0, inProgress: 0, completed: 0, failed: 0 };
    for (const todo of this.todos.values()) {
      stats.total += 1;
      if (todo.status === 'pending') {
        stats.pending += 1;
      } else if (todo.status === 'in_progress') {
        stats.inProgress += 1;
      } else if (todo.status === 'completed') {
        stats.completed += 1;
      } else {
        stats.failed += 1;
      }
    }
    return stats;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Feedback ledger
  // ═══════════════════════════════════════════════════════════════════════

  recordFeedback(input: RecordFeedbackInput): FeedbackEntry {
    this.mutable(input.todoId);
    const entry: FeedbackEntry = Object.freeze({
      id: randomUUID(),
      todoId: input.todoId,
      kind: input.kind,
      message: input.message,
      suggestions: Object.freeze([...(input.suggestions ?? [])]),
      createdAt: this.timestamp(),
    });
    this.feedbackEntries.set(entry.id, entry);
    return entry;
  }

  getFeedbackEntry(id: string): FeedbackEntry {
    const entry = this.feedbackEntries.get(id);
    if (!entry) {
      throw new NotFoundError('feedback', id);
    }
    return entry;
  }

  feedbackFor(todoId: string): FeedbackEntry[] {
    return [...this.feedbackEntries.values()].filter((entry) => entry.todoId === todoId);
  }

  clear(): void {
    this.todos.clear();
    this.feedbackEntries.clear();
  }

  private mutable(id: string): MutableTodo {
    const todo = this.todos.get(id);
    if (!todo) {
      throw new NotFoundError('todo', id);
    }
    return todo;
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

function snapshot(todo: MutableTodo): Todo {
  return Object.freeze({
    ...todo,
    dependencies: Object.freeze([...todo.dependencies]),
    metadata: Object.freeze({ ...todo.metadata }),
  });
}
