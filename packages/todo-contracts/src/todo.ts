/**
 * Todo entity types.
 *
 * A todo is owned by a TodoStore; every other component only ever sees the
 * read-only snapshots declared here.
 */

export type TodoStatus = 'pending' | 'in_progress' | 'completed' | 'failed';

export interface Todo {
  readonly id: string;
  readonly content: string;
  readonly status: TodoStatus;
  /** 1 = highest. Convention is 1-5, no upper bound is enforced */
  readonly priority: number;
  readonly dependencies: readonly string[];
  readonly createdAt: string;
  readonly updatedAt?: string;
  /** Set if and only if status is 'completed' */
  readonly completedAt?: string;
  readonly feedback?: string;
  readonly reasoning?: string;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface CreateTodoInput {
  content: string;
  priority?: number;
  dependencies?: readonly string[];
  metadata?: Record<string, unknown>;
  reasoning?: string;
}

export interface TodoStatistics {
  total: number;
  pending: number;
  inProgress: number;
  completed: number;
  failed: number;
}

/**
 * strict: dependency ids must name existing todos at creation, so no cycle can form.
 * lenient: anything is accepted; such todos never become ready.
 */
export type DependencyPolicy = 'strict' | 'lenient';

export type FeedbackEntryKind = 'error' | 'manual' | 'analysis';

export interface FeedbackEntry {
  readonly id: string;
  readonly todoId: string;
  readonly kind: FeedbackEntryKind;
  readonly message: string;
  readonly suggestions: readonly string[];
  readonly createdAt: string;
}

export interface RecordFeedbackInput {
  todoId: string;
  kind: FeedbackEntryKind;
  message: string;
  suggestions?: readonly string[];
}

export interface BlockedTodo {
  todo: Todo;
  /** Dependency ids that are not (yet) completed */
  waitingOn: string[];
}
