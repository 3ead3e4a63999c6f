import type { BlockedTodo, Todo } from '@taskloop/todo-contracts';
import type { TodoStore } from './todo-store.js';

/**
 * Ready-queue selection over a TodoStore.
 *
 * Stateless: every call recomputes from the store, so edits made between
 * iterations (reorder, add, remove) are always observed.
 */
export class Scheduler {
  constructor(private readonly store: TodoStore) {}

  /**
   * Pending todos whose dependencies are all completed, by ascending
   * priority and then creation order.
   */
  readySet(): Todo[] {
    const todos = this.store.all();
    const completed = new Set(todos.filter((t) => t.status === 'completed').map((t) => t.id));

    return todos
      .map((todo, order) => ({ todo, order }))
      .filter(({ todo }) => todo.status === 'pending' && todo.dependencies.every((dep) => completed.has(dep)))
      .sort((a, b) => a.todo.priority - b.todo.priority || a.order - b.order)
      .map(({ todo }) => todo);
  }

  next(): Todo | undefined {
    return this.readySet()[0];
  }

  blocked(): BlockedTodo[] {
    const todos = this.store.all();
    const completed = new Set(todos.filter((t) => t.status === 'completed').map((t) => t.id));
    const blocked: BlockedTodo[] = [];

    for (const todo of todos) {
      if (todo.status !== 'pending') {
        continue;
      }
      const waitingOn = todo.dependencies.filter((dep) => !completed.has(dep));
      if (waitingOn.length > 0) {
        blocked.push({ todo, waitingOn });
      }
    }

    return blocked;
  }
}
