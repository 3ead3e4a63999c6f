import { describe, it, expect } from 'vitest';
import { DependencyError, NotFoundError } from '@taskloop/todo-contracts';
import { TodoStore } from '../store/todo-store.js';
import { Scheduler } from '../store/scheduler.js';

function clock(start = Date.parse('2026-03-01T10:00:00.000Z')) {
  let current = start;
  return () => {
    const now = new Date(current);
    current += 1000;
    return now;
  };
}

describe('TodoStore', () => {
  it('creates pending todos with default priority', () => {
    const store = new TodoStore({ now: clock() });
    const todo = store.create({ content: 'Write notes' });

    expect(todo.status).toBe('pending');
    expect(todo.priority).toBe(1);
    expect(todo.dependencies).toEqual([]);
    expect(todo.createdAt).toBe('2026-03-01T10:00:00.000Z');
    expect(todo.completedAt).toBeUndefined();
    expect(Object.isFrozen(todo)).toBe(true);
  });

  it('sets completedAt only while completed', () => {
    const store = new TodoStore({ now: clock() });
    const { id } = store.create({ content: 'Write notes' });

    const completed = store.setStatus(id, 'completed');
    expect(completed.completedAt).toBe('2026-03-01T10:00:01.000Z');
    expect(completed.updatedAt).toBe('2026-03-01T10:00:01.000Z');

    const reopened = store.setStatus(id, 'pending');
    expect(reopened.completedAt).toBeUndefined();
    expect(reopened.updatedAt).toBe('2026-03-01T10:00:02.000Z');
  });

  it('throws NotFoundError for unknown ids', () => {
    const store = new TodoStore();
    expect(() => store.setStatus('missing', 'completed')).toThrow(NotFoundError);
    expect(() => store.require('missing')).toThrow('Todo not found: missing');
    expect(store.get('missing')).toBeUndefined();
  });

  it('rejects unknown dependencies under the strict policy', () => {
    const store = new TodoStore();
    expect(() => store.create({ content: 'B', dependencies: ['ghost'] })).toThrow(DependencyError);
    expect(store.statistics().total).toBe(0);
  });

  it('accepts unknown dependencies under the lenient policy', () => {
    const store = new TodoStore({ dependencyPolicy: 'lenient' });
    const todo = store.create({ content: 'B', dependencies: ['ghost'] });

    expect(todo.dependencies).toEqual(['ghost']);
    expect(new Scheduler(store).readySet()).toEqual([]);
  });

  it('drops a removed todo from its dependents', () => {
    const store = new TodoStore();
    const a = store.create({ content: 'A' });
    const b = store.create({ content: 'B', dependencies: [a.id] });

    store.remove(a.id);

    expect(store.require(b.id).dependencies).toEqual([]);
    expect(new Scheduler(store).next()?.id).toBe(b.id);
  });

  it('appends feedback notes and keeps a feedback ledger', () => {
    const store = new TodoStore();
    const { id } = store.create({ content: 'A' });

    store.addFeedback(id, 'first');
    expect(store.addFeedback(id, 'second').feedback).toBe('first\nsecond');

    const entry = store.recordFeedback({ todoId: id, kind: 'manual', message: 'looks fine' });
    expect(store.getFeedbackEntry(entry.id)).toEqual(entry);
    expect(store.feedbackFor(id)).toEqual([entry]);
    expect(entry.suggestions).toEqual([]);
    expect(() => store.getFeedbackEntry('nope')).toThrow('Feedback entry not found: nope');
  });

  it('counts todos by status', () => {
    const store = new TodoStore();
    const a = store.create({ content: 'A' });
    const b = store.create({ content: 'B' });
    store.create({ content: 'C' });
    store.setStatus(a.id, 'completed');
    store.setStatus(b.id, 'failed');

    expect(store.statistics()).toEqual({ total: 3, pending: 1, inProgress: 0, completed: 1, failed: 1 });
    expect(store.byStatus('failed').map((t) => t.content)).toEqual(['B']);
  });
});

describe('Scheduler', () => {
  it('only releases a todo once its dependencies are completed', () => {
    const store = new TodoStore();
    const scheduler = new Scheduler(store);
    const a = store.create({ content: 'A' });
    const b = store.create({ content: 'B', dependencies: [a.id] });

    expect(scheduler.readySet().map((t) => t.id)).toEqual([a.id]);
    expect(scheduler.blocked()).toEqual([{ todo: store.require(b.id), waitingOn: [a.id] }]);

    store.setStatus(a.id, 'in_progress');
    expect(scheduler.readySet()).toEqual([]);

    store.setStatus(a.id, 'completed');
    expect(scheduler.readySet().map((t) => t.id)).toEqual([b.id]);
  });

  it('does not release dependents of a failed todo', () => {
    const store = new TodoStore();
    const scheduler = new Scheduler(store);
    const a = store.create({ content: 'A' });
    store.create({ content: 'B', dependencies: [a.id] });

    store.setStatus(a.id, 'failed');

    expect(scheduler.next()).toBeUndefined();
  });

  it('orders by priority, then creation order', () => {
    const store = new TodoStore();
    const scheduler = new Scheduler(store);
    store.create({ content: 'X', priority: 2 });
    store.create({ content: 'Y', priority: 1 });
    store.create({ content: 'Z', priority: 1 });

    expect(scheduler.readySet().map((t) => t.content)).toEqual(['Y', 'Z', 'X']);
    expect(scheduler.next()?.content).toBe('Y');
  });
});
