/**
 * Tests for ProgressReporter
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import type { ILogger, LoopResult, RoutedExecution, Todo } from '@taskloop/todo-contracts';
import { ProgressReporter, describeRecovery } from '../reporter.js';
import type { ProgressEvent } from '../types.js';

// Mock logger
const createMockLogger = (): ILogger => ({
  info: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  debug: vi.fn(),
});

const todo: Todo = {
  id: 'todo-1',
  content: 'Calculate 2+2',
  status: 'in_progress',
  priority: 1,
  dependencies: [],
  createdAt: '2026-03-01T10:00:00.000Z',
  updatedAt: '2026-03-01T10:00:00.000Z',
  metadata: {},
};

const routed: RoutedExecution = {
  success: true,
  output: '2+2 = 4',
  feedback: 'Successfully calculated 1 mathematical expression(s)',
  executionKind: 'math',
  durationMs: 3,
};

const finished: LoopResult = {
  iterations: 2,
  termination: 'all_done',
  statistics: { total: 3, pending: 0, inProgress: 0, completed: 2, failed: 1 },
  completed: true,
  feedbackSummary: { totalRequests: 0, byKind: {}, timedOut: 0, averageLatencyMs: 0, interactive: false, recent: [] },
  blocked: [],
};

describe('ProgressReporter', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('Event emission', () => {
    it('should emit run_started event', () => {
      const events: ProgressEvent[] = [];
      const logger = createMockLogger();
      const reporter = new ProgressReporter(logger, (e) => events.push(e));

      reporter.onRunStarted({ sessionId: 'session-1', query: 'Calculate 2+2', todoCount: 1 });

      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({
        type: 'run_started',
        data: { sessionId: 'session-1', query: 'Calculate 2+2', todoCount: 1 },
      });
      expect(logger.info).toHaveBeenCalledWith('🎯 Run started: Calculate 2+2 (1 todos)');
    });

    it('should emit todo lifecycle events', () => {
      const events: ProgressEvent[] = [];
      const logger = createMockLogger();
      const reporter = new ProgressReporter(logger, (e) => events.push(e));

      reporter.onTodoStarted(1, todo);
      reporter.onTodoCompleted(1, { ...todo, status: 'completed' }, routed);

      expect(events.map((e) => e.type)).toEqual(['todo_started', 'todo_completed']);
      expect(events[1]).toMatchObject({
        data: { iteration: 1, todoId: 'todo-1', executionKind: 'math', durationMs: 3 },
      });
      expect(logger.info).toHaveBeenCalledWith('▶️  [1] Starting: Calculate 2+2');
      expect(logger.info).toHaveBeenCalledWith('✅ [1] Completed: Calculate 2+2');
    });

    it('should log failures as errors', () => {
      const logger = createMockLogger();
      const reporter = new ProgressReporter(logger);

      reporter.onTodoFailed(2, todo, 'division by zero');

      expect(reporter.getEvents()[0]).toMatchObject({ type: 'todo_failed', data: { error: 'division by zero' } });
      expect(logger.error).toHaveBeenCalledWith('❌ [2] Failed: division by zero');
    });

    it('should emit recovery and plan edit events', () => {
      const logger = createMockLogger();
      const reporter = new ProgressReporter(logger);

      reporter.onRecovery({ action: 'split', todoId: 'todo-1', createdIds: ['a', 'b'] });
      reporter.onPlanEdited({ type: 'add', todoId: 'todo-9' });

      expect(reporter.getEvents().map((e) => e.type)).toEqual(['todo_recovered', 'plan_edited']);
      expect(logger.info).toHaveBeenCalledWith('🔧 Recovery: split todo-1 into 2 subtask(s)');
      expect(logger.info).toHaveBeenCalledWith('📝 Plan edited: add');
    });

    it('should only log guidance that changes the plan', () => {
      const logger = createMockLogger();
      const reporter = new ProgressReporter(logger);

      reporter.onGuidance('continue');
      reporter.onGuidance('pause');

      expect(reporter.getEvents()).toHaveLength(2);
      expect(logger.info).toHaveBeenCalledTimes(1);
      expect(logger.info).toHaveBeenCalledWith('🧭 Guidance: pause');
    });

    it('should emit run_finished with the run duration', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-03-01T10:00:00.000Z'));
      const logger = createMockLogger();
      const reporter = new ProgressReporter(logger);

      reporter.onRunStarted({ sessionId: 'session-1', query: 'q', todoCount: 3 });
      vi.advanceTimersByTime(1500);
      reporter.onRunFinished(finished);

      const last = reporter.getEvents().at(-1);
      expect(last).toMatchObject({ type: 'run_finished', data: { totalDuration: 1500, iterations: 2 } });
      expect(logger.info).toHaveBeenCalledWith('✅ Run finished (all_done) after 2 iteration(s) in 1.5s');
      expect(logger.info).toHaveBeenCalledWith('📊 2/3 completed | 1 failed | 0 pending');
    });
  });

  describe('Termination emoji mapping', () => {
    it('should use correct emoji for each termination', () => {
      const logger = createMockLogger();
      const reporter = new ProgressReporter(logger);

      reporter.onRunFinished({ ...finished, termination: 'budget_exhausted' });
      expect(logger.info).toHaveBeenCalledWith(expect.stringContaining('⏳'));

      reporter.onRunFinished({ ...finished, termination: 'user_paused' });
      expect(logger.info).toHaveBeenCalledWith(expect.stringContaining('⏸️'));
    });
  });

  describe('describeRecovery', () => {
    it('should mention the suggestion that was followed', () => {
      expect(describeRecovery({ action: 'retried', todoId: 't', viaSuggestion: 2 })).toBe(
        'retrying t via suggestion 2',
      );
      expect(describeRecovery({ action: 'modified', todoId: 't', content: 'New text' })).toBe(
        "rewrote t as 'New text'",
      );
      expect(describeRecovery({ action: 'unchanged', todoId: 't', reason: 'todo is pending' })).toBe(
        'left t unchanged (todo is pending)',
      );
    });
  });

  describe('Event history', () => {
    it('should clear events', () => {
      const reporter = new ProgressReporter(createMockLogger());

      reporter.onTodoStarted(1, todo);
      reporter.onGuidance('continue');
      expect(reporter.getEvents()).toHaveLength(2);

      reporter.clear();
      expect(reporter.getEvents()).toHaveLength(0);
    });
  });
});
