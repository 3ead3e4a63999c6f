/**
 * @module @taskloop/progress-reporter/types
 * Type definitions for loop progress events.
 */

import type {
  GuidanceAction,
  LoopTermination,
  PlanEdit,
  RecoveryOutcome,
  TodoStatistics,
} from '@taskloop/todo-contracts';

/**
 * Progress event types.
 */
export type ProgressEventType =
  | 'run_started'
  | 'todo_started'
  | 'todo_completed'
  | 'todo_failed'
  | 'todo_recovered'
  | 'guidance_received'
  | 'plan_edited'
  | 'run_finished';

/**
 * Base progress event.
 */
export interface BaseProgressEvent {
  type: ProgressEventType;
  timestamp: number;
}

export interface RunStartedEvent extends BaseProgressEvent {
  type: 'run_started';
  data: {
    sessionId: string;
    query: string;
    todoCount: number;
  };
}

export interface TodoStartedEvent extends BaseProgressEvent {
  type: 'todo_started';
  data: {
    iteration: number;
    todoId: string;
    content: string;
  };
}

export interface TodoCompletedEvent extends BaseProgressEvent {
  type: 'todo_completed';
  data: {
    iteration: number;
    todoId: string;
    content: string;
    executionKind: string;
    durationMs: number;
  };
}

export interface TodoFailedEvent extends BaseProgressEvent {
  type: 'todo_failed';
  data: {
    iteration: number;
    todoId: string;
    content: string;
    error: string;
  };
}

export interface TodoRecoveredEvent extends BaseProgressEvent {
  type: 'todo_recovered';
  data: RecoveryOutcome;
}

export interface GuidanceReceivedEvent extends BaseProgressEvent {
  type: 'guidance_received';
  data: {
    action: GuidanceAction;
  };
}

export interface PlanEditedEvent extends BaseProgressEvent {
  type: 'plan_edited';
  data: PlanEdit;
}

export interface RunFinishedEvent extends BaseProgressEvent {
  type: 'run_finished';
  data: {
    termination: LoopTermination;
    iterations: number;
    statistics: TodoStatistics;
    totalDuration: number;
  };
}

/**
 * Union of all progress events.
 */
export type ProgressEvent =
  | RunStartedEvent
  | TodoStartedEvent
  | TodoCompletedEvent
  | TodoFailedEvent
  | TodoRecoveredEvent
  | GuidanceReceivedEvent
  | PlanEditedEvent
  | RunFinishedEvent;

/**
 * Progress callback function.
 */
export type ProgressCallback = (event: ProgressEvent) => void;
