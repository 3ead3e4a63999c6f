import type { PlanSource, ReasoningStep, SessionStatus } from '@taskloop/todo-contracts';
import type { TodoStore } from '../store/todo-store.js';

/**
 * One query's working state. The todo set lives in the session's own store
 * and keeps growing through plan edits and break-downs.
 */
export interface Session {
  readonly id: string;
  readonly query: string;
  readonly steps: readonly ReasoningStep[];
  readonly store: TodoStore;
  readonly planSource: PlanSource;
  status: SessionStatus;
  readonly createdAt: string;
  updatedAt: string;
}
