import type {
  ExecutionHistoryEntry,
  FeedbackEntry,
  LoopResult,
  PlanSource,
  ReasoningStep,
  SessionStatus,
  Todo,
} from '@taskloop/todo-contracts';
import type { Session } from '../session/session.js';

/** JSON-safe export of a session: plain data, ISO timestamps */
export interface SessionSnapshot {
  sessionId: string;
  query: string;
  planSource: PlanSource;
  status: SessionStatus;
  createdAt: string;
  updatedAt: string;
  exportedAt: string;
  steps: ReasoningStep[];
  todos: Todo[];
  feedbackEntries: FeedbackEntry[];
  result?: LoopResult;
  executionHistory: ExecutionHistoryEntry[];
}

export function createSnapshot(
  session: Session,
  run: { result?: LoopResult; executionHistory?: readonly ExecutionHistoryEntry[] } = {},
): SessionSnapshot {
  const todos = session.store.all();
  return {
    sessionId: session.id,
    query: session.query,
    planSource: session.planSource,
    status: session.status,
    createdAt: session.createdAt,
    updatedAt: session.updatedAt,
    exportedAt: new Date().toISOString(),
    steps: [...session.steps],
    todos,
    feedbackEntries: todos.flatMap((todo) => session.store.feedbackFor(todo.id)),
    result: run.result,
    executionHistory: [...(run.executionHistory ?? [])],
  };
}

export function serializeSnapshot(snapshot: SessionSnapshot): string {
  return JSON.stringify(snapshot, null, 2);
}
