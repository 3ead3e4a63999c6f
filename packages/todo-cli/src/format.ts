import type { TodoStatus } from '@taskloop/todo-contracts';
import type { ProcessResult } from '@taskloop/todo-core';

const STATUS_ICONS: Record<TodoStatus, string> = {
  completed: '✅',
  failed: '❌',
  in_progress: '🔄',
  pending: '⏳',
};

export function formatResult({ session, result }: ProcessResult): string[] {
  const { statistics } = result;
  const lines = [
    '',
    `📋 Query: ${session.query}`,
    `Plan: ${session.planSource} (${statistics.total} todos)`,
    `Termination: ${result.termination} after ${result.iterations} iteration(s)`,
    `Todos: ${statistics.completed} completed, ${statistics.failed} failed, ${statistics.pending} pending`,
    ...session.store.all().map((todo) => `  ${STATUS_ICONS[todo.status]} ${todo.content}`),
  ];
  if (result.blocked.length > 0) {
    lines.push(`Blocked: ${result.blocked.length} todo(s) waiting on unfinished dependencies`);
  }
  if (result.termination === 'budget_exhausted') {
    lines.push('Iteration budget spent; raise --max-iterations to run more of the plan.');
  }
  return lines;
}
