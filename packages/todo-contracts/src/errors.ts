/**
 * Error taxonomy.
 *
 * Only NotFoundError, DependencyError, ValidationExhaustedError and
 * ConfigError ever reach a caller. ExecutionError is raised by strategies and
 * converted into a failed execution result by the router.
 */

export type TaskloopErrorCode =
  | 'NOT_FOUND'
  | 'DEPENDENCY'
  | 'VALIDATION_EXHAUSTED'
  | 'EXECUTION'
  | 'CONFIG';

export abstract class TaskloopError extends Error {
  abstract readonly code: TaskloopErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends TaskloopError {
  readonly code = 'NOT_FOUND';

  constructor(
    readonly entity: 'todo' | 'feedback',
    readonly id: string,
  ) {
    super(`${entity === 'todo' ? 'Todo' : 'Feedback entry'} not found: ${id}`);
  }
}

export class DependencyError extends TaskloopError {
  readonly code = 'DEPENDENCY';

  constructor(readonly dependencyIds: readonly string[]) {
    super(`Unknown dependency id(s): ${dependencyIds.join(', ')}`);
  }
}

export class ValidationExhaustedError extends TaskloopError {
  readonly code = 'VALIDATION_EXHAUSTED';

  constructor(
    readonly attempts: number,
    readonly lastResponse: string,
  ) {
    super(`Input rejected ${attempts} time(s), giving up`);
  }
}

export class ExecutionError extends TaskloopError {
  readonly code = 'EXECUTION';

  constructor(
    message: string,
    readonly hint?: string,
  ) {
    super(message);
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigError extends TaskloopError {
  readonly code = 'CONFIG';

  constructor(
    readonly issues: readonly ConfigIssue[],
    source?: string,
  ) {
    super(
      `Invalid configuration${source ? ` in ${source}` : ''}: ` +
        issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; '),
    );
  }
}

export function isTaskloopError(error: unknown): error is TaskloopError {
  return error instanceof TaskloopError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
