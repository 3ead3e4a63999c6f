/**
 * Commander option parsing and the mapping from flags to config overrides.
 */

import { InvalidArgumentError } from 'commander';
import { LogLevelSchema } from '@taskloop/todo-contracts';
import type { LogLevel, TaskloopConfigInput } from '@taskloop/todo-contracts';

export interface RunOptions {
  maxIterations?: number;
  thinkingDepth?: number;
  interactive?: boolean;
  autoApprove?: boolean;
  config?: string;
  saveResult?: string;
  logLevel?: LogLevel;
}

export function parseIntegerOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function parseLogLevelOption(value: string): LogLevel {
  const parsed = LogLevelSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Expected one of: ${LogLevelSchema.options.join(', ')}.`);
  }
  return parsed.data;
}

/** Only flags the user actually passed override file and environment settings */
export function toConfigOverrides(options: RunOptions): TaskloopConfigInput {
  const overrides: TaskloopConfigInput = {};
  if (options.maxIterations !== undefined) {
    overrides.maxIterations = options.maxIterations;
  }
  if (options.thinkingDepth !== undefined) {
    overrides.thinkingDepth = options.thinkingDepth;
  }
  if (options.interactive !== undefined) {
    overrides.interactive = options.interactive;
  }
  if (options.autoApprove !== undefined) {
    overrides.autoApprove = options.autoApprove;
  }
  if (options.logLevel !== undefined) {
    overrides.logLevel = options.logLevel;
  }
  return overrides;
}
