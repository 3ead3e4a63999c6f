/**
 * @module @taskloop/todo-core/feedback/responses
 * Maps raw response strings onto the closed decision unions.
 *
 * Matching is case-insensitive on the trimmed response. Each table lists
 * accepted synonyms; anything else falls through to the per-gate fallback.
 */

import type {
  ApprovalDecision,
  ErrorHandlingDecision,
  FeedbackKind,
  GuidanceAction,
  ValidationDecision,
} from '@taskloop/todo-contracts';

export const APPROVAL_OPTIONS = ['yes', 'no', 'skip', 'modify'] as const;
export const VALIDATION_OPTIONS = ['accept', 'retry', 'modify', 'skip'] as const;
export const GUIDANCE_OPTIONS = [
  'continue',
  'skip_current',
  'reorder',
  'add_todo',
  'remove_todo',
  'modify',
  'pause',
] as const;
export const ERROR_HANDLING_OPTIONS = ['retry', 'skip', 'modify_todo', 'break_down'] as const;

/**
 * Used when the gateway is non-interactive and the request carries no
 * default of its own.
 */
export function kindDefault(kind: FeedbackKind, options: readonly string[]): string {
  switch (kind) {
    case 'approval':
      return 'no';
    case 'validation':
      return 'accept';
    case 'guidance':
      return 'continue';
    case 'choice':
      return options[0] ?? 'skip';
    case 'input':
      return '';
    case 'review':
      return 'accept';
  }
}

const APPROVAL_SYNONYMS: Record<string, ApprovalDecision> = {
  yes: 'approve',
  y: 'approve',
  approve: 'approve',
  proceed: 'approve',
  ok: 'approve',
  no: 'reject',
  n: 'reject',
  reject: 'reject',
  skip: 'skip',
  modify: 'modify',
};

const VALIDATION_SYNONYMS: Record<string, ValidationDecision> = {
  accept: 'accept',
  good: 'accept',
  yes: 'accept',
  ok: 'accept',
  retry: 'retry',
  redo: 'retry',
  modify: 'modify',
  change: 'modify',
  skip: 'skip',
};

const GUIDANCE_SYNONYMS: Record<string, GuidanceAction> = {
  continue: 'continue',
  proceed: 'continue',
  next: 'continue',
  skip_current: 'skip_current',
  skip: 'skip_current',
  reorder: 'reorder',
  add_todo: 'add_todo',
  remove_todo: 'remove_todo',
  modify: 'modify',
  modify_plan: 'modify',
  edit: 'modify',
  pause: 'pause',
  stop: 'pause',
  halt: 'pause',
};

const ERROR_HANDLING_SYNONYMS: Record<string, ErrorHandlingDecision> = {
  retry: { action: 'retry' },
  try_again: { action: 'retry' },
  skip: { action: 'skip' },
  ignore: { action: 'skip' },
  modify_todo: { action: 'modify' },
  modify: { action: 'modify' },
  break_down: { action: 'break_down' },
  split: { action: 'break_down' },
};

function lookup<T>(table: Record<string, T>, response: string): T | undefined {
  const key = response.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

/** Unknown answers reject: execution needs an explicit yes */
export function normalizeApproval(response: string): ApprovalDecision {
  return lookup(APPROVAL_SYNONYMS, response) ?? 'reject';
}

/** Unknown answers accept the result */
export function normalizeValidation(response: string): ValidationDecision {
  return lookup(VALIDATION_SYNONYMS, response) ?? 'accept';
}

/** Unknown answers pause the run */
export function normalizeGuidance(response: string): GuidanceAction {
  return lookup(GUIDANCE_SYNONYMS, response) ?? 'pause';
}

/**
 * `suggestion_N` resolves to the N-th (1-based) suggestion when it exists.
 * Everything unrecognized retries.
 */
export function normalizeErrorHandling(response: string, suggestionCount: number): ErrorHandlingDecision {
  const key = response.trim().toLowerCase();
  const match = /^suggestion_(\d+)$/.exec(key);
  if (match) {
    const index = Number(match[1]);
    if (index >= 1 && index <= suggestionCount) {
      return { action: 'suggestion', index };
    }
    return { action: 'retry' };
  }
  return lookup(ERROR_HANDLING_SYNONYMS, key) ?? { action: 'retry' };
}
