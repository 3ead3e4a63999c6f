/**
 * @module @taskloop/todo-classifier/types
 * Rule shapes for the heuristic classifiers.
 */

import type { ExecutionKind, QueryCategory, RemediationKind } from '@taskloop/todo-contracts';

/**
 * Execution classification rule. A rule matches when any keyword is found,
 * any pattern matches, or `test` returns true. Rules are evaluated in order.
 */
export interface ExecutionRule {
  kind: ExecutionKind;
  /** Case-insensitive substrings */
  keywords: string[];
  patterns?: RegExp[];
  test?: (content: string) => boolean;
}

export interface QueryRule {
  category: Exclude<QueryCategory, 'generic'>;
  keywords: string[];
  patterns?: RegExp[];
}

/**
 * Maps error text onto a remediation suggestion.
 */
export interface RemediationRule {
  /** Case-insensitive substrings of the error text */
  keywords: string[];
  suggestion: string;
}

/**
 * Maps suggestion text back onto the action it implies.
 */
export interface RemediationKindRule {
  kind: Exclude<RemediationKind, 'retry'>;
  pattern: RegExp;
}
