/**
 * @module @taskloop/todo-classifier/remediation-advisor
 * Rule-based remediation suggestions for failed todos.
 */

import type { RemediationAdvisor, RemediationKind, Todo } from '@taskloop/todo-contracts';
import type { RemediationKindRule, RemediationRule } from './types.js';

export const SUGGEST_RETRY_LATER = 'Retry the todo once the external service is reachable';
export const SUGGEST_REPHRASE = 'Modify the todo to state the task more precisely';
export const SUGGEST_BREAK_DOWN = 'Break the todo down into smaller subtasks';
export const SUGGEST_SKIP = 'Skip this todo and handle it manually';

export const DEFAULT_REMEDIATION_RULES: RemediationRule[] = [
  {
    keywords: ['timeout', 'timed out', 'network', 'unavailable', 'rate limit', 'econn'],
    suggestion: SUGGEST_RETRY_LATER,
  },
  {
    keywords: ['invalid', 'cannot evaluate', 'parse', 'syntax', 'unsupported', 'malformed', 'no expression'],
    suggestion: SUGGEST_REPHRASE,
  },
  {
    keywords: ['too large', 'too complex', 'breaking it down', 'smaller steps', 'out of scope'],
    suggestion: SUGGEST_BREAK_DOWN,
  },
  {
    keywords: ['permission', 'denied', 'not allowed', 'forbidden'],
    suggestion: SUGGEST_SKIP,
  },
];

/**
 * Order matters: "break ... smaller" must win over a generic "change".
 */
export const DEFAULT_REMEDIATION_KIND_RULES: RemediationKindRule[] = [
  { kind: 'break_down', pattern: /\b(break|split|smaller|subtasks?|decompos\w*)\b/i },
  { kind: 'modify', pattern: /\b(modify|rephrase|reword|clarify|precise(ly)?|change|edit)\b/i },
  { kind: 'skip', pattern: /\b(skip|ignore|manually)\b/i },
];

export interface RemediationAdvisorOptions {
  rules?: RemediationRule[];
  kindRules?: RemediationKindRule[];
  /** Word count above which splitting is suggested regardless of the error */
  longContentWords?: number;
  maxSuggestions?: number;
}

/**
 * @example
 * ```typescript
 * const advisor = new RuleBasedRemediationAdvisor();
 * advisor.suggest(todo, 'Request timed out');
 * // ['Retry the todo once the external service is reachable']
 * advisor.classify('Break the todo down into smaller subtasks'); // 'break_down'
 * ```
 */
export class RuleBasedRemediationAdvisor implements RemediationAdvisor {
  private readonly rules: RemediationRule[];
  private readonly kindRules: RemediationKindRule[];
  private readonly longContentWords: number;
  private readonly maxSuggestions: number;

  constructor(options: RemediationAdvisorOptions = {}) {
    this.rules = options.rules ?? DEFAULT_REMEDIATION_RULES;
    this.kindRules = options.kindRules ?? DEFAULT_REMEDIATION_KIND_RULES;
    this.longContentWords = options.longContentWords ?? 15;
    this.maxSuggestions = options.maxSuggestions ?? 3;
  }

  suggest(todo: Todo, error: string | undefined): string[] {
    const errorText = (error ?? '').toLowerCase();
    const suggestions: string[] = [];

    for (const rule of this.rules) {
      if (rule.keywords.some((keyword) => errorText.includes(keyword))) {
        suggestions.push(rule.suggestion);
      }
    }

    if (todo.content.trim().split(/\s+/).length > this.longContentWords) {
      suggestions.push(SUGGEST_BREAK_DOWN);
    }

    if (suggestions.length === 0) {
      suggestions.push(SUGGEST_REPHRASE, SUGGEST_BREAK_DOWN);
    }

    return [...new Set(suggestions)].slice(0, this.maxSuggestions);
  }

  classify(suggestion: string): RemediationKind {
    for (const rule of this.kindRules) {
      if (rule.pattern.test(suggestion)) {
        return rule.kind;
      }
    }
    return 'retry';
  }
}
