/**
 * @module @taskloop/todo-classifier/query-classifier
 * Classifies a raw query for the deterministic fallback plan.
 */

import type { QueryCategory } from '@taskloop/todo-contracts';
import type { QueryRule } from './types.js';

export const DEFAULT_QUERY_RULES: QueryRule[] = [
  {
    category: 'arithmetic',
    keywords: ['calculate', 'compute'],
    // An operator touching a digit; a bare hyphen in prose does not count
    patterns: [/\d\s*[+\-*/=]/, /[+\-*/=]\s*\d/],
  },
  {
    category: 'planning',
    keywords: ['plan', 'organize', 'schedule', 'prepare'],
  },
];

export function classifyQuery(query: string, rules: QueryRule[] = DEFAULT_QUERY_RULES): QueryCategory {
  const lower = query.toLowerCase();

  for (const rule of rules) {
    if (rule.patterns?.some((pattern) => pattern.test(query))) {
      return rule.category;
    }
    if (rule.keywords.some((keyword) => lower.includes(keyword))) {
      return rule.category;
    }
  }

  return 'generic';
}
