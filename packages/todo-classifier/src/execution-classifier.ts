/**
 * @module @taskloop/todo-classifier/execution-classifier
 * Heuristic execution-kind classifier.
 *
 * Picks the strategy a todo should be dispatched to by inspecting its
 * content. First matching rule wins; no match means 'generic'.
 */

import type { ExecutionClassifier, ExecutionKind, Todo } from '@taskloop/todo-contracts';
import type { ExecutionRule } from './types.js';

const MATH_OPERATORS = ['+', '-', '*', '/', '=', '(', ')'];
const MATH_KEYWORDS = ['calculate', 'compute', 'solve', 'math'];

/**
 * Default rules, in evaluation order.
 */
export const DEFAULT_EXECUTION_RULES: ExecutionRule[] = [
  // Numbers joined by an operator, or operators next to an explicit math verb
  {
    kind: 'math',
    keywords: [],
    patterns: [/\d+\s*[+\-*/]\s*\d+/],
    test: (content) => {
      const lower = content.toLowerCase();
      return (
        MATH_OPERATORS.some((op) => content.includes(op)) &&
        MATH_KEYWORDS.some((keyword) => lower.includes(keyword))
      );
    },
  },
  {
    kind: 'file',
    keywords: ['create', 'write', 'save', 'file'],
  },
  {
    kind: 'research',
    keywords: ['research', 'find', 'search', 'gather', 'analyze'],
  },
  {
    kind: 'planning',
    keywords: ['plan', 'organize', 'schedule', 'prioritize'],
  },
];

/**
 * @example
 * ```typescript
 * const classifier = new HeuristicExecutionClassifier();
 * classifier.classifyContent('Calculate 15*3+10-5'); // 'math'
 * classifier.classifyContent('Write the summary to a file'); // 'file'
 * ```
 */
export class HeuristicExecutionClassifier implements ExecutionClassifier {
  constructor(private rules: ExecutionRule[] = DEFAULT_EXECUTION_RULES) {}

  classify(todo: Todo): ExecutionKind {
    return this.classifyContent(todo.content);
  }

  classifyContent(content: string): ExecutionKind {
    const lower = content.toLowerCase();

    for (const rule of this.rules) {
      if (rule.patterns?.some((pattern) => pattern.test(content))) {
        return rule.kind;
      }
      if (rule.test?.(content)) {
        return rule.kind;
      }
      if (rule.keywords.some((keyword) => lower.includes(keyword.toLowerCase()))) {
        return rule.kind;
      }
    }

    return 'generic';
  }
}
