import { ExecutionError } from '@taskloop/todo-contracts';
import type { ExecutionOutcome, ExecutionStrategy, Todo } from '@taskloop/todo-contracts';
import { evaluateExpression, extractExpressions } from './math-expression.js';

/**
 * Evaluates every arithmetic expression found in a todo.
 *
 * Partial success is still success; the todo only fails when no expression
 * could be evaluated at all.
 */
export class MathStrategy implements ExecutionStrategy {
  readonly kind = 'math' as const;

  async execute(todo: Todo): Promise<ExecutionOutcome> {
    const expressions = extractExpressions(todo.content);

    if (expressions.length === 0) {
      return {
        success: true,
        output:
          'Math todo identified but no clear expressions found. Consider breaking down into specific calculations.',
        feedback: 'Todo appears to be math-related but needs more specific expressions',
        details: { executionType: 'math_guidance', originalContent: todo.content },
      };
    }

    const results: Record<string, number | string> = {};
    const lines: string[] = [];
    const errors: string[] = [];

    for (const expression of expressions) {
      try {
        const value = evaluateExpression(expression);
        results[expression] = value;
        lines.push(`${expression} = ${value}`);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        results[expression] = `Error: ${message}`;
        lines.push(`${expression} → Error: ${message}`);
        errors.push(message);
      }
    }

    if (errors.length === expressions.length) {
      throw new ExecutionError(errors.join('; '), 'Rewrite the todo with a well-formed expression');
    }

    const calculated = expressions.length - errors.length;
    return {
      success: true,
      output: lines.join('\n'),
      feedback: `Successfully calculated ${calculated} mathematical expression(s)`,
      details: { executionType: 'math_calculation', expressions: results },
    };
  }
}
