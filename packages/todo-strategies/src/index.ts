/**
 * @module @taskloop/todo-strategies
 * Built-in execution strategies, one per execution kind.
 *
 * @example
 * ```typescript
 * import { createDefaultStrategies } from '@taskloop/todo-strategies';
 * import { ExecutionRouter } from '@taskloop/todo-core';
 *
 * const router = new ExecutionRouter({ classifier, strategies: createDefaultStrategies() });
 * ```
 */

import type { ExecutionKind, ExecutionStrategy } from '@taskloop/todo-contracts';
import { MathStrategy } from './math-strategy.js';
import { FileStrategy, GenericStrategy, PlanningStrategy, ResearchStrategy } from './text-strategies.js';

export function createDefaultStrategies(): Record<ExecutionKind, ExecutionStrategy> {
  return {
    math: new MathStrategy(),
    file: new FileStrategy(),
    research: new ResearchStrategy(),
    planning: new PlanningStrategy(),
    generic: new GenericStrategy(),
  };
}

export { MathStrategy } from './math-strategy.js';
export {
  FileStrategy,
  ResearchStrategy,
  PlanningStrategy,
  GenericStrategy,
  extractResearchTopics,
  extractPlanningElements,
  PLANNING_CATEGORIES,
  analyzeGenericTodo,
} from './text-strategies.js';
export type { PlanningCategory, PlanningElements, GenericAnalysis } from './text-strategies.js';
export { evaluateExpression, extractExpressions, ExpressionSyntaxError } from './math-expression.js';
