/**
 * @module @taskloop/todo-classifier
 * Heuristic classifiers used around the orchestration core.
 *
 * - **Execution**: which strategy should run a todo
 * - **Query**: which fallback plan fits a query when reasoning is unavailable
 * - **Remediation**: what to suggest after a failure, and what a suggestion means
 *
 * @example
 * ```typescript
 * import { HeuristicExecutionClassifier, classifyQuery } from '@taskloop/todo-classifier';
 *
 * new HeuristicExecutionClassifier().classifyContent('Research caching'); // 'research'
 * classifyQuery('Plan a team offsite'); // 'planning'
 * ```
 */

export { HeuristicExecutionClassifier, DEFAULT_EXECUTION_RULES } from './execution-classifier.js';
export { classifyQuery, DEFAULT_QUERY_RULES } from './query-classifier.js';
export {
  RuleBasedRemediationAdvisor,
  DEFAULT_REMEDIATION_RULES,
  DEFAULT_REMEDIATION_KIND_RULES,
  SUGGEST_BREAK_DOWN,
  SUGGEST_REPHRASE,
  SUGGEST_RETRY_LATER,
  SUGGEST_SKIP,
} from './remediation-advisor.js';
export type { RemediationAdvisorOptions } from './remediation-advisor.js';

export type { ExecutionRule, QueryRule, RemediationRule, RemediationKindRule } from './types.js';
