/**
 * @module @taskloop/todo-core
 * Orchestration core for a growing set of interdependent todos.
 *
 * - **TodoStore / Scheduler**: todo lifecycle and dependency-aware ready queue
 * - **FeedbackGateway**: human gates with timeout fallback
 * - **FailureRecoveryPlanner**: failure → retry, skip, modify or break down
 * - **OrchestrationLoop**: the iteration-bounded driver
 * - **TaskloopAgent**: query in, plan run, result out
 */

export { TodoStore } from './store/todo-store.js';
export type { TodoStoreOptions } from './store/todo-store.js';
export { Scheduler } from './store/scheduler.js';

export { FeedbackGateway, DEFAULT_FEEDBACK_TIMEOUTS } from './feedback/feedback-gateway.js';
export type { FeedbackGatewayOptions, FeedbackTimeouts } from './feedback/feedback-gateway.js';
export {
  APPROVAL_OPTIONS,
  VALIDATION_OPTIONS,
  GUIDANCE_OPTIONS,
  ERROR_HANDLING_OPTIONS,
  kindDefault,
  normalizeApproval,
  normalizeValidation,
  normalizeGuidance,
  normalizeErrorHandling,
} from './feedback/responses.js';
export { ScriptedResponder, ConsoleResponder } from './feedback/responders.js';
export type { ScriptedAnswer, ConsoleResponderOptions } from './feedback/responders.js';
export { requestInputOrGiveUp, nonEmpty } from './feedback/input.js';

export { ExecutionRouter } from './execution/execution-router.js';
export type { ExecutionRouterOptions } from './execution/execution-router.js';

export { FailureRecoveryPlanner } from './recovery/failure-recovery-planner.js';
export type { FailureRecoveryPlannerOptions, FailureContext } from './recovery/failure-recovery-planner.js';

export { OrchestrationLoop, DEFAULT_LOOP_CONFIG } from './orchestration/orchestration-loop.js';
export type { OrchestrationLoopConfig, OrchestrationLoopDeps, RunContext } from './orchestration/orchestration-loop.js';
export { PlanEditor, parseEditChoice, parseIndex, parsePermutation } from './orchestration/plan-editor.js';
export type { PlanEditAction, PlanEditChoice } from './orchestration/plan-editor.js';

export type { Session } from './session/session.js';
export { SessionPlanner, fallbackPlan } from './session/session-planner.js';
export type { SessionPlannerOptions, PlannedTodo } from './session/session-planner.js';
export { parseReasoningSteps, extractTodoContent } from './session/step-parser.js';
export { TextReasoningProvider, buildReasoningPrompt } from './session/text-reasoning-provider.js';
export type { CompletionFn } from './session/text-reasoning-provider.js';

export { loadConfig, parseConfig, configFromEnv, renderConfigYaml, ENV_MAPPING } from './config/load-config.js';
export type { LoadConfigOptions } from './config/load-config.js';

export { createLogger, createPinoLogger, wrapLogger } from './logging/logger.js';
export type { LoggerConfig } from './logging/logger.js';

export { createSnapshot, serializeSnapshot } from './export/snapshot.js';
export type { SessionSnapshot } from './export/snapshot.js';

export { TaskloopAgent } from './agent.js';
export type { TaskloopAgentOptions, ProcessResult, AgentStatus, TodosSummary } from './agent.js';
