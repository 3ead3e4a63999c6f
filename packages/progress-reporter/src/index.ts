/**
 * @module @taskloop/progress-reporter
 * UX-only progress events for the orchestration loop.
 *
 * Plug a ProgressReporter in as the loop observer; it logs emoji progress
 * lines and forwards typed events to an optional callback.
 *
 * @example
 * ```typescript
 * import { ProgressReporter } from '@taskloop/progress-reporter';
 * import { TaskloopAgent, createLogger } from '@taskloop/todo-core';
 *
 * const logger = createLogger({ pretty: true });
 *
 * // CLI usage
 * const agent = new TaskloopAgent({ observer: new ProgressReporter(logger), logger });
 *
 * // Streaming usage (with callback)
 * const reporter = new ProgressReporter(logger, (event) => {
 *   ws.send(JSON.stringify(event));
 * });
 * ```
 */

export { ProgressReporter, describeRecovery } from './reporter.js';

export type {
  ProgressEvent,
  ProgressEventType,
  ProgressCallback,
  RunStartedEvent,
  TodoStartedEvent,
  TodoCompletedEvent,
  TodoFailedEvent,
  TodoRecoveredEvent,
  GuidanceReceivedEvent,
  PlanEditedEvent,
  RunFinishedEvent,
} from './types.js';
