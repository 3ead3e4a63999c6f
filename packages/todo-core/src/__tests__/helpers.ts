import { vi } from 'vitest';
import type {
  ExecutionClassifier,
  ExecutionKind,
  ExecutionOutcome,
  ExecutionStrategy,
  ILogger,
  LoopObserver,
  Todo,
} from '@taskloop/todo-contracts';
import { RuleBasedRemediationAdvisor } from '@taskloop/todo-classifier';
import { ExecutionRouter } from '../execution/execution-router.js';
import { FeedbackGateway, type FeedbackGatewayOptions } from '../feedback/feedback-gateway.js';
import { OrchestrationLoop, type OrchestrationLoopConfig } from '../orchestration/orchestration-loop.js';
import { FailureRecoveryPlanner } from '../recovery/failure-recovery-planner.js';
import { Scheduler } from '../store/scheduler.js';
import { TodoStore } from '../store/todo-store.js';

export const createMockLogger = (): ILogger => ({
  info: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  debug: vi.fn(),
});

/** Every todo classifies as generic */
export const genericClassifier: ExecutionClassifier = { classify: () => 'generic' };

export function strategy(
  kind: ExecutionKind,
  run: (todo: Todo) => ExecutionOutcome | Promise<ExecutionOutcome> = () => ({ success: true, feedback: 'done' }),
): ExecutionStrategy {
  return { kind, execute: async (todo) => run(todo) };
}

export interface Harness {
  store: TodoStore;
  scheduler: Scheduler;
  gateway: FeedbackGateway;
  router: ExecutionRouter;
  recovery: FailureRecoveryPlanner;
  loop: OrchestrationLoop;
  logger: ILogger;
}

export function makeHarness(
  options: {
    gateway?: FeedbackGatewayOptions;
    loop?: Partial<OrchestrationLoopConfig>;
    execute?: (todo: Todo) => ExecutionOutcome | Promise<ExecutionOutcome>;
    observer?: LoopObserver;
  } = {},
): Harness {
  const logger = createMockLogger();
  const store = new TodoStore();
  const scheduler = new Scheduler(store);
  const gateway = new FeedbackGateway({ logger, ...options.gateway });
  const router = new ExecutionRouter({
    classifier: genericClassifier,
    strategies: { generic: strategy('generic', options.execute) },
    logger,
  });
  const recovery = new FailureRecoveryPlanner({
    store,
    gateway,
    advisor: new RuleBasedRemediationAdvisor(),
    logger,
  });
  const loop = new OrchestrationLoop(
    { store, scheduler, gateway, router, recovery, logger, observer: options.observer },
    options.loop,
  );

  return { store, scheduler, gateway, router, recovery, loop, logger };
}
