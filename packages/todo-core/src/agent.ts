/**
 * @module @taskloop/todo-core/agent
 * TaskloopAgent: one object that plans a query, runs the loop and reports.
 *
 * @example
 * ```typescript
 * const agent = new TaskloopAgent({ config: { maxIterations: 5 } });
 * const { result } = await agent.processQuery('Calculate 15*3+10-5');
 * console.log(result.statistics);
 * ```
 */

import { HeuristicExecutionClassifier, RuleBasedRemediationAdvisor } from '@taskloop/todo-classifier';
import type {
  ExecutionClassifier,
  ExecutionHistoryEntry,
  ExecutionKind,
  ExecutionStrategy,
  ExecutionSummary,
  FeedbackEntry,
  FeedbackResponder,
  FeedbackSummary,
  ILogger,
  LoopObserver,
  LoopResult,
  PlanSource,
  ReasoningProvider,
  RemediationAdvisor,
  SessionStatus,
  BlockedTodo,
  TaskloopConfig,
  TaskloopConfigInput,
  Todo,
  TodoStatistics,
} from '@taskloop/todo-contracts';
import { createDefaultStrategies } from '@taskloop/todo-strategies';
import { parseConfig } from './config/load-config.js';
import { ExecutionRouter } from './execution/execution-router.js';
import { createSnapshot, type SessionSnapshot } from './export/snapshot.js';
import { FeedbackGateway } from './feedback/feedback-gateway.js';
import { createLogger } from './logging/logger.js';
import { OrchestrationLoop } from './orchestration/orchestration-loop.js';
import { FailureRecoveryPlanner } from './recovery/failure-recovery-planner.js';
import type { Session } from './session/session.js';
import { SessionPlanner } from './session/session-planner.js';
import { Scheduler } from './store/scheduler.js';

export interface TaskloopAgentOptions {
  config?: TaskloopConfigInput;
  provider?: ReasoningProvider;
  responder?: FeedbackResponder;
  classifier?: ExecutionClassifier;
  strategies?: Partial<Record<ExecutionKind, ExecutionStrategy>>;
  advisor?: RemediationAdvisor;
  observer?: LoopObserver;
  logger?: ILogger;
}

export interface ProcessResult {
  session: Session;
  result: LoopResult;
  executionHistory: readonly ExecutionHistoryEntry[];
}

export interface AgentStatus {
  sessionId?: string;
  query?: string;
  sessionStatus?: SessionStatus;
  planSource?: PlanSource;
  statistics: TodoStatistics;
  readyCount: number;
  blocked: BlockedTodo[];
  lastResult?: LoopResult;
  feedback: FeedbackSummary;
  execution: ExecutionSummary;
  config: Pick<TaskloopConfig, 'maxIterations' | 'interactive' | 'autoApprove' | 'guidanceInterval'>;
}

export interface TodosSummary {
  pending: Todo[];
  inProgress: Todo[];
  completed: Todo[];
  failed: Todo[];
  statistics: TodoStatistics;
}

const EMPTY_STATISTICS: TodoStatistics = { total: 0, pending: 0, inProgress: 0, completed: 0, failed: 0 };

export class TaskloopAgent {
  readonly config: TaskloopConfig;
  readonly gateway: FeedbackGateway;
  private readonly router: ExecutionRouter;
  private readonly advisor: RemediationAdvisor;
  private readonly planner: SessionPlanner;
  private readonly observer?: LoopObserver;
  private readonly logger: ILogger;

  private session?: Session;
  private loop?: OrchestrationLoop;
  private lastResult?: LoopResult;

  /**
   * @throws ConfigError for invalid config input
   */
  constructor(options: TaskloopAgentOptions = {}) {
    this.config = parseConfig(options.config ?? {});
    this.logger = options.logger ?? createLogger({ level: this.config.logLevel, module: 'agent' });
    this.observer = options.observer;

    this.gateway = new FeedbackGateway({
      interactive: this.config.interactive,
      autoApprove: this.config.autoApprove,
      responder: options.responder,
      timeouts: {
        defaultMs: this.config.timeouts.defaultSeconds * 1000,
        inputMs: this.config.timeouts.inputSeconds * 1000,
      },
      maxInputAttempts: this.config.maxInputAttempts,
      logger: this.logger,
    });
    this.router = new ExecutionRouter({
      classifier: options.classifier ?? new HeuristicExecutionClassifier(),
      strategies: { ...createDefaultStrategies(), ...options.strategies },
      logger: this.logger,
    });
    this.advisor = options.advisor ?? new RuleBasedRemediationAdvisor();
    this.planner = new SessionPlanner({
      provider: options.provider,
      thinkingDepth: this.config.thinkingDepth,
      dependencyPolicy: this.config.dependencyPolicy,
      logger: this.logger,
    });
  }

  async processQuery(query: string): Promise<ProcessResult> {
    this.logger.info('Processing query', { query });
    this.gateway.clear();
    this.router.clear();

    const session = await this.planner.createSession(query);
    this.session = session;
    this.loop = this.createLoop(session);
    this.lastResult = undefined;

    return this.runLoop(session, this.loop);
  }

  /** Resumes the current session, e.g. after a pause or an exhausted budget */
  async continueProcess(): Promise<ProcessResult> {
    if (!this.session || !this.loop) {
      throw new Error('No active session, call processQuery() first');
    }
    this.session.status = 'active';
    return this.runLoop(this.session, this.loop);
  }

  status(): AgentStatus {
    const session = this.session;
    const scheduler = session ? new Scheduler(session.store) : undefined;

    return {
      sessionId: session?.id,
      query: session?.query,
      sessionStatus: session?.status,
      planSource: session?.planSource,
      statistics: session ? session.store.statistics() : { ...EMPTY_STATISTICS },
      readyCount: scheduler ? scheduler.readySet().length : 0,
      blocked: scheduler ? scheduler.blocked() : [],
      lastResult: this.lastResult,
      feedback: this.gateway.summary(),
      execution: this.router.summary(),
      config: {
        maxIterations: this.config.maxIterations,
        interactive: this.gateway.isInteractive(),
        autoApprove: this.config.autoApprove,
        guidanceInterval: this.config.guidanceInterval,
      },
    };
  }

  todosSummary(): TodosSummary {
    const store = this.session?.store;
    return {
      pending: store ? store.byStatus('pending') : [],
      inProgress: store ? store.byStatus('in_progress') : [],
      completed: store ? store.byStatus('completed') : [],
      failed: store ? store.byStatus('failed') : [],
      statistics: store ? store.statistics() : { ...EMPTY_STATISTICS },
    };
  }

  /**
   * @throws NotFoundError when the todo is not part of the current session
   */
  addManualFeedback(todoId: string, text: string): FeedbackEntry {
    if (!this.session) {
      throw new Error('No active session, call processQuery() first');
    }
    const entry = this.session.store.recordFeedback({ todoId, kind: 'manual', message: text });
    this.session.store.addFeedback(todoId, text);
    return entry;
  }

  snapshot(): SessionSnapshot | undefined {
    if (!this.session) {
      return undefined;
    }
    return createSnapshot(this.session, {
      result: this.lastResult,
      executionHistory: this.loop?.history(),
    });
  }

  reset(): void {
    this.session = undefined;
    this.loop = undefined;
    this.lastResult = undefined;
    this.gateway.clear();
    this.router.clear();
  }

  private createLoop(session: Session): OrchestrationLoop {
    const scheduler = new Scheduler(session.store);
    const recovery = new FailureRecoveryPlanner({
      store: session.store,
      gateway: this.gateway,
      advisor: this.advisor,
      logger: this.logger,
    });

    return new OrchestrationLoop(
      {
        store: session.store,
        scheduler,
        gateway: this.gateway,
        router: this.router,
        recovery,
        logger: this.logger,
        observer: this.observer,
      },
      {
        maxIterations: this.config.maxIterations,
        approvalGate: this.config.approvalGate,
        validationGate: this.config.validationGate,
        guidanceInterval: this.config.guidanceInterval,
      },
    );
  }

  private async runLoop(session: Session, loop: OrchestrationLoop): Promise<ProcessResult> {
    const result = await loop.run({ sessionId: session.id, query: session.query });

    session.status =
      result.termination === 'user_paused' ? 'paused' : result.termination === 'all_done' ? 'completed' : 'active';
    session.updatedAt = new Date().toISOString();
    this.lastResult = result;

    return { session, result, executionHistory: loop.history() };
  }
}
