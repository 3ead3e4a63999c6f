/**
 * @module @taskloop/todo-core/feedback/feedback-gateway
 * Human-in-the-loop checkpoint broker.
 *
 * Every gate the orchestration loop opens goes through here: approval before
 * execution, validation after it, plan guidance, error handling and free
 * text. In non-interactive mode requests resolve to their defaults without
 * blocking. In interactive mode a FeedbackResponder is awaited under a
 * timeout that falls back to the default.
 *
 * @example
 * ```typescript
 * const gateway = new FeedbackGateway({ interactive: true, responder: new ConsoleResponder() });
 * const decision = await gateway.requestApproval(todo, { executionKind: 'math' });
 * if (decision === 'approve') { ... }
 * ```
 */

import { ValidationExhaustedError, errorMessage, noopLogger } from '@taskloop/todo-contracts';
import type {
  ApprovalContext,
  ApprovalDecision,
  ErrorHandlingDecision,
  ExecutionOutcome,
  FeedbackKind,
  FeedbackRequest,
  FeedbackRequestParams,
  FeedbackResolution,
  FeedbackResponder,
  FeedbackSummary,
  GuidanceAction,
  ILogger,
  InputRequestOptions,
  Todo,
  ValidationDecision,
} from '@taskloop/todo-contracts';
import {
  APPROVAL_OPTIONS,
  ERROR_HANDLING_OPTIONS,
  GUIDANCE_OPTIONS,
  VALIDATION_OPTIONS,
  kindDefault,
  normalizeApproval,
  normalizeErrorHandling,
  normalizeGuidance,
  normalizeValidation,
} from './responses.js';

export interface FeedbackTimeouts {
  defaultMs: number;
  inputMs: number;
}

export interface FeedbackGatewayOptions {
  interactive?: boolean;
  /** Approval requests resolve to yes without asking */
  autoApprove?: boolean;
  responder?: FeedbackResponder;
  timeouts?: Partial<FeedbackTimeouts>;
  maxInputAttempts?: number;
  logger?: ILogger;
}

export const DEFAULT_FEEDBACK_TIMEOUTS: FeedbackTimeouts = {
  defaultMs: 30_000,
  inputMs: 60_000,
};

const VALIDATION_OUTPUT_LIMIT = 200;
const SUMMARY_MESSAGE_LIMIT = 100;

type AskOutcome =
  | { type: 'answer'; response: string }
  | { type: 'error'; error: unknown }
  | { type: 'timeout' };

export class FeedbackGateway {
  private readonly requests: FeedbackRequest[] = [];
  private readonly timeouts: FeedbackTimeouts;
  private readonly maxInputAttempts: number;
  private readonly logger: ILogger;
  private interactive: boolean;
  private autoApprove: boolean;
  private responder: FeedbackResponder | undefined;
  private counter = 0;

  constructor(options: FeedbackGatewayOptions = {}) {
    this.interactive = options.interactive ?? false;
    this.autoApprove = options.autoApprove ?? false;
    this.responder = options.responder;
    this.timeouts = { ...DEFAULT_FEEDBACK_TIMEOUTS, ...options.timeouts };
    this.maxInputAttempts = options.maxInputAttempts ?? 3;
    this.logger = options.logger ?? noopLogger;
  }

  setInteractive(enabled: boolean, responder?: FeedbackResponder): void {
    this.interactive = enabled;
    if (responder) {
      this.responder = responder;
    }
  }

  setAutoApprove(enabled: boolean): void {
    this.autoApprove = enabled;
  }

  /** Interactive mode without a responder behaves as non-interactive */
  isInteractive(): boolean {
    return this.interactive && this.responder !== undefined;
  }

  async request(params: FeedbackRequestParams): Promise<string> {
    this.counter += 1;
    const options = [...(params.options ?? [])];
    const timeoutMs =
      params.timeoutMs === undefined
        ? params.kind === 'input'
          ? this.timeouts.inputMs
          : this.timeouts.defaultMs
        : params.timeoutMs;

    const pending: FeedbackRequest = Object.freeze({
      id: `feedback-${this.counter}`,
      kind: params.kind,
      message: params.message,
      context: Object.freeze({ ...(params.context ?? {}) }),
      options: Object.freeze(options),
      defaultResponse: params.defaultResponse,
      timeoutMs,
      createdAt: new Date().toISOString(),
    });
    const startedAt = Date.now();
    const fallback = fallbackFor(params.kind, params.defaultResponse, options);

    let response: string;
    let resolution: FeedbackResolution;
    const responder = this.responder;

    if (params.kind === 'approval' && this.autoApprove) {
      response = params.defaultResponse ?? 'yes';
      resolution = 'default';
    } else if (!this.interactive || !responder) {
      response = fallback;
      resolution = 'default';
    } else {
      const outcome = await this.ask(responder, pending);
      if (outcome.type === 'answer') {
        if (outcome.response.trim() === '' && pending.defaultResponse !== undefined) {
          response = pending.defaultResponse;
          resolution = 'default';
        } else {
          response = outcome.response.trim();
          resolution = 'responder';
        }
      } else if (outcome.type === 'timeout') {
        this.logger.warn('Feedback request timed out, using default', {
          requestId: pending.id,
          kind: pending.kind,
          timeoutMs,
          response: fallback,
        });
        response = fallback;
        resolution = 'timeout';
      } else {
        this.logger.warn('Feedback responder failed, using default', {
          requestId: pending.id,
          kind: pending.kind,
          error: errorMessage(outcome.error),
        });
        response = fallback;
        resolution = 'responder_error';
      }
    }

    const answered: FeedbackRequest = Object.freeze({
      ...pending,
      response,
      respondedAt: new Date().toISOString(),
      resolution,
      latencyMs: Date.now() - startedAt,
    });
    this.requests.push(answered);
    this.logger.debug('Feedback resolved', { requestId: answered.id, kind: answered.kind, resolution });

    return response;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Kind-specific builders
  // ═══════════════════════════════════════════════════════════════════════

  async requestApproval(todo: Todo, context: ApprovalContext = {}): Promise<ApprovalDecision> {
    let message = `About to execute todo: '${todo.content}'`;
    if (context.executionKind) {
      message += `\nExecution type: ${context.executionKind}`;
    }
    if (context.estimatedImpact) {
      message += `\nEstimated impact: ${context.estimatedImpact}`;
    }

    const response = await this.request({
      kind: 'approval',
      message,
      context: { todoId: todo.id, ...context },
      options: APPROVAL_OPTIONS,
      defaultResponse: 'yes',
    });
    return normalizeApproval(response);
  }

  async requestValidation(todo: Todo, result: ExecutionOutcome): Promise<ValidationDecision> {
    let message = `Todo '${todo.content}' executed with result:`;
    if (result.output) {
      message +=
        result.output.length > VALIDATION_OUTPUT_LIMIT
          ? `\n${result.output.slice(0, VALIDATION_OUTPUT_LIMIT)}...`
          : `\n${result.output}`;
    }
    message += `\nSuccess: ${result.success}`;

    const response = await this.request({
      kind: 'validation',
      message,
      context: { todoId: todo.id, success: result.success },
      options: VALIDATION_OPTIONS,
      defaultResponse: 'accept',
    });
    return normalizeValidation(response);
  }

  async requestPlanGuidance(todos: readonly Todo[], currentTodoId?: string): Promise<GuidanceAction> {
    const lines = todos.map((todo, i) => `${i + 1}. ${planIcon(todo, currentTodoId)} ${todo.content}`);
    const message = `Current execution plan:\n${lines.join('\n')}\n\nHow would you like to proceed?`;

    const response = await this.request({
      kind: 'guidance',
      message,
      context: { todoIds: todos.map((t) => t.id), currentTodoId },
      options: GUIDANCE_OPTIONS,
      defaultResponse: 'continue',
    });
    return normalizeGuidance(response);
  }

  async requestErrorHandling(
    todo: Todo,
    error: string,
    suggestions: readonly string[],
  ): Promise<ErrorHandlingDecision> {
    let message = `Error executing todo: '${todo.content}'\nError: ${error}\n`;
    if (suggestions.length > 0) {
      message += '\nSuggested actions:\n';
      message += suggestions.map((suggestion, i) => `${i + 1}. ${suggestion}`).join('\n');
      message += '\n';
    }
    message += '\nHow would you like to handle this error?';

    const response = await this.request({
      kind: 'choice',
      message,
      context: { todoId: todo.id, error, suggestions: [...suggestions] },
      options: [...ERROR_HANDLING_OPTIONS, ...suggestions.map((_, i) => `suggestion_${i + 1}`)],
      defaultResponse: 'retry',
    });
    return normalizeErrorHandling(response, suggestions.length);
  }

  /**
   * Free-text input. Re-prompts with an "Invalid input." prefix while the
   * validator rejects, up to maxAttempts.
   *
   * @throws ValidationExhaustedError when no attempt is accepted
   */
  async requestInput(prompt: string, options: InputRequestOptions = {}): Promise<string> {
    const maxAttempts = options.maxAttempts ?? this.maxInputAttempts;
    let lastResponse = '';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      lastResponse = await this.request({
        kind: 'input',
        message: attempt === 1 ? prompt : `Invalid input. ${prompt}`,
        context: options.context,
      });
      if (!options.validate || options.validate(lastResponse)) {
        return lastResponse;
      }
    }

    throw new ValidationExhaustedError(maxAttempts, lastResponse);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // History
  // ═══════════════════════════════════════════════════════════════════════

  history(): readonly FeedbackRequest[] {
    return [...this.requests];
  }

  summary(recent = 5): FeedbackSummary {
    const byKind: Partial<Record<FeedbackKind, number>> = {};
    let timedOut = 0;
    let latencyTotal = 0;

    for (const request of this.requests) {
      byKind[request.kind] = (byKind[request.kind] ?? 0) + 1;
      if (request.resolution === 'timeout') {
        timedOut += 1;
      }
      latencyTotal += request.latencyMs ?? 0;
    }

    return {
      totalRequests: this.requests.length,
      byKind,
      timedOut,
      averageLatencyMs: this.requests.length > 0 ? latencyTotal / this.requests.length : 0,
      interactive: this.isInteractive(),
      recent: (recent > 0 ? this.requests.slice(-recent) : []).map((request) => ({
        id: request.id,
        kind: request.kind,
        message:
          request.message.length > SUMMARY_MESSAGE_LIMIT
            ? `${request.message.slice(0, SUMMARY_MESSAGE_LIMIT)}...`
            : request.message,
        response: request.response,
        resolution: request.resolution,
        latencyMs: request.latencyMs,
      })),
    };
  }

  clear(): void {
    this.requests.length = 0;
    this.counter = 0;
  }

  private async ask(responder: FeedbackResponder, request: FeedbackRequest): Promise<AskOutcome> {
    const controller = new AbortController();
    const answer: Promise<AskOutcome> = responder.respond(request, controller.signal).then(
      (response) => ({ type: 'answer', response }),
      (error: unknown) => ({ type: 'error', error }),
    );

    const timeoutMs = request.timeoutMs;
    if (timeoutMs === null) {
      return answer;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<AskOutcome>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({ type: 'timeout' });
      }, timeoutMs);
    });

    try {
      return await Promise.race([answer, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

function planIcon(todo: Todo, currentTodoId: string | undefined): string {
  if (todo.id === currentTodoId) {
    return '🔄';
  }
  if (todo.status === 'completed') {
    return '✅';
  }
  if (todo.status === 'failed') {
    return '❌';
  }
  return '⏳';
}

function fallbackFor(kind: FeedbackKind, defaultResponse: string | undefined, options: readonly string[]): string {
  return defaultResponse ?? kindDefault(kind, options);
}
