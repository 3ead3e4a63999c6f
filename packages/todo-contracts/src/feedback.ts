/**
 * Feedback gateway types: requests, normalized decisions, responders.
 */

export type FeedbackKind = 'approval' | 'guidance' | 'validation' | 'choice' | 'input' | 'review';

/**
 * How a request got its answer.
 */
export type FeedbackResolution = 'responder' | 'default' | 'timeout' | 'responder_error';

export interface FeedbackRequest {
  readonly id: string;
  readonly kind: FeedbackKind;
  readonly message: string;
  /** Passed through untouched, never interpreted by the gateway */
  readonly context: Readonly<Record<string, unknown>>;
  /** Acceptable response tokens in display order. Empty means free text */
  readonly options: readonly string[];
  readonly defaultResponse?: string;
  /** null waits indefinitely */
  readonly timeoutMs: number | null;
  readonly createdAt: string;
  readonly response?: string;
  readonly respondedAt?: string;
  readonly resolution?: FeedbackResolution;
  readonly latencyMs?: number;
}

export interface FeedbackRequestParams {
  kind: FeedbackKind;
  message: string;
  context?: Record<string, unknown>;
  options?: readonly string[];
  defaultResponse?: string;
  /** Omit for the per-kind default, null for no timeout */
  timeoutMs?: number | null;
}

/**
 * Anything that can answer a feedback request: a human at a terminal,
 * a scripted test double, a remote UI.
 *
 * The signal is aborted when the gateway stops waiting (timeout).
 */
export interface FeedbackResponder {
  respond(request: FeedbackRequest, signal: AbortSignal): Promise<string>;
}

// ═══════════════════════════════════════════════════════════════════════
// Normalized decisions
// ═══════════════════════════════════════════════════════════════════════

export type ApprovalDecision = 'approve' | 'reject' | 'skip' | 'modify';

export type ValidationDecision = 'accept' | 'retry' | 'modify' | 'skip';

export type GuidanceAction =
  | 'continue'
  | 'skip_current'
  | 'reorder'
  | 'add_todo'
  | 'remove_todo'
  /** Plan edit chosen in a follow-up input */
  | 'modify'
  | 'pause';

export type ErrorHandlingDecision =
  | { action: 'retry' }
  | { action: 'skip' }
  | { action: 'modify' }
  | { action: 'break_down' }
  /** 1-based index into the suggestion list shown to the user */
  | { action: 'suggestion'; index: number };

export interface ApprovalContext {
  executionKind?: string;
  estimatedImpact?: string;
}

export interface InputRequestOptions {
  context?: Record<string, unknown>;
  /** Return false to re-prompt */
  validate?: (response: string) => boolean;
  maxAttempts?: number;
}

export interface FeedbackSummaryItem {
  id: string;
  kind: FeedbackKind;
  message: string;
  response?: string;
  resolution?: FeedbackResolution;
  latencyMs?: number;
}

export interface FeedbackSummary {
  totalRequests: number;
  byKind: Partial<Record<FeedbackKind, number>>;
  timedOut: number;
  averageLatencyMs: number;
  interactive: boolean;
  recent: FeedbackSummaryItem[];
}
