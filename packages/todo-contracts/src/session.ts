/**
 * Session (process) types and the reasoning collaborator contract.
 */

export interface ReasoningStep {
  id: string;
  description: string;
  reasoning: string;
  /** 0-1 */
  confidence: number;
  createdAt: string;
}

export interface ReasoningOptions {
  /** Opaque to the core, forwarded as-is */
  thinkingDepth: number;
}

/**
 * Turns a free-form query into ordered reasoning steps.
 */
export interface ReasoningProvider {
  analyze(query: string, options: ReasoningOptions): Promise<ReasoningStep[]>;
}

export type PlanSource = 'reasoning' | 'fallback';

export type SessionStatus = 'active' | 'paused' | 'completed';

export type QueryCategory = 'arithmetic' | 'planning' | 'generic';
