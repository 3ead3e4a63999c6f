import type { ReasoningOptions, ReasoningProvider, ReasoningStep } from '@taskloop/todo-contracts';
import { parseReasoningSteps } from './step-parser.js';

/** Any text-completion backend: an LLM client, a canned script, a test stub */
export type CompletionFn = (prompt: string) => Promise<string>;

export function buildReasoningPrompt(query: string, options: ReasoningOptions): string {
  return [
    'You are an expert at breaking down complex problems into actionable steps.',
    `Think through the query below in up to ${options.thinkingDepth} levels of detail.`,
    'For each step, explain your reasoning, note dependencies on earlier steps and end with one actionable line.',
    '',
    'Format every step like this:',
    '## Step 1: [Step name]',
    '[Your reasoning]',
    'Action: [specific actionable task]',
    'Confidence: [0-1]',
    '',
    `Query: ${query}`,
  ].join('\n');
}

/**
 * ReasoningProvider over a plain completion function. Errors from the
 * backend propagate so the planner can fall back.
 */
export class TextReasoningProvider implements ReasoningProvider {
  constructor(private readonly complete: CompletionFn) {}

  async analyze(query: string, options: ReasoningOptions): Promise<ReasoningStep[]> {
    const text = await this.complete(buildReasoningPrompt(query, options));
    return parseReasoningSteps(text);
  }
}
