/**
 * @module @taskloop/todo-core/session/step-parser
 * Turns a plain-text reasoning completion into ReasoningSteps and todo text.
 *
 * Expected shape (anything else is tolerated):
 *
 * ```text
 * ## Step 1: Understand the data
 * The totals come from two sources.
 * Action: Collect both monthly reports
 * Confidence: 0.8
 * ```
 */

import { randomUUID } from 'node:crypto';
import type { ReasoningStep } from '@taskloop/todo-contracts';

const STEP_HEADING = /^(##\s*)?Step\b/;
const CONFIDENCE_LINE = /^confidence:\s*([\d.]+)/i;
const ACTION_KEYWORDS = ['todo:', 'action:', 'task:', 'do:', 'create:', 'implement:'];
/** Pure labels; verbs such as "Create:" stay part of the content */
const ACTION_LABEL = /^(todo|action|task):\s*/i;
const MAX_FALLBACK_LENGTH = 100;

export function parseReasoningSteps(text: string, now: () => Date = () => new Date()): ReasoningStep[] {
  const steps: ReasoningStep[] = [];
  let current: ReasoningStep | undefined;

  for (const raw of text.split('\n')) {
    const line = raw.trim();

    if (STEP_HEADING.test(line)) {
      if (current) {
        steps.push(current);
      }
      current = {
        id: randomUUID(),
        description: line,
        reasoning: line,
        confidence: 0,
        createdAt: now().toISOString(),
      };
      continue;
    }

    if (!current || line.length === 0) {
      continue;
    }

    const confidence = CONFIDENCE_LINE.exec(line);
    if (confidence) {
      current.confidence = Math.min(1, Math.max(0, Number(confidence[1]) || 0));
      continue;
    }
    current.reasoning += `\n${line}`;
  }

  if (current) {
    steps.push(current);
  }
  return steps;
}

/**
 * Picks the actionable line out of a step's reasoning: an explicit
 * action line, else the first substantial non-heading line, else the
 * reasoning itself cut to 100 characters.
 */
export function extractTodoContent(reasoning: string): string {
  const lines = reasoning.split('\n').map((line) => line.trim());

  const action = lines.find((line) => {
    const lower = line.toLowerCase();
    return ACTION_KEYWORDS.some((keyword) => lower.includes(keyword));
  });
  if (action) {
    return action.replace(ACTION_LABEL, '') || action;
  }

  const meaningful = lines.find((line) => line.length > 10 && !line.startsWith('#') && !STEP_HEADING.test(line));
  if (meaningful) {
    return meaningful;
  }

  return reasoning.length > MAX_FALLBACK_LENGTH ? `${reasoning.slice(0, MAX_FALLBACK_LENGTH)}...` : reasoning;
}
