import { ValidationExhaustedError } from '@taskloop/todo-contracts';
import type { ILogger, InputRequestOptions } from '@taskloop/todo-contracts';
import type { FeedbackGateway } from './feedback-gateway.js';

export const nonEmpty = (response: string): boolean => response.trim().length > 0;

/**
 * requestInput that resolves to undefined instead of throwing once the
 * validator has rejected every attempt. The answer is trimmed.
 */
export async function requestInputOrGiveUp(
  gateway: FeedbackGateway,
  prompt: string,
  options: InputRequestOptions,
  logger: ILogger,
): Promise<string | undefined> {
  try {
    const response = await gateway.requestInput(prompt, options);
    return response.trim();
  } catch (error) {
    if (error instanceof ValidationExhaustedError) {
      logger.warn('Input attempts exhausted', { prompt, attempts: error.attempts });
      return undefined;
    }
    throw error;
  }
}
