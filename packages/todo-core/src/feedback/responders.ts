/**
 * @module @taskloop/todo-core/feedback/responders
 * FeedbackResponder implementations: a scripted one for tests and demos and
 * a terminal one backed by node:readline.
 */

import { createInterface, type Interface } from 'node:readline';
import type { FeedbackRequest, FeedbackResponder } from '@taskloop/todo-contracts';

export type ScriptedAnswer = string | ((request: FeedbackRequest) => string | Promise<string>);

/**
 * Answers requests from a queue, in order. Once the queue is empty every
 * request gets an empty answer, which the gateway resolves to the default.
 *
 * @example
 * ```typescript
 * const responder = new ScriptedResponder(['continue', 'yes', 'accept']);
 * ```
 */
export class ScriptedResponder implements FeedbackResponder {
  private readonly queue: ScriptedAnswer[];
  readonly seen: FeedbackRequest[] = [];

  constructor(answers: readonly ScriptedAnswer[] = []) {
    this.queue = [...answers];
  }

  enqueue(...answers: ScriptedAnswer[]): void {
    this.queue.push(...answers);
  }

  remaining(): number {
    return this.queue.length;
  }

  async respond(request: FeedbackRequest): Promise<string> {
    this.seen.push(request);
    const next = this.queue.shift();
    if (next === undefined) {
      return '';
    }
    return typeof next === 'function' ? next(request) : next;
  }
}

export interface ConsoleResponderOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

type LineWaiter = (line: string | undefined) => void;

/**
 * Prompts on a terminal through one readline interface kept open until
 * close(). Lines that arrive while no question is pending are queued, so
 * piped answers are consumed in order. A pending question is cancelled when
 * the gateway aborts the request on timeout.
 */
export class ConsoleResponder implements FeedbackResponder {
  private readonly output: NodeJS.WritableStream;
  private readonly rl: Interface;
  private readonly lines: string[] = [];
  private readonly waiters: LineWaiter[] = [];
  private closed = false;

  constructor(options: ConsoleResponderOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.rl = createInterface({ input: options.input ?? process.stdin, terminal: false });
    this.rl.on('line', (line) => {
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(line);
      } else {
        this.lines.push(line);
      }
    });
    this.rl.on('close', () => {
      this.closed = true;
      for (const waiter of this.waiters.splice(0)) {
        waiter(undefined);
      }
    });
  }

  async respond(request: FeedbackRequest, signal: AbortSignal): Promise<string> {
    const lines = [`\n🤖 ${request.kind.toUpperCase()} REQUESTED`, request.message];
    if (request.options.length > 0) {
      lines.push(`Options: ${request.options.join(', ')}`);
    }
    if (request.defaultResponse !== undefined) {
      lines.push(`Default: ${request.defaultResponse}`);
    }
    lines.push(request.timeoutMs === null ? 'No timeout' : `Timeout: ${request.timeoutMs / 1000}s`);
    this.output.write(`${lines.join('\n')}\n`);

    return (await this.ask('> ', signal)) ?? '';
  }

  /** Resolves to undefined once the input has ended */
  ask(prompt: string, signal?: AbortSignal): Promise<string | undefined> {
    this.output.write(prompt);

    const buffered = this.lines.shift();
    if (buffered !== undefined) {
      return Promise.resolve(buffered);
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }

    return new Promise<string | undefined>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        reject(new Error('Question aborted'));
      };
      const waiter: LineWaiter = (line) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(line);
      };

      if (signal?.aborted) {
        reject(new Error('Question aborted'));
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }
}
