import { PassThrough } from 'node:stream';
import { afterEach, describe, it, expect } from 'vitest';
import type { ExecutionOutcome } from '@taskloop/todo-contracts';
import { FeedbackGateway } from '../feedback/feedback-gateway.js';
import { ConsoleResponder } from '../feedback/responders.js';
import { TodoStore } from '../store/todo-store.js';
import { createMockLogger } from './helpers.js';

describe('ConsoleResponder', () => {
  const responders: ConsoleResponder[] = [];

  function makeResponder(input: PassThrough): ConsoleResponder {
    const responder = new ConsoleResponder({ input, output: new PassThrough() });
    responders.push(responder);
    return responder;
  }

  afterEach(() => {
    for (const responder of responders.splice(0)) {
      responder.close();
    }
  });

  it('answers consecutive gates from one piped chunk', async () => {
    const input = new PassThrough();
    const responder = makeResponder(input);
    const gateway = new FeedbackGateway({ interactive: true, responder, logger: createMockLogger() });
    const todo = new TodoStore().create({ content: 'Summarize the report' });
    const result: ExecutionOutcome = { success: true, feedback: 'done' };

    input.write('skip\nretry\n');
    const first = await gateway.requestValidation(todo, result);
    const second = await gateway.requestValidation(todo, result);

    expect([first, second]).toEqual(['skip', 'retry']);
    expect(gateway.history().map((r) => r.resolution)).toEqual(['responder', 'responder']);
  });

  it('shares the buffered input with free-form questions', async () => {
    const input = new PassThrough();
    const responder = makeResponder(input);

    input.write('Plan a trip\nquit\n');

    expect(await responder.ask('Query: ')).toBe('Plan a trip');
    expect(await responder.ask('Query: ')).toBe('quit');
  });

  it('hands a line that arrives after an aborted question to the next one', async () => {
    const input = new PassThrough();
    const responder = makeResponder(input);
    const controller = new AbortController();

    const aborted = responder.ask('> ', controller.signal);
    controller.abort();
    await expect(aborted).rejects.toThrow('Question aborted');

    input.write('late\n');
    expect(await responder.ask('> ')).toBe('late');
  });

  it('resolves to undefined once the input ends', async () => {
    const input = new PassThrough();
    const responder = makeResponder(input);

    const pending = responder.ask('> ');
    input.end();

    expect(await pending).toBeUndefined();
    expect(await responder.ask('> ')).toBeUndefined();
  });
});
