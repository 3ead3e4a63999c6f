import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { parseIntegerOption, parseLogLevelOption, toConfigOverrides } from '../options.js';
import { buildProgram } from '../program.js';

describe('toConfigOverrides', () => {
  it('keeps only the flags that were passed', () => {
    expect(toConfigOverrides({})).toEqual({});
    expect(
      toConfigOverrides({
        maxIterations: 4,
        interactive: true,
        logLevel: 'debug',
        config: 'taskloop.yaml',
        saveResult: 'out.json',
      }),
    ).toEqual({ maxIterations: 4, interactive: true, logLevel: 'debug' });
  });

  it('passes a zero budget through', () => {
    expect(toConfigOverrides({ maxIterations: 0, thinkingDepth: 2, autoApprove: false })).toEqual({
      maxIterations: 0,
      thinkingDepth: 2,
      autoApprove: false,
    });
  });
});

describe('option parsers', () => {
  it('accepts non-negative integers only', () => {
    expect(parseIntegerOption('12')).toBe(12);
    expect(() => parseIntegerOption('-1')).toThrow(InvalidArgumentError);
    expect(() => parseIntegerOption('2.5')).toThrow('Expected a non-negative integer.');
  });

  it('accepts known log levels only', () => {
    expect(parseLogLevelOption('warn')).toBe('warn');
    expect(() => parseLogLevelOption('loud')).toThrow(
      'Expected one of: trace, debug, info, warn, error, fatal, silent.',
    );
  });
});

describe('buildProgram', () => {
  it('registers every command', () => {
    const program = buildProgram();
    expect(program.name()).toBe('taskloop');
    expect(program.commands.map((command) => command.name())).toEqual(['run', 'init-config', 'example']);
  });

  it('parses run flags into typed options', async () => {
    const program = buildProgram();
    const run = program.commands.find((command) => command.name() === 'run');
    if (!run) {
      throw new Error('run command missing');
    }
    run.action(() => {});

    await program.parseAsync(['node', 'taskloop', 'run', 'Plan a trip', '--max-iterations', '3', '-i'], {
      from: 'node',
    });

    expect(run.opts()).toEqual({ maxIterations: 3, interactive: true });
    expect(run.args).toEqual(['Plan a trip']);
  });
});
