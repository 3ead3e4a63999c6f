/**
 * @module @taskloop/todo-cli
 * The `taskloop` command tree, built separately from the bin entry so it can
 * be inspected without running anything.
 */

import { Command } from 'commander';
import { exampleCommand } from './commands/example.js';
import { initConfigCommand } from './commands/init-config.js';
import { runCommand } from './commands/run.js';

export function buildProgram(): Command {
  const program = new Command();

  program.name('taskloop').description('Plan a query into todos and work through them').version('0.1.0');

  program.addCommand(runCommand());
  program.addCommand(initConfigCommand());
  program.addCommand(exampleCommand());

  return program;
}

export { formatResult } from './format.js';
export { toConfigOverrides, parseIntegerOption, parseLogLevelOption } from './options.js';
export type { RunOptions } from './options.js';
export { classifySessionInput, runInteractiveSession } from './session.js';
export type { InteractiveSessionDeps, SessionInput } from './session.js';
