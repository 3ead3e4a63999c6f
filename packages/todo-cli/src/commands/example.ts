import { Command } from 'commander';
import { ProgressReporter } from '@taskloop/progress-reporter';
import type { FeedbackRequest, LogLevel } from '@taskloop/todo-contracts';
import { ScriptedResponder, TaskloopAgent, createLogger, type ScriptedAnswer } from '@taskloop/todo-core';
import { formatResult } from '../format.js';
import { parseLogLevelOption } from '../options.js';
import { writeStdout } from '../terminal.js';

export const EXAMPLE_QUERY = 'Calculate 15*3+10-5';

/** Guidance, then approve and accept both todos of the fallback plan */
export const EXAMPLE_ANSWERS = ['continue', 'yes', 'accept', 'yes', 'accept'];

export function exampleCommand(): Command {
  return new Command('example')
    .description('Run a scripted demo session without a reasoning provider')
    .option('--log-level <level>', 'Log level for progress output', parseLogLevelOption, 'info' as const)
    .action(async (options: { logLevel: LogLevel }) => {
      const logger = createLogger({ level: options.logLevel, pretty: true, module: 'example' });
      const agent = new TaskloopAgent({
        config: { interactive: true, logLevel: options.logLevel },
        responder: new ScriptedResponder(EXAMPLE_ANSWERS.map(echo)),
        observer: new ProgressReporter(logger),
        logger,
      });

      writeStdout(`🎬 Example session: ${EXAMPLE_QUERY}`);
      const outcome = await agent.processQuery(EXAMPLE_QUERY);
      writeStdout(formatResult(outcome).join('\n'));
    });
}

function echo(answer: string): ScriptedAnswer {
  return (request: FeedbackRequest) => {
    const [headline] = request.message.split('\n');
    writeStdout(`🤖 ${request.kind}: ${headline ?? ''}\n> ${answer}`);
    return answer;
  };
}
