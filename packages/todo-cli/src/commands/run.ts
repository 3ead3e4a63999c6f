import { writeFile } from 'node:fs/promises';
import { Command } from 'commander';
import { ProgressReporter } from '@taskloop/progress-reporter';
import { ConsoleResponder, TaskloopAgent, createLogger, loadConfig, serializeSnapshot } from '@taskloop/todo-core';
import { formatResult } from '../format.js';
import { parseIntegerOption, parseLogLevelOption, toConfigOverrides, type RunOptions } from '../options.js';
import { runInteractiveSession } from '../session.js';
import { writeStdout } from '../terminal.js';

export function runCommand(): Command {
  return new Command('run')
    .description('Plan a query and run it through the orchestration loop')
    .argument('[query]', 'What to work on; interactive mode without a query starts a multi-query session')
    .option('--max-iterations <n>', 'Iteration budget for the loop', parseIntegerOption)
    .option('--thinking-depth <n>', 'Depth hint for the reasoning provider', parseIntegerOption)
    .option('-i, --interactive', 'Answer gates on the terminal')
    .option('--auto-approve', 'Approve every todo without asking')
    .option('-c, --config <file>', 'YAML or JSON config file')
    .option('--save-result <file>', 'Write a JSON snapshot of the session')
    .option('--log-level <level>', 'trace, debug, info, warn, error, fatal or silent', parseLogLevelOption)
    .action(async (query: string | undefined, options: RunOptions) => {
      const config = await loadConfig({
        file: options.config,
        env: process.env,
        overrides: toConfigOverrides(options),
      });
      const logger = createLogger({ level: config.logLevel, pretty: true, module: 'cli' });
      // One responder for the whole command so piped answers stay in order
      const responder = config.interactive ? new ConsoleResponder() : undefined;
      const agent = new TaskloopAgent({
        config,
        logger,
        observer: new ProgressReporter(logger),
        responder,
      });

      try {
        if (query === undefined && responder) {
          await runInteractiveSession({
            agent,
            ask: (prompt) => responder.ask(prompt),
            write: writeStdout,
            afterQuery: () => saveResult(agent, options.saveResult),
          });
          return;
        }

        const text = (query ?? '').trim();
        if (!text) {
          throw new Error('A query is required: taskloop run "<query>"');
        }

        const outcome = await agent.processQuery(text);
        writeStdout(formatResult(outcome).join('\n'));
        await saveResult(agent, options.saveResult);
      } finally {
        responder?.close();
      }
    });
}

async function saveResult(agent: TaskloopAgent, file: string | undefined): Promise<void> {
  if (!file) {
    return;
  }
  const snapshot = agent.snapshot();
  if (snapshot) {
    await writeFile(file, serializeSnapshot(snapshot), 'utf8');
    writeStdout(`💾 Result saved to ${file}`);
  }
}
