import { writeFile } from 'node:fs/promises';
import { Command } from 'commander';
import { DEFAULT_CONFIG } from '@taskloop/todo-contracts';
import { renderConfigYaml } from '@taskloop/todo-core';
import { writeStdout } from '../terminal.js';

export function initConfigCommand(): Command {
  return new Command('init-config')
    .description('Write a config file with every default spelled out')
    .option('-o, --output <file>', 'Where to write the config', 'taskloop.yaml')
    .option('-f, --force', 'Overwrite an existing file', false)
    .action(async (options: { output: string; force: boolean }) => {
      // 'wx' fails with EEXIST instead of clobbering
      await writeFile(options.output, renderConfigYaml(DEFAULT_CONFIG), {
        encoding: 'utf8',
        flag: options.force ? 'w' : 'wx',
      });
      writeStdout(`Wrote default configuration to ${options.output}`);
    });
}
