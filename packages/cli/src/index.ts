#!/usr/bin/env tsx
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { loadProjectConfig } from '@steplink/core';

import { initCommand } from './commands/init.ts';
import { attachCommand } from './commands/attach.ts';
import { scriptCommand } from './commands/script.ts';
import { framesCommand } from './commands/frames.ts';

await yargs(hideBin(process.argv))
  .scriptName('steplink')
  .usage('$0 <command> [options]')
  .option('project', {
    alias: 'p',
    describe: 'Project root directory',
    type: 'string',
    default: process.cwd(),
  })
  .option('verbose', {
    alias: 'v',
    describe: 'Verbose output',
    type: 'boolean',
    default: false,
  })
  .middleware((argv) => {
    const projectDir = (argv['project'] as string | undefined) ?? process.cwd();
    try {
      const config = loadProjectConfig(projectDir);
      (argv as Record<string, unknown>)['_config'] = config;
    } catch (err) {
      console.error(err instanceof Error ? err.message : String(err));
      process.exit(1);
    }
  })
  .command(initCommand)
  .command(attachCommand)
  .command(scriptCommand)
  .command(framesCommand)
  .demandCommand(1, 'You need at least one command')
  .strict()
  .help()
  .parse();
