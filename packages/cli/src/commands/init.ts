import { existsSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import type { CommandModule } from 'yargs';
import { CONFIG_FILENAME, writeProjectConfig } from '@steplink/core';
import type { ProjectConfig } from '@steplink/core';

export const initCommand: CommandModule = {
  command: 'init [device..]',
  describe: 'Create a steplink.json project config',
  builder: (yargs) =>
    yargs
      .positional('device', {
        describe: 'Device command line to store (e.g. tape-device --piped prog.tape)',
        type: 'string',
        array: true,
      })
      .option('force', {
        alias: 'f',
        describe: 'Overwrite existing config',
        type: 'boolean',
        default: false,
      })
      .option('timeout', {
        describe: 'Client wait for query results, in ms',
        type: 'number',
      }),
  handler: async (argv) => {
    const projectDir = (argv['project'] as string | undefined) ?? process.cwd();
    const force = argv['force'] as boolean;
    const configPath = join(projectDir, CONFIG_FILENAME);

    if (existsSync(configPath) && !force) {
      console.error(`${CONFIG_FILENAME} already exists. Use --force to overwrite.`);
      process.exitCode = 1;
      return;
    }

    const config: ProjectConfig = {};

    const [command, ...args] = (argv['device'] as string[] | undefined) ?? [];
    if (command) config.device = { command, args };

    const timeout = argv['timeout'] as number | undefined;
    if (timeout !== undefined) config.client = { timeout };

    // Auto-detect a debug model when there is exactly one
    try {
      const models = readdirSync(projectDir).filter((f) => f.toLowerCase().endsWith('.debug.json'));
      if (models.length === 1) config.debugModel = models[0];
    } catch (err) {
      console.error(`Could not scan ${projectDir}: ${err instanceof Error ? err.message : String(err)}`);
    }

    writeProjectConfig(projectDir, config);
    console.log(`Created ${configPath}`);
    if (config.device?.command) console.log(`  device: ${[config.device.command, ...args].join(' ')}`);
    if (config.debugModel) console.log(`  debugModel: ${config.debugModel}`);
  },
};
