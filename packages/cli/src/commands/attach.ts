import { createInterface } from 'node:readline';
import type { CommandModule } from 'yargs';
import { BreakpointRegistry, DeviceClient, formatAddress } from '@steplink/core';
import type { Command, DebugModel, DeviceEvent } from '@steplink/core';
import { createLogger, errorMessage, type Logger } from '@steplink/shared';
import { getProjectConfig, loadDebugModel, resolveDeviceCommand } from '../resolve-device.ts';
import { REPL_HELP, formatEvent, parseReplLine } from '../repl.ts';

// Runs inside the client's stream handler, so it must not throw.
export function printEvent(event: DeviceEvent, logger: Logger, model?: DebugModel): void {
  try {
    console.log(formatEvent(event, model));
  } catch (err) {
    logger.warn(`Could not display ${event.type}: ${errorMessage(err)}`);
  }
}

export const attachCommand: CommandModule = {
  command: 'attach [device..]',
  describe: 'Start a device in piped mode and drive it from a prompt',
  builder: (yargs) =>
    yargs
      .positional('device', {
        describe: 'Device command line (default: "device" in steplink.json)',
        type: 'string',
        array: true,
      })
      .option('debug-model', {
        alias: 'm',
        describe: 'Assembler debug model JSON for labels and source lines',
        type: 'string',
      })
      .option('timeout', {
        describe: 'Wait for query results in ms (default: 5000)',
        type: 'number',
      }),
  handler: async (argv) => {
    const args = argv as Record<string, unknown>;
    const config = getProjectConfig(args);
    const logger = createLogger('attach', { verbose: argv['verbose'] as boolean });
    const device = resolveDeviceCommand(args, (argv['device'] as string[] | undefined) ?? []);
    const model = loadDebugModel(args);
    const timeout = (argv['timeout'] as number | undefined) ?? config.client?.timeout;

    const client = new DeviceClient({ timeout });
    await client.spawn(device.command, device.args, { cwd: device.cwd });
    logger.debug(`Started ${device.command} (pid ${client.getPid() ?? '?'})`);

    // Local mirror of what was sent, for the `breakpoints` listing.
    const breakpoints = new BreakpointRegistry();

    client.on('event', (event: DeviceEvent) => printEvent(event, logger, model));
    client.on('decode-error', (err: Error) => {
      logger.warn(err.message);
    });

    const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: 'steplink> ' });

    const send = (commands: Command[]): void => {
      for (const command of commands) {
        if (command.type === 'set-breakpoint') breakpoints.set(command.address);
        if (command.type === 'clear-breakpoint') breakpoints.clear(command.address);
        if (command.type === 'set-memory') client.writeMemory(command.address, command.bytes);
        else client.send(command);
      }
    };

    rl.on('line', (line) => {
      try {
        const action = parseReplLine(line, model);
        switch (action.kind) {
          case 'commands':
            send(action.commands);
            break;
          case 'breakpoints': {
            const list = breakpoints.list();
            console.log(list.length > 0 ? list.map(formatAddress).join('\n') : '(none)');
            break;
          }
          case 'help':
            console.log(REPL_HELP);
            break;
          case 'quit':
            rl.close();
            return;
          case 'noop':
            break;
        }
      } catch (err) {
        console.error(errorMessage(err));
      }
      rl.prompt();
    });

    await new Promise<void>((resolve) => {
      rl.once('close', () => resolve());
      client.once('close', () => {
        logger.debug('Device closed its output');
        rl.close();
      });
      rl.prompt();
    });

    client.close();
  },
};
