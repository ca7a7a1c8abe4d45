import type { CommandModule } from 'yargs';
import { CommandScript, isRegisterName, parseAddress } from '@steplink/core';
import { fromHex, toHex } from '@steplink/shared';

function parsePoke(input: string): { address: number; data: Buffer } {
  const [addr, hex] = input.split(',');
  if (!addr || !hex) throw new Error(`Expected addr,hex: ${input}`);
  return { address: parseAddress(addr), data: fromHex(hex) };
}

export const scriptCommand: CommandModule = {
  command: 'script',
  describe: 'Generate an encoded command stream to feed a piped device',
  builder: (yargs) =>
    yargs
      .option('bp', {
        describe: 'Breakpoint address (x1F, 0x1F or 31)',
        type: 'string',
        array: true,
      })
      .option('poke', {
        describe: 'Memory write: addr,hexbytes',
        type: 'string',
        array: true,
      })
      .option('reg', {
        describe: 'Register write: name=value',
        type: 'string',
        array: true,
      })
      .option('step', {
        alias: 's',
        describe: 'Number of steps to run',
        type: 'number',
        default: 0,
      })
      .option('force', {
        describe: 'Step ignoring breakpoints',
        type: 'boolean',
        default: false,
      })
      .option('dump', {
        alias: 'd',
        describe: 'Request a register dump after stepping',
        type: 'boolean',
        default: false,
      })
      .option('memory', {
        describe: 'Memory read after stepping: from,to',
        type: 'string',
        array: true,
      })
      .option('stack', {
        describe: 'Request the stack after stepping',
        type: 'boolean',
        default: false,
      })
      .option('stop', {
        describe: 'End the stream with stop',
        type: 'boolean',
        default: true,
      })
      .option('output', {
        alias: 'o',
        describe: 'Output file path (omit for hex on stdout)',
        type: 'string',
      }),
  handler: async (argv) => {
    const script = new CommandScript();

    for (const bp of (argv['bp'] as string[] | undefined) ?? []) {
      script.breakpoint(parseAddress(bp));
    }

    for (const poke of (argv['poke'] as string[] | undefined) ?? []) {
      const { address, data } = parsePoke(poke);
      script.poke(address, data);
    }

    for (const reg of (argv['reg'] as string[] | undefined) ?? []) {
      const [name = '', value = ''] = reg.split('=');
      if (!isRegisterName(name)) throw new Error(`Unknown register: ${name}`);
      script.register(name, parseAddress(value));
    }

    script.step(argv['step'] as number, argv['force'] as boolean);

    if (argv['dump']) {
      script.dump();
    }

    for (const range of (argv['memory'] as string[] | undefined) ?? []) {
      const [from = '', to = ''] = range.split(',');
      script.memory(parseAddress(from), parseAddress(to));
    }

    if (argv['stack']) {
      script.stack();
    }

    if (argv['stop']) {
      script.stop();
    }

    const output = argv['output'] as string | undefined;
    if (output) {
      script.write(output);
      console.log(`Wrote ${script.length} commands to ${output}`);
    } else {
      console.log(toHex(script.toBuffer()));
    }
  },
};
