import { readFileSync } from 'node:fs';
import type { CommandModule } from 'yargs';
import { FrameReader, decodeCommand, decodeEvent } from '@steplink/core';
import type { Command, DecodeResult, DeviceEvent } from '@steplink/core';
import { fromHex, toHex } from '@steplink/shared';

// Buffers go to hex so each frame prints as one JSON line.
export function toPrintable(value: Command | DeviceEvent): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(value)) {
    out[key] = Buffer.isBuffer(field) ? toHex(field) : field;
  }
  return out;
}

/** Decodes a captured byte stream, one JSON line per frame or decode error. */
export function decodeStream(
  bytes: Buffer,
  decode: (buffer: Buffer) => DecodeResult<Command | DeviceEvent>,
): { lines: string[]; trailing: number } {
  const reader = new FrameReader(decode);
  reader.push(bytes);
  const lines = reader.drain().map((item) =>
    JSON.stringify(item.ok ? toPrintable(item.value) : { error: item.error.message }),
  );
  return { lines, trailing: reader.buffered };
}

export const framesCommand: CommandModule = {
  command: 'frames [hex]',
  describe: 'Decode a captured command or event byte stream',
  builder: (yargs) =>
    yargs
      .positional('hex', {
        describe: 'Hex-encoded bytes',
        type: 'string',
      })
      .option('file', {
        alias: 'f',
        describe: 'Read raw bytes from a file instead',
        type: 'string',
      })
      .option('events', {
        alias: 'e',
        describe: 'Decode device events instead of commands',
        type: 'boolean',
        default: false,
      }),
  handler: async (argv) => {
    const file = argv['file'] as string | undefined;
    const hex = argv['hex'] as string | undefined;
    if (!file && !hex) throw new Error('Pass hex bytes or --file');
    const bytes = file ? readFileSync(file) : fromHex(hex ?? '');

    const { lines, trailing } = decodeStream(bytes, argv['events'] ? decodeEvent : decodeCommand);
    for (const line of lines) console.log(line);
    if (trailing > 0) {
      console.error(`${trailing} trailing byte(s) do not form a complete frame`);
      process.exitCode = 1;
    }
  },
};
