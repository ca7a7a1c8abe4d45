import type { Command } from '../types.ts';
import {
  MAX_CHUNK,
  COMMAND_BY_PREFIX,
  COMMAND_PREFIX,
  REGISTER_BY_ID,
  registerSpec,
  isSupportedKey,
  isU16,
  prefixByte,
} from './wire.ts';
import {
  type DecodeResult,
  INCOMPLETE,
  encodeChunks,
  fail,
  hex8,
  ok,
  readChunks,
  resync,
  u16,
} from './frames.ts';

function checkAddress(address: number, what: string): void {
  if (!isU16(address)) {
    throw new RangeError(`${what} must be a 16-bit address, got ${address}`);
  }
}

export function encodeCommand(command: Command): Buffer {
  const prefix = prefixByte(COMMAND_PREFIX[command.type]);

  switch (command.type) {
    case 'step':
    case 'step-ignoring-breakpoints':
    case 'stop':
    case 'request-dump':
    case 'request-stack':
      return Buffer.from([prefix]);

    case 'set-breakpoint':
    case 'clear-breakpoint':
      checkAddress(command.address, 'Breakpoint');
      return Buffer.concat([Buffer.from([prefix]), u16(command.address)]);

    case 'input-key':
      if (!isSupportedKey(command.key)) {
        throw new RangeError(`Unsupported key: ${JSON.stringify(command.key)}`);
      }
      return Buffer.from([prefix, command.key.charCodeAt(0)]);

    case 'input-string':
      return encodeChunks(prefix, Buffer.from(command.text, 'utf-8'));

    case 'request-memory':
      checkAddress(command.from, 'Range start');
      checkAddress(command.to, 'Range end');
      return Buffer.concat([Buffer.from([prefix]), u16(command.from), u16(command.to)]);

    case 'set-memory':
      checkAddress(command.address, 'Memory address');
      if (command.bytes.length > MAX_CHUNK) {
        throw new RangeError(
          `A single set-memory frame carries at most ${MAX_CHUNK} bytes, got ${command.bytes.length}`,
        );
      }
      return Buffer.concat([
        Buffer.from([prefix]),
        u16(command.address),
        Buffer.from([command.bytes.length]),
        command.bytes,
      ]);

    case 'set-register': {
      const spec = registerSpec(command.register);
      const max = spec.width === 1 ? 0xff : 0xffff;
      if (!Number.isInteger(command.value) || command.value < 0 || command.value > max) {
        throw new RangeError(`Value ${command.value} does not fit register ${spec.name}`);
      }
      const value = spec.width === 1 ? Buffer.from([command.value]) : u16(command.value);
      return Buffer.concat([Buffer.from([prefix, spec.id]), value]);
    }

    default: {
      const unreachable: never = command;
      throw new Error(`Unhandled command: ${JSON.stringify(unreachable)}`);
    }
  }
}

function isCommandPrefix(byte: number): boolean {
  return COMMAND_BY_PREFIX.has(byte);
}

export function decodeCommand(buffer: Buffer): DecodeResult<Command> {
  const first = buffer[0];
  if (first === undefined) return INCOMPLETE;

  const type = COMMAND_BY_PREFIX.get(first);
  if (type === undefined) return resync(buffer, isCommandPrefix, 'command');

  switch (type) {
    case 'step':
    case 'step-ignoring-breakpoints':
    case 'stop':
    case 'request-dump':
    case 'request-stack':
      return ok<Command>({ type }, 1);

    case 'set-breakpoint':
    case 'clear-breakpoint':
      if (buffer.length < 3) return INCOMPLETE;
      return ok<Command>({ type, address: buffer.readUInt16BE(1) }, 3);

    case 'input-key': {
      const code = buffer[1];
      if (code === undefined) return INCOMPLETE;
      const key = String.fromCharCode(code);
      if (!isSupportedKey(key)) return fail(`Unsupported key byte ${hex8(code)}`, 2, 1);
      return ok<Command>({ type, key }, 2);
    }

    case 'input-string': {
      const chunks = readChunks(buffer);
      if (chunks.status !== 'ok') return chunks;
      return ok<Command>({ type, text: chunks.value.toString('utf-8') }, chunks.consumed);
    }

    case 'request-memory':
      if (buffer.length < 5) return INCOMPLETE;
      return ok<Command>({ type, from: buffer.readUInt16BE(1), to: buffer.readUInt16BE(3) }, 5);

    case 'set-memory': {
      const length = buffer[3];
      if (length === undefined || buffer.length < 4 + length) return INCOMPLETE;
      const bytes = Buffer.from(buffer.subarray(4, 4 + length));
      return ok<Command>({ type, address: buffer.readUInt16BE(1), bytes }, 4 + length);
    }

    case 'set-register': {
      const id = buffer[1];
      if (id === undefined) return INCOMPLETE;
      const spec = REGISTER_BY_ID.get(id);
      if (!spec) return fail(`Unknown register id ${hex8(id)}`, 2, 1);
      if (buffer.length < 2 + spec.width) return INCOMPLETE;
      const value = spec.width === 1 ? buffer.readUInt8(2) : buffer.readUInt16BE(2);
      return ok<Command>({ type, register: spec.name, value }, 2 + spec.width);
    }

    default: {
      const unreachable: never = type;
      throw new Error(`Unhandled command prefix for ${String(unreachable)}`);
    }
  }
}
