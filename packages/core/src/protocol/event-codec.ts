import type { DeviceEvent } from '../types.ts';
import { EVENT_BY_PREFIX, EVENT_PREFIX, isU16, prefixByte } from './wire.ts';
import { type DecodeResult, INCOMPLETE, encodeChunks, ok, readChunks, resync, u16 } from './frames.ts';

export function encodeEvent(event: DeviceEvent): Buffer {
  const prefix = prefixByte(EVENT_PREFIX[event.type]);

  switch (event.type) {
    case 'output':
    case 'error-output':
      return encodeChunks(prefix, Buffer.from(event.text, 'utf-8'));

    case 'dump-result':
      return encodeChunks(prefix, Buffer.from(event.json, 'utf-8'));

    case 'memory-result':
    case 'stack-result':
      return encodeChunks(prefix, event.bytes);

    case 'breakpoint-hit':
      if (!isU16(event.address)) {
        throw new RangeError(`Breakpoint address must be 16-bit, got ${event.address}`);
      }
      return Buffer.concat([Buffer.from([prefix]), u16(event.address)]);

    case 'key-requested':
    case 'string-requested':
    case 'end-of-program':
    case 'crashed':
      return Buffer.from([prefix]);

    default: {
      const unreachable: never = event;
      throw new Error(`Unhandled event: ${JSON.stringify(unreachable)}`);
    }
  }
}

function isEventPrefix(byte: number): boolean {
  return EVENT_BY_PREFIX.has(byte);
}

export function decodeEvent(buffer: Buffer): DecodeResult<DeviceEvent> {
  const first = buffer[0];
  if (first === undefined) return INCOMPLETE;

  const type = EVENT_BY_PREFIX.get(first);
  if (type === undefined) return resync(buffer, isEventPrefix, 'event');

  switch (type) {
    case 'output':
    case 'error-output':
    case 'dump-result':
    case 'memory-result':
    case 'stack-result': {
      const chunks = readChunks(buffer);
      if (chunks.status !== 'ok') return chunks;
      const payload = chunks.value;
      if (type === 'memory-result' || type === 'stack-result') {
        return ok<DeviceEvent>({ type, bytes: payload }, chunks.consumed);
      }
      if (type === 'dump-result') {
        return ok<DeviceEvent>({ type, json: payload.toString('utf-8') }, chunks.consumed);
      }
      return ok<DeviceEvent>({ type, text: payload.toString('utf-8') }, chunks.consumed);
    }

    case 'breakpoint-hit':
      if (buffer.length < 3) return INCOMPLETE;
      return ok<DeviceEvent>({ type, address: buffer.readUInt16BE(1) }, 3);

    case 'key-requested':
    case 'string-requested':
    case 'end-of-program':
    case 'crashed':
      return ok<DeviceEvent>({ type }, 1);

    default: {
      const unreachable: never = type;
      throw new Error(`Unhandled event prefix for ${String(unreachable)}`);
    }
  }
}
