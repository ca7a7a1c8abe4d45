import { DecodeError } from '@steplink/shared';
import { MAX_CHUNK } from './wire.ts';

export type DecodeResult<T> =
  | { status: 'ok'; value: T; consumed: number }
  | { status: 'incomplete' }
  | { status: 'error'; error: DecodeError; consumed: number };

export const INCOMPLETE = { status: 'incomplete' } as const;

export function ok<T>(value: T, consumed: number): DecodeResult<T> {
  return { status: 'ok', value, consumed };
}

export function fail<T>(message: string, consumed: number, offset = 0): DecodeResult<T> {
  return { status: 'error', error: new DecodeError(message, offset), consumed };
}

export function hex8(n: number): string {
  return `0x${n.toString(16).padStart(2, '0')}`;
}

export function u16(value: number): Buffer {
  const buf = Buffer.alloc(2);
  buf.writeUInt16BE(value);
  return buf;
}

/**
 * Splits a payload into `<prefix><len><bytes>` frames of at most 255 bytes.
 * An empty payload still takes one (empty) frame.
 */
export function encodeChunks(prefix: number, payload: Uint8Array): Buffer {
  if (payload.length === 0) return Buffer.from([prefix, 0]);
  const frames: Buffer[] = [];
  for (let offset = 0; offset < payload.length; offset += MAX_CHUNK) {
    const part = payload.subarray(offset, offset + MAX_CHUNK);
    frames.push(Buffer.from([prefix, part.length]), Buffer.from(part));
  }
  return Buffer.concat(frames);
}

/** Number of frames {@link encodeChunks} produces for a payload of `length` bytes. */
export function chunkCount(length: number): number {
  return Math.max(1, Math.ceil(length / MAX_CHUNK));
}

/**
 * Reads the chunks of one payload starting at `buffer[0]` and joins them.
 * A full chunk continues into the next frame only when that frame carries the
 * same prefix; the payload ends at a short chunk, at a different byte, or at
 * the end of the buffered data. A continuation frame that has started but is
 * not complete yet makes the whole payload incomplete.
 */
export function readChunks(buffer: Buffer): DecodeResult<Buffer> {
  const prefix = buffer[0];
  if (prefix === undefined) return INCOMPLETE;

  const parts: Buffer[] = [];
  let pos = 0;
  for (;;) {
    const length = buffer[pos + 1];
    if (length === undefined || pos + 2 + length > buffer.length) return INCOMPLETE;

    parts.push(buffer.subarray(pos + 2, pos + 2 + length));
    pos += 2 + length;
    if (length < MAX_CHUNK || buffer[pos] !== prefix) return ok(Buffer.concat(parts), pos);
  }
}

/**
 * Skips from an unrecognized byte to the next byte `isPrefix` accepts (or the
 * end of the buffer) and reports the skipped range as one error.
 */
export function resync<T>(
  buffer: Buffer,
  isPrefix: (byte: number) => boolean,
  kind: string,
): DecodeResult<T> {
  let skip = 1;
  while (skip < buffer.length) {
    const byte = buffer[skip];
    if (byte !== undefined && isPrefix(byte)) break;
    skip++;
  }
  const first = buffer[0] ?? 0;
  const suffix = skip > 1 ? ` (skipped ${skip} bytes)` : '';
  return fail(`Unknown ${kind} prefix ${hex8(first)}${suffix}`, skip);
}
