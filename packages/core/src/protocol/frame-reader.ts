import type { DecodeError } from '@steplink/shared';
import type { DecodeResult } from './frames.ts';

export type ReadItem<T> = { ok: true; value: T } | { ok: false; error: DecodeError };

/**
 * Accumulates stream chunks and hands out decoded values one at a time.
 * Partial frames stay buffered until the rest of their bytes arrive.
 */
export class FrameReader<T> {
  private buffer = Buffer.alloc(0);
  private readonly decode: (buffer: Buffer) => DecodeResult<T>;

  constructor(decode: (buffer: Buffer) => DecodeResult<T>) {
    this.decode = decode;
  }

  push(chunk: Uint8Array): void {
    this.buffer = this.buffer.length === 0
      ? Buffer.from(chunk)
      : Buffer.concat([this.buffer, chunk]);
  }

  next(): ReadItem<T> | null {
    const result = this.decode(this.buffer);
    if (result.status === 'incomplete') return null;
    this.buffer = this.buffer.subarray(result.consumed);
    return result.status === 'ok'
      ? { ok: true, value: result.value }
      : { ok: false, error: result.error };
  }

  /** Decodes everything currently buffered. */
  drain(): Array<ReadItem<T>> {
    const items: Array<ReadItem<T>> = [];
    for (let item = this.next(); item !== null; item = this.next()) {
      items.push(item);
    }
    return items;
  }

  get buffered(): number {
    return this.buffer.length;
  }

  clear(): void {
    this.buffer = Buffer.alloc(0);
  }
}
