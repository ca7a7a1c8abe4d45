import { describe, expect, it } from 'vitest';
import { decodeCommand, encodeCommand } from './command-codec.ts';
import { FrameReader } from './frame-reader.ts';

describe('FrameReader', () => {
  it('holds a partial frame until the rest arrives', () => {
    const reader = new FrameReader(decodeCommand);
    const frame = encodeCommand({ type: 'set-breakpoint', address: 0x0010 });

    reader.push(frame.subarray(0, 2));
    expect(reader.next()).toBeNull();
    expect(reader.buffered).toBe(2);

    reader.push(frame.subarray(2));
    expect(reader.next()).toEqual({ ok: true, value: { type: 'set-breakpoint', address: 0x10 } });
    expect(reader.buffered).toBe(0);
  });

  it('keeps going after a decode error', () => {
    const reader = new FrameReader(decodeCommand);
    reader.push(Buffer.from([0x65, 0x00, 0x65]));
    const items = reader.drain();
    expect(items).toHaveLength(3);
    expect(items[0]).toEqual({ ok: true, value: { type: 'step' } });
    expect(items[1]?.ok === false && items[1].error.message).toBe('Unknown command prefix 0x00');
    expect(items[2]).toEqual({ ok: true, value: { type: 'step' } });
  });

  it('decodes several frames from one chunk in order', () => {
    const reader = new FrameReader(decodeCommand);
    reader.push(
      Buffer.concat([
        encodeCommand({ type: 'input-string', text: 'abc' }),
        encodeCommand({ type: 'request-memory', from: 1, to: 2 }),
      ]),
    );
    expect(reader.drain()).toEqual([
      { ok: true, value: { type: 'input-string', text: 'abc' } },
      { ok: true, value: { type: 'request-memory', from: 1, to: 2 } },
    ]);
  });

  it('drops buffered bytes on clear', () => {
    const reader = new FrameReader(decodeCommand);
    reader.push(Buffer.from([0x62]));
    reader.clear();
    expect(reader.buffered).toBe(0);
    expect(reader.drain()).toEqual([]);
  });
});
