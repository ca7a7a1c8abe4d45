import { describe, expect, it } from 'vitest';
import type { Command } from '../types.ts';
import { decodeCommand, encodeCommand } from './command-codec.ts';

const bytes = (...values: number[]) => Buffer.from(values);

describe('encodeCommand', () => {
  it('encodes bare commands as their prefix byte', () => {
    expect(encodeCommand({ type: 'step' })).toEqual(bytes(0x65));
    expect(encodeCommand({ type: 'step-ignoring-breakpoints' })).toEqual(bytes(0x66));
    expect(encodeCommand({ type: 'stop' })).toEqual(bytes(0x71));
    expect(encodeCommand({ type: 'request-dump' })).toEqual(bytes(0x64));
    expect(encodeCommand({ type: 'request-stack' })).toEqual(bytes(0x73));
  });

  it('writes addresses big-endian', () => {
    expect(encodeCommand({ type: 'set-breakpoint', address: 0x1234 })).toEqual(bytes(0x62, 0x12, 0x34));
    expect(encodeCommand({ type: 'clear-breakpoint', address: 0x0001 })).toEqual(bytes(0x63, 0x00, 0x01));
    expect(encodeCommand({ type: 'request-memory', from: 0x10, to: 0x0120 })).toEqual(
      bytes(0x6d, 0x00, 0x10, 0x01, 0x20),
    );
  });

  it('encodes register writes by id and width', () => {
    expect(encodeCommand({ type: 'set-register', register: 'acc', value: 7 })).toEqual(bytes(0x72, 0x01, 0x07));
    expect(encodeCommand({ type: 'set-register', register: 'pc', value: 0x0102 })).toEqual(
      bytes(0x72, 0x08, 0x01, 0x02),
    );
    expect(encodeCommand({ type: 'set-register', register: 'overflowed', value: 1 })).toEqual(
      bytes(0x72, 0x0b, 0x01),
    );
  });

  it('encodes keys, strings and memory writes', () => {
    expect(encodeCommand({ type: 'input-key', key: 'a' })).toEqual(bytes(0x69, 0x61));
    expect(encodeCommand({ type: 'input-key', key: '\x1b' })).toEqual(bytes(0x69, 0x1b));
    expect(encodeCommand({ type: 'input-string', text: 'hi' })).toEqual(bytes(0x74, 0x02, 0x68, 0x69));
    expect(encodeCommand({ type: 'input-string', text: '' })).toEqual(bytes(0x74, 0x00));
    expect(encodeCommand({ type: 'set-memory', address: 0x0100, bytes: bytes(1, 2, 3) })).toEqual(
      bytes(0x6e, 0x01, 0x00, 0x03, 1, 2, 3),
    );
  });

  it('rejects values that do not fit the wire format', () => {
    expect(() => encodeCommand({ type: 'set-breakpoint', address: 0x10000 })).toThrow(
      'Breakpoint must be a 16-bit address, got 65536',
    );
    expect(() => encodeCommand({ type: 'input-key', key: 'é' })).toThrow(RangeError);
    expect(() => encodeCommand({ type: 'input-key', key: 'ab' })).toThrow(RangeError);
    expect(() => encodeCommand({ type: 'set-register', register: 'acc', value: 256 })).toThrow(
      'Value 256 does not fit register acc',
    );
    expect(() =>
      encodeCommand({ type: 'set-memory', address: 0, bytes: Buffer.alloc(256) }),
    ).toThrow('A single set-memory frame carries at most 255 bytes, got 256');
  });
});

describe('decodeCommand', () => {
  it('decodes every command type it encodes', () => {
    const commands: Command[] = [
      { type: 'step' },
      { type: 'step-ignoring-breakpoints' },
      { type: 'set-breakpoint', address: 0xbeef },
      { type: 'clear-breakpoint', address: 0 },
      { type: 'request-dump' },
      { type: 'input-key', key: '~' },
      { type: 'input-string', text: 'hello world' },
      { type: 'request-memory', from: 0, to: 0xffff },
      { type: 'request-stack' },
      { type: 'set-memory', address: 0x20, bytes: bytes(0xde, 0xad) },
      { type: 'set-register', register: 'sp', value: 0xfff0 },
      { type: 'stop' },
    ];
    for (const command of commands) {
      const encoded = encodeCommand(command);
      expect(decodeCommand(encoded)).toEqual({ status: 'ok', value: command, consumed: encoded.length });
    }
  });

  it('waits for the rest of a partial frame', () => {
    expect(decodeCommand(Buffer.alloc(0))).toEqual({ status: 'incomplete' });
    expect(decodeCommand(bytes(0x62, 0x12))).toEqual({ status: 'incomplete' });
    expect(decodeCommand(bytes(0x6e, 0x00, 0x10, 0x03, 1, 2))).toEqual({ status: 'incomplete' });
    expect(decodeCommand(bytes(0x72, 0x08, 0x01))).toEqual({ status: 'incomplete' });
    expect(decodeCommand(bytes(0x74, 0x05, 0x68))).toEqual({ status: 'incomplete' });
  });

  it('consumes only its own frame', () => {
    const result = decodeCommand(bytes(0x62, 0x00, 0x10, 0x65));
    expect(result).toEqual({ status: 'ok', value: { type: 'set-breakpoint', address: 0x10 }, consumed: 3 });
  });

  it('skips an unknown prefix up to the next command', () => {
    const single = decodeCommand(bytes(0x7a, 0x65));
    expect(single.status).toBe('error');
    if (single.status !== 'error') return;
    expect(single.error.message).toBe('Unknown command prefix 0x7a');
    expect(single.consumed).toBe(1);

    const run = decodeCommand(bytes(0x00, 0x01, 0x65));
    expect(run.status).toBe('error');
    if (run.status !== 'error') return;
    expect(run.error.message).toBe('Unknown command prefix 0x00 (skipped 2 bytes)');
    expect(run.consumed).toBe(2);
  });

  it('rejects unsupported key bytes and unknown register ids', () => {
    const key = decodeCommand(bytes(0x69, 0x01));
    expect(key.status === 'error' && [key.error.message, key.error.offset, key.consumed]).toEqual([
      'Unsupported key byte 0x01',
      1,
      2,
    ]);

    const reg = decodeCommand(bytes(0x72, 0x0c, 0x00));
    expect(reg.status === 'error' && [reg.error.message, reg.consumed]).toEqual(['Unknown register id 0x0c', 2]);
  });
});

describe('string chunking', () => {
  it('splits long strings into 255-byte chunks', () => {
    const text = 'a'.repeat(600);
    const encoded = encodeCommand({ type: 'input-string', text });
    expect(encoded.length).toBe(606);
    expect([encoded[0], encoded[1]]).toEqual([0x74, 255]);
    expect([encoded[257], encoded[258]]).toEqual([0x74, 255]);
    expect([encoded[514], encoded[515]]).toEqual([0x74, 90]);
    expect(decodeCommand(encoded)).toEqual({ status: 'ok', value: { type: 'input-string', text }, consumed: 606 });
  });

  it('sends an exact multiple of 255 as full chunks only', () => {
    const text = 'b'.repeat(510);
    const encoded = encodeCommand({ type: 'input-string', text });
    expect(encoded.length).toBe(514);
    expect([encoded[0], encoded[1], encoded[257], encoded[258]]).toEqual([0x74, 255, 0x74, 255]);
    expect(decodeCommand(encoded)).toEqual({ status: 'ok', value: { type: 'input-string', text }, consumed: 514 });
  });

  it('sends a 255-byte string as a single frame', () => {
    const text = 'c'.repeat(255);
    const encoded = encodeCommand({ type: 'input-string', text });
    expect(encoded.length).toBe(257);
    expect(decodeCommand(encoded)).toEqual({ status: 'ok', value: { type: 'input-string', text }, consumed: 257 });
  });

  it('ends a payload at a full chunk followed by another command', () => {
    const buffer = Buffer.concat([bytes(0x74, 255), Buffer.alloc(255, 0x61), bytes(0x65)]);
    expect(decodeCommand(buffer)).toEqual({
      status: 'ok',
      value: { type: 'input-string', text: 'a'.repeat(255) },
      consumed: 257,
    });
    expect(decodeCommand(buffer.subarray(257))).toEqual({ status: 'ok', value: { type: 'step' }, consumed: 1 });
  });

  it('waits for a continuation chunk that has started arriving', () => {
    const head = Buffer.concat([bytes(0x74, 255), Buffer.alloc(255, 0x61)]);
    expect(decodeCommand(Buffer.concat([head, bytes(0x74)]))).toEqual({ status: 'incomplete' });
    expect(decodeCommand(Buffer.concat([head, bytes(0x74, 2, 0x62)]))).toEqual({ status: 'incomplete' });
    expect(decodeCommand(Buffer.concat([head, bytes(0x74, 1, 0x62)]))).toEqual({
      status: 'ok',
      value: { type: 'input-string', text: `${'a'.repeat(255)}b` },
      consumed: 260,
    });
  });
});
