import { describe, expect, it } from 'vitest';
import { fromHex, hexDump, toHex } from './hex.ts';

describe('toHex', () => {
  it('encodes bytes as lowercase pairs', () => {
    expect(toHex(Buffer.from([0x00, 0xab, 0x10]))).toBe('00ab10');
  });

  it('respects the view offset of a subarray', () => {
    expect(toHex(Buffer.from([1, 2, 3, 4]).subarray(1, 3))).toBe('0203');
  });
});

describe('fromHex', () => {
  it('ignores a 0x prefix, whitespace and colons', () => {
    expect([...fromHex('0x01 02:ff')]).toEqual([0x01, 0x02, 0xff]);
  });

  it('accepts an empty string', () => {
    expect(fromHex('').length).toBe(0);
  });

  it('rejects odd lengths and non-hex characters', () => {
    expect(() => fromHex('abc')).toThrow('Invalid hex string: abc');
    expect(() => fromHex('zz')).toThrow('Invalid hex string: zz');
  });
});

describe('hexDump', () => {
  it('prints address, bytes and ascii columns', () => {
    expect(hexDump(Buffer.from('AB\n'), 0x10)).toBe(`0010  ${'41 42 0a'.padEnd(47)}  |AB.|`);
  });

  it('starts a new row every 16 bytes', () => {
    const data = Buffer.alloc(17, 0x61);
    const rows = hexDump(data).split('\n');
    expect(rows).toHaveLength(2);
    expect(rows[0]).toBe(`0000  ${Array(16).fill('61').join(' ')}  |${'a'.repeat(16)}|`);
    expect(rows[1]).toBe(`0010  ${'61'.padEnd(47)}  |a|`);
  });

  it('returns an empty string for no data', () => {
    expect(hexDump(Buffer.alloc(0))).toBe('');
  });
});
