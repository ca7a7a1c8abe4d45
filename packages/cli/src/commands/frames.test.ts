import { describe, expect, it } from 'vitest';
import { decodeCommand, decodeEvent } from '@steplink/core';
import { decodeStream } from './frames.ts';

describe('decodeStream', () => {
  it('prints one JSON line per command and per error', () => {
    const bytes = Buffer.from([0x62, 0x00, 0x10, 0x00, 0x6e, 0x00, 0x01, 0x02, 0xab, 0xcd, 0x62]);
    expect(decodeStream(bytes, decodeCommand)).toEqual({
      lines: [
        '{"type":"set-breakpoint","address":16}',
        '{"error":"Unknown command prefix 0x00"}',
        '{"type":"set-memory","address":1,"bytes":"abcd"}',
      ],
      trailing: 1,
    });
  });

  it('decodes event streams', () => {
    const bytes = Buffer.from([0x6f, 0x02, 0x68, 0x69, 0x6b]);
    expect(decodeStream(bytes, decodeEvent)).toEqual({
      lines: ['{"type":"output","text":"hi"}', '{"type":"key-requested"}'],
      trailing: 0,
    });
  });
});
