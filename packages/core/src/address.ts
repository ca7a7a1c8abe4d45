import { isU16 } from './protocol/wire.ts';

/**
 * Parses a 16-bit address as written in assembler sources or typed at the
 * prompt: `@x1F`, `x1F`, `0x1F`, `@31` or `31`.
 */
export function parseAddress(input: string): number {
  const text = input.trim().replace(/^@/, '');
  let value: number;
  if (/^(0x|x)[0-9a-f]+$/i.test(text)) {
    value = parseInt(text.replace(/^0?x/i, ''), 16);
  } else if (/^[0-9]+$/.test(text)) {
    value = parseInt(text, 10);
  } else {
    throw new Error(`Invalid address: ${input}`);
  }
  if (!isU16(value)) {
    throw new Error(`Address out of range (0..65535): ${input}`);
  }
  return value;
}

export function formatAddress(address: number): string {
  return `0x${address.toString(16).toUpperCase().padStart(4, '0')}`;
}
