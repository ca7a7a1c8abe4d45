export function toHex(data: Uint8Array): string {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('hex');
}

export function fromHex(input: string): Buffer {
  const clean = input.replace(/^0x/i, '').replace(/[\s:]/g, '');
  if (clean.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(clean)) {
    throw new Error(`Invalid hex string: ${input}`);
  }
  return Buffer.from(clean, 'hex');
}

function printable(byte: number): string {
  return byte >= 0x20 && byte < 0x7f ? String.fromCharCode(byte) : '.';
}

/**
 * Classic 16-bytes-per-row dump: `0010  41 42 ...  |AB..|`.
 * `base` is the address of the first byte.
 */
export function hexDump(data: Uint8Array, base = 0): string {
  const rows: string[] = [];
  for (let offset = 0; offset < data.length; offset += 16) {
    const row = data.subarray(offset, Math.min(offset + 16, data.length));
    const bytes = Array.from(row, (b) => b.toString(16).padStart(2, '0')).join(' ');
    const ascii = Array.from(row, printable).join('');
    const address = (base + offset).toString(16).padStart(4, '0');
    rows.push(`${address}  ${bytes.padEnd(47)}  |${ascii}|`);
  }
  return rows.join('\n');
}
