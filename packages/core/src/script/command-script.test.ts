import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { CommandScript } from './command-script.ts';

describe('CommandScript', () => {
  it('builds commands in call order', () => {
    const script = new CommandScript()
      .breakpoint(0x10)
      .step(2)
      .step(1, true)
      .dump()
      .stop();
    expect(script.list()).toEqual([
      { type: 'set-breakpoint', address: 0x10 },
      { type: 'step' },
      { type: 'step' },
      { type: 'step-ignoring-breakpoints' },
      { type: 'request-dump' },
      { type: 'stop' },
    ]);
    expect(script.toBuffer()).toEqual(Buffer.from([0x62, 0x00, 0x10, 0x65, 0x65, 0x66, 0x64, 0x71]));
  });

  it('resolves key names', () => {
    const script = new CommandScript().key('escape').key('q');
    expect(script.list()).toEqual([
      { type: 'input-key', key: '\x1b' },
      { type: 'input-key', key: 'q' },
    ]);
    expect(() => new CommandScript().key('F1')).toThrow('Unsupported key: F1');
  });

  it('splits large pokes into consecutive writes', () => {
    const script = new CommandScript().poke(0x100, Buffer.alloc(300, 1));
    const commands = script.list();
    expect(commands).toHaveLength(2);
    expect(commands[0]).toMatchObject({ type: 'set-memory', address: 0x100 });
    expect(commands[1]).toMatchObject({ type: 'set-memory', address: 0x100 + 255 });
    expect(commands[1]?.type === 'set-memory' && commands[1].bytes.length).toBe(45);
  });

  it('writes the encoded stream to a file', () => {
    const dir = mkdtempSync(join(tmpdir(), 'steplink-script-'));
    try {
      const path = new CommandScript().text('hi').register('d1', 9).write(join(dir, 'out', 'session.bin'));
      expect([...readFileSync(path)]).toEqual([0x74, 0x02, 0x68, 0x69, 0x72, 0x03, 0x09]);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
