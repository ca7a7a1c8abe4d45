import { writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { encodeCommand } from '../protocol/command-codec.ts';
import { MAX_CHUNK, resolveKey } from '../protocol/wire.ts';
import type { Command, RegisterName } from '../types.ts';

/**
 * Builds a pre-encoded command stream, e.g. to feed a device from a file:
 * `device --piped prog < session.bin`.
 */
export class CommandScript {
  private commands: Command[] = [];

  breakpoint(address: number): this {
    this.commands.push({ type: 'set-breakpoint', address });
    return this;
  }

  clearBreakpoint(address: number): this {
    this.commands.push({ type: 'clear-breakpoint', address });
    return this;
  }

  step(count = 1, ignoreBreakpoints = false): this {
    const type = ignoreBreakpoints ? 'step-ignoring-breakpoints' : 'step';
    for (let i = 0; i < count; i++) this.commands.push({ type });
    return this;
  }

  dump(): this {
    this.commands.push({ type: 'request-dump' });
    return this;
  }

  memory(from: number, to: number): this {
    this.commands.push({ type: 'request-memory', from, to });
    return this;
  }

  stack(): this {
    this.commands.push({ type: 'request-stack' });
    return this;
  }

  key(name: string): this {
    const key = resolveKey(name);
    if (key === null) throw new RangeError(`Unsupported key: ${name}`);
    this.commands.push({ type: 'input-key', key });
    return this;
  }

  text(value: string): this {
    this.commands.push({ type: 'input-string', text: value });
    return this;
  }

  poke(address: number, data: Uint8Array): this {
    for (let offset = 0; offset < data.length; offset += MAX_CHUNK) {
      const bytes = Buffer.from(data.subarray(offset, offset + MAX_CHUNK));
      this.commands.push({ type: 'set-memory', address: address + offset, bytes });
    }
    return this;
  }

  register(register: RegisterName, value: number): this {
    this.commands.push({ type: 'set-register', register, value });
    return this;
  }

  stop(): this {
    this.commands.push({ type: 'stop' });
    return this;
  }

  raw(command: Command): this {
    this.commands.push(command);
    return this;
  }

  get length(): number {
    return this.commands.length;
  }

  list(): Command[] {
    return [...this.commands];
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.commands.map(encodeCommand));
  }

  write(path: string): string {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, this.toBuffer());
    return path;
  }
}
