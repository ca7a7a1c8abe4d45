import { hexDump, fromHex } from '@steplink/shared';
import {
  formatAddress,
  isRegisterName,
  parseAddress,
  parseSnapshot,
  resolveKey,
  type Command,
  type DebugModel,
  type DeviceEvent,
} from '@steplink/core';

export type ReplAction =
  | { kind: 'commands'; commands: Command[] }
  | { kind: 'breakpoints' }
  | { kind: 'help' }
  | { kind: 'quit' }
  | { kind: 'noop' };

export const REPL_HELP = [
  'step [n]            execute n instructions (stops at breakpoints)',
  'force [n]           execute n instructions ignoring breakpoints',
  'break <addr|label>  set a breakpoint',
  'clear <addr|label>  remove a breakpoint',
  'breakpoints         list breakpoints set in this session',
  'dump                show registers',
  'mem <from> <to>     read memory [from, to)',
  'stack               read the stack',
  'key <key>           answer a key request (a, 7, escape, return, ...)',
  'text <string>       answer a string request',
  'poke <addr> <hex>   write bytes',
  'reg <name> <value>  set a register (acc, d0-d3, a0, a1, pc, sp, fp, overflowed)',
  'quit                stop the device and exit',
].join('\n');

function parseNumber(input: string): number {
  if (/^(0x|x)[0-9a-f]+$/i.test(input)) return parseInt(input.replace(/^0?x/i, ''), 16);
  if (/^[0-9]+$/.test(input)) return parseInt(input, 10);
  throw new Error(`Invalid number: ${input}`);
}

function parseCount(input: string | undefined): number {
  if (input === undefined) return 1;
  const count = parseNumber(input);
  if (count < 1) throw new Error('Count must be at least 1');
  return count;
}

function resolveTarget(input: string | undefined, model?: DebugModel): number {
  if (!input) throw new Error('Missing address');
  const label = model?.labelAddress(input);
  if (label !== undefined) return label;
  return parseAddress(input);
}

function repeat(command: Command, count: number): Command[] {
  return Array.from({ length: count }, () => command);
}

export function parseReplLine(line: string, model?: DebugModel): ReplAction {
  const trimmed = line.trim();
  if (trimmed.length === 0) return { kind: 'noop' };

  const [word = '', ...rest] = trimmed.split(/\s+/);
  const name = word.toLowerCase();

  switch (name) {
    case 'step':
    case 's':
      return { kind: 'commands', commands: repeat({ type: 'step' }, parseCount(rest[0])) };
    case 'force':
    case 'f':
      return {
        kind: 'commands',
        commands: repeat({ type: 'step-ignoring-breakpoints' }, parseCount(rest[0])),
      };
    case 'break':
    case 'b':
      return {
        kind: 'commands',
        commands: [{ type: 'set-breakpoint', address: resolveTarget(rest[0], model) }],
      };
    case 'clear':
      return {
        kind: 'commands',
        commands: [{ type: 'clear-breakpoint', address: resolveTarget(rest[0], model) }],
      };
    case 'breakpoints':
      return { kind: 'breakpoints' };
    case 'dump':
    case 'd':
      return { kind: 'commands', commands: [{ type: 'request-dump' }] };
    case 'mem':
      return {
        kind: 'commands',
        commands: [{
          type: 'request-memory',
          from: resolveTarget(rest[0], model),
          to: resolveTarget(rest[1], model),
        }],
      };
    case 'stack':
      return { kind: 'commands', commands: [{ type: 'request-stack' }] };
    case 'key': {
      if (!rest[0]) throw new Error('Missing key');
      const key = resolveKey(rest[0]);
      if (key === null) throw new Error(`Unsupported key: ${rest[0]}`);
      return { kind: 'commands', commands: [{ type: 'input-key', key }] };
    }
    case 'text':
      // Keep the original spacing after the command word.
      return {
        kind: 'commands',
        commands: [{ type: 'input-string', text: line.trimStart().slice(word.length + 1) }],
      };
    case 'poke': {
      const address = resolveTarget(rest[0], model);
      if (!rest[1]) throw new Error('Missing data');
      return {
        kind: 'commands',
        commands: [{ type: 'set-memory', address, bytes: fromHex(rest.slice(1).join('')) }],
      };
    }
    case 'reg': {
      const register = rest[0]?.toLowerCase() ?? '';
      if (!isRegisterName(register)) throw new Error(`Unknown register: ${rest[0] ?? ''}`);
      if (!rest[1]) throw new Error('Missing value');
      return {
        kind: 'commands',
        commands: [{ type: 'set-register', register, value: parseNumber(rest[1]) }],
      };
    }
    case 'help':
    case '?':
      return { kind: 'help' };
    case 'quit':
    case 'exit':
    case 'q':
      return { kind: 'quit' };
    default:
      throw new Error(`Unknown command: ${word} (try "help")`);
  }
}

export function formatEvent(event: DeviceEvent, model?: DebugModel): string {
  switch (event.type) {
    case 'output':
      return event.text;
    case 'error-output':
      return `! ${event.text}`;
    case 'breakpoint-hit': {
      const where = model?.describe(event.address);
      return `breakpoint at ${formatAddress(event.address)}${where ? ` ${where}` : ''}`;
    }
    case 'dump-result': {
      const s = parseSnapshot(event.json);
      const data = s.data_reg.map((v, i) => `D${i}=${v}`).join(' ');
      const addr = s.addr_reg.map((v, i) => `A${i}=${formatAddress(v)}`).join(' ');
      return [
        `PC=${formatAddress(s.pc)} SP=${formatAddress(s.sp)} FP=${formatAddress(s.fp)} ACC=${s.acc}${s.overflowed ? ' (overflow)' : ''}`,
        `${data} ${addr}`,
      ].join('\n');
    }
    case 'memory-result':
    case 'stack-result':
      return event.bytes.length > 0 ? hexDump(event.bytes) : '(empty)';
    case 'key-requested':
      return 'program is waiting for a key (key <key>)';
    case 'string-requested':
      return 'program is waiting for a string (text <string>)';
    case 'end-of-program':
      return 'program finished';
    case 'crashed':
      return 'program crashed';
    default: {
      const unreachable: never = event;
      return JSON.stringify(unreachable);
    }
  }
}
