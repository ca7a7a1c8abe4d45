import type { CommandType, DeviceEventType, RegisterName } from '../types.ts';

/** Largest payload a single length-prefixed chunk can carry. */
export const MAX_CHUNK = 255;

export const COMMAND_PREFIX = {
  step: 'e',
  'step-ignoring-breakpoints': 'f',
  stop: 'q',
  'set-breakpoint': 'b',
  'clear-breakpoint': 'c',
  'request-dump': 'd',
  'input-key': 'i',
  'input-string': 't',
  'request-memory': 'm',
  'request-stack': 's',
  'set-memory': 'n',
  'set-register': 'r',
} as const satisfies Record<CommandType, string>;

export const EVENT_PREFIX = {
  output: 'o',
  'error-output': 'e',
  'breakpoint-hit': 'h',
  'dump-result': 'd',
  'memory-result': 'm',
  'stack-result': 's',
  'key-requested': 'k',
  'string-requested': 't',
  'end-of-program': 'f',
  crashed: 'c',
} as const satisfies Record<DeviceEventType, string>;

function invert<K extends string>(table: Record<K, string>): Map<number, K> {
  const byByte = new Map<number, K>();
  for (const type in table) {
    byByte.set(table[type].charCodeAt(0), type);
  }
  return byByte;
}

export const COMMAND_BY_PREFIX = invert<CommandType>(COMMAND_PREFIX);
export const EVENT_BY_PREFIX = invert<DeviceEventType>(EVENT_PREFIX);

export function prefixByte(prefix: string): number {
  return prefix.charCodeAt(0);
}

export interface RegisterSpec {
  name: RegisterName;
  id: number;
  width: 1 | 2;
}

export const REGISTERS: readonly RegisterSpec[] = [
  { name: 'acc', id: 0x01, width: 1 },
  { name: 'd0', id: 0x02, width: 1 },
  { name: 'd1', id: 0x03, width: 1 },
  { name: 'd2', id: 0x04, width: 1 },
  { name: 'd3', id: 0x05, width: 1 },
  { name: 'a0', id: 0x06, width: 2 },
  { name: 'a1', id: 0x07, width: 2 },
  { name: 'pc', id: 0x08, width: 2 },
  { name: 'sp', id: 0x09, width: 2 },
  { name: 'fp', id: 0x0a, width: 2 },
  { name: 'overflowed', id: 0x0b, width: 1 },
];

export const REGISTER_BY_ID = new Map(REGISTERS.map((spec) => [spec.id, spec]));
export const REGISTER_BY_NAME = new Map(REGISTERS.map((spec) => [spec.name, spec]));

export function isRegisterName(value: string): value is RegisterName {
  return REGISTERS.some((spec) => spec.name === value);
}

export function registerSpec(name: RegisterName): RegisterSpec {
  const spec = REGISTER_BY_NAME.get(name);
  if (!spec) throw new RangeError(`Unknown register: ${name}`);
  return spec;
}

const PUNCTUATION = '!"#$%&\'()*+,-./:;<=>?@[\\]^_`{|}~';

export const NAMED_KEYS = {
  escape: '\x1b',
  space: ' ',
  return: '\n',
  tab: '\t',
  backspace: '\b',
} as const;

export type NamedKey = keyof typeof NAMED_KEYS;

const NAMED_KEY_CHARS = new Map<string, string>(Object.entries(NAMED_KEYS));

const SUPPORTED_KEYS = new Set<string>([
  ...'abcdefghijklmnopqrstuvwxyz',
  ...'ABCDEFGHIJKLMNOPQRSTUVWXYZ',
  ...'0123456789',
  ...PUNCTUATION,
  ...Object.values(NAMED_KEYS),
]);

export function isSupportedKey(key: string): boolean {
  return key.length === 1 && SUPPORTED_KEYS.has(key);
}

/** Resolves `a`, `escape`, `return`, ... to the single character sent on the wire. */
export function resolveKey(input: string): string | null {
  const named = NAMED_KEY_CHARS.get(input);
  if (named !== undefined) return named;
  return isSupportedKey(input) ? input : null;
}

export function isU16(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xffff;
}

export function isU8(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xff;
}
