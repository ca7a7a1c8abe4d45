import { readFileSync } from 'node:fs';

export interface DebugOp {
  byte: number;
  original_line: string;
  line_num: number;
  processed_line: string;
}

export interface DebugDataString {
  addr: number;
  key: string;
  original_line: string;
  line_num: number;
  usage: number[];
}

export interface DebugLabel {
  byte: number;
  name: string;
  original_line: string;
  line_num: number;
  usage: number[];
}

export interface DebugModelData {
  ops: DebugOp[];
  strings: DebugDataString[];
  data: DebugDataString[];
  labels: DebugLabel[];
}

type Fields = Record<string, unknown>;

function isFields(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asObject(value: unknown, where: string): Fields {
  if (!isFields(value)) throw new Error(`${where} must be an object`);
  return value;
}

function int(obj: Fields, key: string, where: string): number {
  const value = obj[key];
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new Error(`${where}.${key} must be a non-negative integer`);
  }
  return value;
}

function str(obj: Fields, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== 'string') throw new Error(`${where}.${key} must be a string`);
  return value;
}

function usage(obj: Fields, where: string): number[] {
  const value = obj['usage'] ?? [];
  if (!Array.isArray(value) || !value.every((n) => typeof n === 'number' && Number.isInteger(n))) {
    throw new Error(`${where}.usage must be a list of addresses`);
  }
  return value.map(Number);
}

function list<T>(root: Fields, key: string, parse: (obj: Fields, where: string) => T): T[] {
  const value = root[key] ?? [];
  if (!Array.isArray(value)) throw new Error(`"${key}" must be an array`);
  return value.map((entry, i) => {
    const where = `${key}[${i}]`;
    return parse(asObject(entry, where), where);
  });
}

export function validateDebugModel(raw: unknown): DebugModelData {
  const root = asObject(raw, 'debug model');
  const dataString = (obj: Fields, where: string): DebugDataString => ({
    addr: int(obj, 'addr', where),
    key: str(obj, 'key', where),
    original_line: str(obj, 'original_line', where),
    line_num: int(obj, 'line_num', where),
    usage: usage(obj, where),
  });

  return {
    ops: list(root, 'ops', (obj, where) => ({
      byte: int(obj, 'byte', where),
      original_line: str(obj, 'original_line', where),
      line_num: int(obj, 'line_num', where),
      processed_line: str(obj, 'processed_line', where),
    })),
    strings: list(root, 'strings', dataString),
    data: list(root, 'data', dataString),
    labels: list(root, 'labels', (obj, where) => ({
      byte: int(obj, 'byte', where),
      name: str(obj, 'name', where),
      original_line: str(obj, 'original_line', where),
      line_num: int(obj, 'line_num', where),
      usage: usage(obj, where),
    })),
  };
}

/** Source lookup over the assembler's debug output. */
export class DebugModel {
  readonly data: DebugModelData;
  private readonly opsByAddress: Map<number, DebugOp>;
  private readonly labelsByName: Map<string, DebugLabel>;
  private readonly labelsByAddress: Map<number, DebugLabel>;

  constructor(data: DebugModelData) {
    this.data = data;
    this.opsByAddress = new Map(data.ops.map((op) => [op.byte, op]));
    this.labelsByName = new Map(data.labels.map((label) => [label.name, label]));
    this.labelsByAddress = new Map(data.labels.map((label) => [label.byte, label]));
  }

  static load(filePath: string): DebugModel {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (err) {
      throw new Error(`Failed to read ${filePath}: ${err instanceof Error ? err.message : err}`);
    }
    try {
      return new DebugModel(validateDebugModel(raw));
    } catch (err) {
      throw new Error(`${filePath}: ${err instanceof Error ? err.message : err}`);
    }
  }

  opAt(address: number): DebugOp | undefined {
    return this.opsByAddress.get(address);
  }

  labelAt(address: number): DebugLabel | undefined {
    return this.labelsByAddress.get(address);
  }

  labelAddress(name: string): number | undefined {
    return this.labelsByName.get(name)?.byte;
  }

  /** `main (line 4): CPY ACC 5` style description of an address. */
  describe(address: number): string | undefined {
    const op = this.opAt(address);
    if (!op) return undefined;
    const label = this.labelAt(address);
    const prefix = label ? `${label.name} ` : '';
    return `${prefix}(line ${op.line_num}): ${op.original_line.trim()}`;
  }
}
