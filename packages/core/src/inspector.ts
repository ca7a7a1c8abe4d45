import { AddressOutOfRange, ProtocolError, ProtocolViolation, errorMessage } from '@steplink/shared';
import type { Device } from './device.ts';
import type { DeviceSnapshot, RegisterName } from './types.ts';
import { registerSpec } from './protocol/wire.ts';

/** Dump text with the field names and order controllers rely on. */
export function serializeSnapshot(snapshot: DeviceSnapshot): string {
  return JSON.stringify({
    pc: snapshot.pc,
    acc: snapshot.acc,
    sp: snapshot.sp,
    fp: snapshot.fp,
    data_reg: [...snapshot.data_reg],
    addr_reg: [...snapshot.addr_reg],
    overflowed: snapshot.overflowed,
  });
}

export class StateInspector {
  private readonly device: Device;

  constructor(device: Device) {
    this.device = device;
  }

  dump(): DeviceSnapshot {
    return this.device.registers();
  }

  /** Bytes in `[from, to)`. */
  readMemory(from: number, to: number): Buffer {
    if (from > to) {
      throw new ProtocolViolation(
        `Invalid memory range: start 0x${from.toString(16)} is after end 0x${to.toString(16)}`,
      );
    }
    this.checkRange(from, to - from);
    return this.device.readMemory(from, to - from);
  }

  readStack(): Buffer {
    const { from, to } = this.device.stackBounds();
    if (to <= from) return Buffer.alloc(0);
    this.checkRange(from, to - from);
    return this.device.readMemory(from, to - from);
  }

  writeMemory(address: number, data: Uint8Array): void {
    this.checkRange(address, data.length);
    this.device.writeMemory(address, data);
  }

  writeRegister(register: RegisterName, value: number): void {
    const spec = registerSpec(register);
    const max = register === 'overflowed' ? 1 : spec.width === 1 ? 0xff : 0xffff;
    if (!Number.isInteger(value) || value < 0 || value > max) {
      throw new ProtocolViolation(`Value ${value} is out of range for register ${register}`);
    }
    this.device.setRegister(register, value);
  }

  private checkRange(address: number, length: number): void {
    const limit = this.device.memorySize;
    if (address < 0 || address + length > limit) {
      throw new AddressOutOfRange(address, length, limit);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function intField(obj: Record<string, unknown>, name: string): number {
  const value = obj[name];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ProtocolError(`Dump field "${name}" must be an integer`);
  }
  return value;
}

function intList(obj: Record<string, unknown>, name: string, length: number): number[] {
  const value = obj[name];
  if (!Array.isArray(value) || value.length !== length || !value.every(Number.isInteger)) {
    throw new ProtocolError(`Dump field "${name}" must hold ${length} integers`);
  }
  return value.map(Number);
}

/** Inverse of {@link serializeSnapshot}; validates the shape. */
export function parseSnapshot(json: string): DeviceSnapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new ProtocolError(`Dump is not valid JSON: ${errorMessage(err)}`);
  }
  if (!isRecord(raw)) {
    throw new ProtocolError('Dump must be a JSON object');
  }
  const obj = raw;
  const [d0 = 0, d1 = 0, d2 = 0, d3 = 0] = intList(obj, 'data_reg', 4);
  const [a0 = 0, a1 = 0] = intList(obj, 'addr_reg', 2);
  const overflowed = obj['overflowed'];
  if (typeof overflowed !== 'boolean') {
    throw new ProtocolError('Dump field "overflowed" must be a boolean');
  }

  return {
    pc: intField(obj, 'pc'),
    acc: intField(obj, 'acc'),
    sp: intField(obj, 'sp'),
    fp: intField(obj, 'fp'),
    data_reg: [d0, d1, d2, d3],
    addr_reg: [a0, a1],
    overflowed,
  };
}
