import { EventEmitter } from 'node:events';
import type { DeviceSnapshot, RegisterName, RunResult, StackBounds } from './types.ts';

/**
 * The virtual machine as seen by the protocol engine. Implementations execute
 * their own instruction set; the engine only triggers single instructions and
 * reads state back. All methods are synchronous.
 *
 * Program output is reported through `output` / `error-output` events (one
 * string argument), emitted while `step()` or an input delivery is running.
 */
export abstract class Device extends EventEmitter {
  /** Number of addressable bytes (at most 0x10000). */
  abstract readonly memorySize: number;

  abstract registers(): DeviceSnapshot;

  abstract readMemory(address: number, length: number): Buffer;

  abstract writeMemory(address: number, data: Uint8Array): void;

  abstract setRegister(register: RegisterName, value: number): void;

  abstract stackBounds(): StackBounds;

  /** Executes exactly one instruction at the current pc. */
  abstract step(): RunResult;

  /** Completes the instruction that returned `awaiting-key`. */
  abstract supplyKey(key: string): RunResult;

  /** Completes the instruction that returned `awaiting-string`. */
  abstract supplyString(text: string): RunResult;
}
