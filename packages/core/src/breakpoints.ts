import { isU16 } from './protocol/wire.ts';

export class BreakpointRegistry {
  private readonly addresses = new Set<number>();

  set(address: number): void {
    this.check(address);
    this.addresses.add(address);
  }

  /** Removing an address that was never set is not an error. */
  clear(address: number): void {
    this.check(address);
    this.addresses.delete(address);
  }

  contains(address: number): boolean {
    return this.addresses.has(address);
  }

  list(): number[] {
    return [...this.addresses].sort((a, b) => a - b);
  }

  get size(): number {
    return this.addresses.size;
  }

  private check(address: number): void {
    if (!isU16(address)) {
      throw new RangeError(`Breakpoint address must be 16-bit, got ${address}`);
    }
  }
}
