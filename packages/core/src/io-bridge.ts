import { ProtocolViolation } from '@steplink/shared';
import type { Device } from './device.ts';
import type { DeviceEvent, PendingInputRequest, RunResult } from './types.ts';

export type EventSink = (event: DeviceEvent) => void;

/**
 * Relays program output to the controller and owns the single pending input
 * request slot.
 */
export class IoBridge {
  private readonly device: Device;
  private readonly emit: EventSink;
  private request: PendingInputRequest = 'none';
  private attached = false;

  private readonly onOutput = (text: string): void => {
    if (text.length > 0) this.emit({ type: 'output', text });
  };

  private readonly onErrorOutput = (text: string): void => {
    if (text.length > 0) this.emit({ type: 'error-output', text });
  };

  constructor(device: Device, emit: EventSink) {
    this.device = device;
    this.emit = emit;
  }

  attach(): void {
    if (this.attached) return;
    this.device.on('output', this.onOutput);
    this.device.on('error-output', this.onErrorOutput);
    this.attached = true;
  }

  detach(): void {
    if (!this.attached) return;
    this.device.off('output', this.onOutput);
    this.device.off('error-output', this.onErrorOutput);
    this.attached = false;
  }

  get pending(): PendingInputRequest {
    return this.request;
  }

  requestKey(): void {
    this.request = 'key';
    this.emit({ type: 'key-requested' });
  }

  requestString(): void {
    this.request = 'string';
    this.emit({ type: 'string-requested' });
  }

  supplyKey(key: string): RunResult {
    this.expect('key');
    this.request = 'none';
    return this.device.supplyKey(key);
  }

  supplyString(text: string): RunResult {
    this.expect('string');
    this.request = 'none';
    return this.device.supplyString(text);
  }

  private expect(kind: 'key' | 'string'): void {
    if (this.request === kind) return;
    if (this.request === 'none') {
      throw new ProtocolViolation(`Unexpected ${kind} input: the program is not waiting for input`);
    }
    throw new ProtocolViolation(
      `Unexpected ${kind} input: the program is waiting for a ${this.request}`,
    );
  }
}
