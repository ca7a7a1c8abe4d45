import { describe, expect, it } from 'vitest';
import { ProtocolViolation } from '@steplink/shared';
import { IoBridge } from './io-bridge.ts';
import { ScriptedDevice } from './testing/scripted-device.ts';
import type { DeviceEvent } from './types.ts';

function setup() {
  const device = new ScriptedDevice([{ op: 'read-key' }, { op: 'read-string' }]);
  const events: DeviceEvent[] = [];
  const bridge = new IoBridge(device, (event) => events.push(event));
  return { device, events, bridge };
}

describe('IoBridge', () => {
  it('relays program output while attached', () => {
    const { device, events, bridge } = setup();
    device.emit('output', 'before');
    bridge.attach();
    device.emit('output', 'hello');
    device.emit('output', '');
    device.emit('error-output', 'oops');
    bridge.detach();
    device.emit('output', 'after');
    expect(events).toEqual([
      { type: 'output', text: 'hello' },
      { type: 'error-output', text: 'oops' },
    ]);
  });

  it('records a request and announces it', () => {
    const { events, bridge } = setup();
    expect(bridge.pending).toBe('none');
    bridge.requestKey();
    expect(bridge.pending).toBe('key');
    expect(events).toEqual([{ type: 'key-requested' }]);
  });

  it('hands matching input to the device and clears the request', () => {
    const { device, bridge } = setup();
    bridge.requestKey();
    expect(bridge.supplyKey('z')).toEqual({ status: 'ok' });
    expect(bridge.pending).toBe('none');
    expect(device.registers().acc).toBe(0x7a);

    bridge.requestString();
    bridge.supplyString('typed');
    expect(device.lastString).toBe('typed');
  });

  it('rejects input nobody asked for', () => {
    const { bridge } = setup();
    expect(() => bridge.supplyKey('a')).toThrow(ProtocolViolation);
    expect(() => bridge.supplyKey('a')).toThrow(
      'Unexpected key input: the program is not waiting for input',
    );
  });

  it('rejects the wrong kind of input and keeps the request', () => {
    const { bridge } = setup();
    bridge.requestString();
    expect(() => bridge.supplyKey('a')).toThrow(
      'Unexpected key input: the program is waiting for a string',
    );
    expect(bridge.pending).toBe('string');
  });
});
