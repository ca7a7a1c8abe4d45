import { spawn, type ChildProcess } from 'node:child_process';
import { EventEmitter } from 'node:events';
import type { Readable, Writable } from 'node:stream';
import { ConnectionError, ProtocolError, TimeoutError } from '@steplink/shared';
import { parseSnapshot } from '../inspector.ts';
import { encodeCommand } from '../protocol/command-codec.ts';
import { decodeEvent } from '../protocol/event-codec.ts';
import { FrameReader } from '../protocol/frame-reader.ts';
import { MAX_CHUNK, resolveKey } from '../protocol/wire.ts';
import type {
  Command,
  DeviceEvent,
  DeviceEventType,
  DeviceSnapshot,
  EventOfType,
  RegisterName,
} from '../types.ts';

export interface DeviceClientOptions {
  /** Default wait for query results, in milliseconds. */
  timeout?: number;
}

export interface SpawnOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Controller side of the protocol. Sends commands to a device running in
 * piped mode and decodes the events it writes back.
 *
 * Events are re-emitted as `event` and under their own type name; decode
 * failures as `decode-error`; `close` once the device stream ends.
 */
export class DeviceClient extends EventEmitter {
  private child: ChildProcess | null = null;
  private source: Readable | null = null;
  private sink: Writable | null = null;
  private readonly reader = new FrameReader<DeviceEvent>(decodeEvent);
  private closed = false;
  readonly timeout: number;

  private readonly onData = (chunk: Buffer): void => {
    this.receive(chunk);
  };

  constructor(options: DeviceClientOptions = {}) {
    super();
    this.timeout = options.timeout ?? 5_000;
  }

  /** Starts a device process with piped stdio. Its stderr is passed through. */
  async spawn(command: string, args: string[] = [], options: SpawnOptions = {}): Promise<void> {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      stdio: ['pipe', 'pipe', 'inherit'],
    });
    this.child = child;

    await new Promise<void>((resolve, reject) => {
      child.once('spawn', () => resolve());
      child.once('error', (err) => {
        reject(new ConnectionError(`Failed to start ${command}: ${err.message}`));
      });
    });

    const { stdin, stdout } = child;
    if (!stdin || !stdout) throw new ConnectionError(`${command} has no piped stdio`);
    this.attach(stdout, stdin);
  }

  /** Binds to already open streams: `source` carries events, `sink` takes commands. */
  attach(source: Readable, sink: Writable): void {
    this.source = source;
    this.sink = sink;
    this.closed = false;
    source.on('data', this.onData);
    source.once('end', () => this.markClosed());
    source.once('error', () => this.markClosed());
    // EPIPE once the device has exited.
    sink.on('error', () => this.markClosed());
  }

  get connected(): boolean {
    return this.sink !== null && !this.closed;
  }

  send(command: Command): void {
    if (!this.sink || this.closed) throw new ConnectionError('Device not connected');
    this.sink.write(encodeCommand(command));
  }

  step(): void {
    this.send({ type: 'step' });
  }

  stepIgnoringBreakpoints(): void {
    this.send({ type: 'step-ignoring-breakpoints' });
  }

  setBreakpoint(address: number): void {
    this.send({ type: 'set-breakpoint', address });
  }

  clearBreakpoint(address: number): void {
    this.send({ type: 'clear-breakpoint', address });
  }

  /** Accepts a single supported character or a key name such as `escape`. */
  sendKey(key: string): void {
    const resolved = resolveKey(key);
    if (resolved === null) throw new RangeError(`Unsupported key: ${key}`);
    this.send({ type: 'input-key', key: resolved });
  }

  sendString(text: string): void {
    this.send({ type: 'input-string', text });
  }

  /** Splits large writes into consecutive set-memory frames. */
  writeMemory(address: number, data: Uint8Array): void {
    if (address + data.length > 0x10000) {
      throw new RangeError(`Write of ${data.length} bytes at 0x${address.toString(16)} exceeds 16-bit memory`);
    }
    for (let offset = 0; offset < data.length; offset += MAX_CHUNK) {
      const bytes = Buffer.from(data.subarray(offset, offset + MAX_CHUNK));
      this.send({ type: 'set-memory', address: address + offset, bytes });
    }
  }

  setRegister(register: RegisterName, value: number): void {
    this.send({ type: 'set-register', register, value });
  }

  stop(): void {
    this.send({ type: 'stop' });
  }

  async dump(timeoutMs = this.timeout): Promise<DeviceSnapshot> {
    const result = this.waitFor('dump-result', timeoutMs);
    this.send({ type: 'request-dump' });
    return parseSnapshot((await result).json);
  }

  async readMemory(from: number, to: number, timeoutMs = this.timeout): Promise<Buffer> {
    if (from > to) throw new RangeError(`Range start 0x${from.toString(16)} is after its end`);
    const result = this.waitFor('memory-result', timeoutMs);
    this.send({ type: 'request-memory', from, to });
    return (await result).bytes;
  }

  async readStack(timeoutMs = this.timeout): Promise<Buffer> {
    const result = this.waitFor('stack-result', timeoutMs);
    this.send({ type: 'request-stack' });
    return (await result).bytes;
  }

  /** Resolves with the next event of `type` received from now on. */
  waitFor<T extends DeviceEventType>(type: T, timeoutMs = this.timeout): Promise<EventOfType<T>> {
    return new Promise((resolve, reject) => {
      if (this.closed) {
        reject(new ConnectionError(`Device closed while waiting for ${type}`));
        return;
      }

      const cleanup = (): void => {
        clearTimeout(timer);
        this.off('event', onEvent);
        this.off('close', onClose);
      };

      const onEvent = (event: DeviceEvent): void => {
        if (!isEventOfType(event, type)) return;
        cleanup();
        resolve(event);
      };

      const onClose = (): void => {
        cleanup();
        reject(new ConnectionError(`Device closed while waiting for ${type}`));
      };

      const timer = setTimeout(() => {
        cleanup();
        reject(new TimeoutError(`Timed out after ${timeoutMs}ms waiting for ${type}`));
      }, timeoutMs);

      this.on('event', onEvent);
      this.on('close', onClose);
    });
  }

  /** Sends stop (when still connected) and releases the streams. */
  close(): void {
    if (this.connected) {
      this.stop();
      this.sink?.end();
    }
    this.markClosed();
    if (this.child && this.child.exitCode === null) {
      this.child.kill();
    }
    this.child = null;
    this.source = null;
    this.sink = null;
  }

  getPid(): number | undefined {
    return this.child?.pid;
  }

  private receive(chunk: Buffer): void {
    this.reader.push(chunk);
    for (const item of this.reader.drain()) {
      if (item.ok) {
        this.emit('event', item.value);
        this.emit(item.value.type, item.value);
      } else {
        this.emit('decode-error', new ProtocolError(item.error.message));
      }
    }
  }

  private markClosed(): void {
    if (this.closed) return;
    this.closed = true;
    this.source?.off('data', this.onData);
    this.emit('close');
  }
}

function isEventOfType<T extends DeviceEventType>(
  event: DeviceEvent,
  type: T,
): event is EventOfType<T> {
  return event.type === type;
}
