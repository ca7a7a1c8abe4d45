import {
  DeviceCrash,
  ProtocolViolation,
  errorMessage,
  isStepLinkError,
  silentLogger,
  type Logger,
} from '@steplink/shared';
import { BreakpointRegistry } from './breakpoints.ts';
import type { Device } from './device.ts';
import { StateInspector, serializeSnapshot } from './inspector.ts';
import { IoBridge, type EventSink } from './io-bridge.ts';
import type { Command, RunResult, SessionState } from './types.ts';

export interface ControllerOptions {
  logger?: Logger;
  /** Log every applied command at debug level. */
  logCommands?: boolean;
}

function describe(command: Command): string {
  switch (command.type) {
    case 'set-breakpoint':
    case 'clear-breakpoint':
      return `${command.type} 0x${command.address.toString(16)}`;
    case 'request-memory':
      return `${command.type} 0x${command.from.toString(16)}..0x${command.to.toString(16)}`;
    case 'set-memory':
      return `${command.type} 0x${command.address.toString(16)} (${command.bytes.length} bytes)`;
    case 'set-register':
      return `${command.type} ${command.register}=${command.value}`;
    case 'input-key':
      return `${command.type} ${JSON.stringify(command.key)}`;
    case 'input-string':
      return `${command.type} (${Buffer.byteLength(command.text)} bytes)`;
    default:
      return command.type;
  }
}

/**
 * Owns one debug session: the breakpoints, the pending input request and the
 * device handle. Commands are applied one at a time, in the order given.
 */
export class ExecutionController {
  readonly breakpoints = new BreakpointRegistry();
  readonly inspector: StateInspector;
  private readonly device: Device;
  private readonly bridge: IoBridge;
  private readonly emit: EventSink;
  private readonly logger: Logger;
  private readonly logCommands: boolean;
  private current: SessionState = { kind: 'idle' };

  constructor(device: Device, emit: EventSink, options: ControllerOptions = {}) {
    this.device = device;
    this.emit = emit;
    this.logger = options.logger ?? silentLogger;
    this.logCommands = options.logCommands ?? false;
    this.inspector = new StateInspector(device);
    this.bridge = new IoBridge(device, emit);
    this.bridge.attach();
  }

  get state(): SessionState {
    return this.current;
  }

  get terminated(): boolean {
    return this.current.kind === 'finished' || this.current.kind === 'stopped';
  }

  handle(command: Command): void {
    if (this.terminated) {
      this.logger.debug(`Ignoring ${command.type}: session is ${this.current.kind}`);
      return;
    }
    if (this.logCommands) this.logger.debug(`<- ${describe(command)}`);

    try {
      this.apply(command);
    } catch (err) {
      this.recover(err);
    }
  }

  /** Reports a recoverable error to the controller; the session continues. */
  reportError(message: string): void {
    this.emit({ type: 'error-output', text: message });
  }

  private apply(command: Command): void {
    switch (command.type) {
      case 'step':
        this.step(true);
        return;
      case 'step-ignoring-breakpoints':
        this.step(false);
        return;
      case 'stop':
        this.finish({ kind: 'stopped' });
        return;
      case 'set-breakpoint':
        this.breakpoints.set(command.address);
        return;
      case 'clear-breakpoint':
        this.breakpoints.clear(command.address);
        return;
      case 'request-dump':
        this.emit({ type: 'dump-result', json: serializeSnapshot(this.inspector.dump()) });
        return;
      case 'request-memory':
        this.emit({
          type: 'memory-result',
          bytes: this.inspector.readMemory(command.from, command.to),
        });
        return;
      case 'request-stack':
        this.emit({ type: 'stack-result', bytes: this.inspector.readStack() });
        return;
      case 'set-memory':
        this.inspector.writeMemory(command.address, command.bytes);
        return;
      case 'set-register':
        this.inspector.writeRegister(command.register, command.value);
        return;
      case 'input-key':
        this.execute(() => this.bridge.supplyKey(command.key));
        return;
      case 'input-string':
        this.execute(() => this.bridge.supplyString(command.text));
        return;
      default: {
        const unreachable: never = command;
        throw new Error(`Unhandled command: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private step(checkBreakpoints: boolean): void {
    if (this.current.kind === 'suspended') {
      throw new ProtocolViolation(
        `Step refused: the program is waiting for ${this.current.pending} input`,
      );
    }

    const { pc } = this.device.registers();
    if (checkBreakpoints && this.breakpoints.contains(pc)) {
      this.emit({ type: 'breakpoint-hit', address: pc });
      return;
    }
    this.execute(() => this.device.step());
  }

  private execute(run: () => RunResult): void {
    let result: RunResult;
    try {
      result = run();
    } catch (err) {
      if (err instanceof ProtocolViolation) throw err;
      // Anything thrown while an instruction runs is a fault of the program.
      this.logger.error(`Device fault: ${errorMessage(err)}`);
      this.crash(errorMessage(err));
      return;
    }
    this.afterRun(result);
  }

  private afterRun(result: RunResult): void {
    switch (result.status) {
      case 'ok':
        this.current = { kind: 'idle' };
        return;
      case 'awaiting-key':
        this.current = { kind: 'suspended', pending: 'key' };
        this.bridge.requestKey();
        return;
      case 'awaiting-string':
        this.current = { kind: 'suspended', pending: 'string' };
        this.bridge.requestString();
        return;
      case 'halted':
        this.emit({ type: 'end-of-program' });
        this.finish({ kind: 'finished', reason: 'end-of-program' });
        return;
      case 'crashed':
        this.crash(result.reason);
        return;
      default: {
        const unreachable: never = result;
        throw new Error(`Unhandled run result: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private recover(err: unknown): void {
    if (err instanceof DeviceCrash) {
      this.logger.error(`Device fault: ${err.message}`);
      this.crash(err.message);
      return;
    }
    const message = errorMessage(err);
    if (isStepLinkError(err)) this.logger.warn(message);
    else this.logger.error(`Failed to apply command: ${message}`);
    this.reportError(message);
  }

  private crash(reason?: string): void {
    if (reason) this.emit({ type: 'error-output', text: reason });
    this.emit({ type: 'crashed' });
    this.finish({ kind: 'finished', reason: 'crashed' });
  }

  private finish(state: SessionState): void {
    this.current = state;
    this.bridge.detach();
  }
}
