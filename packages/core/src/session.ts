import { EventEmitter } from 'node:events';
import type { Readable, Writable } from 'node:stream';
import { silentLogger, type Logger } from '@steplink/shared';
import { ExecutionController } from './controller.ts';
import type { Device } from './device.ts';
import { decodeCommand } from './protocol/command-codec.ts';
import { encodeEvent } from './protocol/event-codec.ts';
import { FrameReader } from './protocol/frame-reader.ts';
import type { Command, DeviceEvent, SessionOutcome } from './types.ts';

export interface PipedSessionOptions {
  input: Readable;
  output: Writable;
  logger?: Logger;
  logCommands?: boolean;
  /** End the output stream when the session terminates. */
  endOutput?: boolean;
}

/**
 * Runs the protocol over a pair of byte streams: commands in, events out.
 * Emits `event` for every outbound event and `command` for every decoded
 * command, mostly for tracing.
 */
export class PipedSession extends EventEmitter {
  readonly controller: ExecutionController;
  private readonly input: Readable;
  private readonly output: Writable;
  private readonly logger: Logger;
  private readonly endOutput: boolean;
  private readonly reader = new FrameReader<Command>(decodeCommand);
  private outcome: SessionOutcome | null = null;
  private settle: ((outcome: SessionOutcome) => void) | null = null;

  private readonly onData = (chunk: Buffer | string): void => {
    this.reader.push(typeof chunk === 'string' ? Buffer.from(chunk, 'latin1') : chunk);
    this.pump();
  };

  private readonly onEnd = (): void => {
    if (this.reader.buffered > 0) {
      this.logger.warn(`Input closed with ${this.reader.buffered} byte(s) of an incomplete frame`);
    }
    this.close('disconnected');
  };

  private readonly onError = (err: Error): void => {
    this.logger.error(`Input stream error: ${err.message}`);
    this.close('disconnected');
  };

  // Stays attached after close: a late EPIPE must not go unhandled.
  private readonly onOutputError = (err: Error): void => {
    this.logger.error(`Output stream error: ${err.message}`);
    this.close('disconnected');
  };

  constructor(device: Device, options: PipedSessionOptions) {
    super();
    this.input = options.input;
    this.output = options.output;
    this.logger = options.logger ?? silentLogger;
    this.endOutput = options.endOutput ?? false;
    this.controller = new ExecutionController(device, (event) => this.write(event), {
      logger: this.logger,
      logCommands: options.logCommands,
    });
  }

  /** Starts consuming input; resolves once the session has terminated. */
  run(): Promise<SessionOutcome> {
    if (this.outcome) return Promise.resolve(this.outcome);
    return new Promise((resolve) => {
      this.settle = resolve;
      this.input.on('data', this.onData);
      this.input.once('end', this.onEnd);
      this.input.once('error', this.onError);
      this.output.on('error', this.onOutputError);
      this.input.resume();
    });
  }

  private pump(): void {
    while (!this.outcome) {
      const item = this.reader.next();
      if (item === null) return;

      if (!item.ok) {
        this.logger.warn(item.error.message);
        this.controller.reportError(item.error.message);
        continue;
      }

      this.emit('command', item.value);
      this.controller.handle(item.value);

      const state = this.controller.state;
      if (state.kind === 'stopped') this.close('stopped');
      else if (state.kind === 'finished') this.close(state.reason);
    }
  }

  // One write per event keeps every frame of it contiguous on the wire.
  private write(event: DeviceEvent): void {
    this.emit('event', event);
    this.output.write(encodeEvent(event));
  }

  private close(outcome: SessionOutcome): void {
    if (this.outcome) return;
    this.outcome = outcome;
    this.input.off('data', this.onData);
    this.input.off('end', this.onEnd);
    this.input.off('error', this.onError);
    this.input.pause();
    if (this.reader.buffered > 0) {
      this.logger.debug(`Discarding ${this.reader.buffered} byte(s) received after the session ended`);
    }
    this.reader.clear();
    this.logger.debug(`Session ended: ${outcome}`);
    if (this.endOutput) this.output.end();
    this.settle?.(outcome);
  }
}

export function runPipedSession(
  device: Device,
  options: PipedSessionOptions,
): Promise<SessionOutcome> {
  return new PipedSession(device, options).run();
}
