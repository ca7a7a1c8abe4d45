export type ErrorCode =
  | 'DECODE_ERROR'
  | 'PROTOCOL_VIOLATION'
  | 'ADDRESS_OUT_OF_RANGE'
  | 'DEVICE_CRASH'
  | 'CONNECTION_ERROR'
  | 'TIMEOUT'
  | 'PROTOCOL_ERROR';

export class StepLinkError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Unknown prefix byte or a fixed field that cannot be decoded. */
export class DecodeError extends StepLinkError {
  /** Offset of the first offending byte in the decoded buffer. */
  readonly offset: number;

  constructor(message: string, offset = 0) {
    super('DECODE_ERROR', message);
    this.offset = offset;
  }
}

/** A well-formed command that is not valid in the current session state. */
export class ProtocolViolation extends StepLinkError {
  constructor(message: string) {
    super('PROTOCOL_VIOLATION', message);
  }
}

export class AddressOutOfRange extends StepLinkError {
  readonly address: number;
  readonly length: number;

  constructor(address: number, length: number, limit: number) {
    super(
      'ADDRESS_OUT_OF_RANGE',
      `Access of ${length} byte(s) at 0x${address.toString(16)} exceeds device memory (0x${limit.toString(16)} bytes)`,
    );
    this.address = address;
    this.length = length;
  }
}

export class DeviceCrash extends StepLinkError {
  constructor(message: string) {
    super('DEVICE_CRASH', message);
  }
}

export class ConnectionError extends StepLinkError {
  constructor(message: string) {
    super('CONNECTION_ERROR', message);
  }
}

export class TimeoutError extends StepLinkError {
  constructor(message: string) {
    super('TIMEOUT', message);
  }
}

export class ProtocolError extends StepLinkError {
  constructor(message: string) {
    super('PROTOCOL_ERROR', message);
  }
}

export function isStepLinkError(err: unknown): err is StepLinkError {
  return err instanceof StepLinkError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
