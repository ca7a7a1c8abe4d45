export type RegisterName =
  | 'acc'
  | 'd0'
  | 'd1'
  | 'd2'
  | 'd3'
  | 'a0'
  | 'a1'
  | 'pc'
  | 'sp'
  | 'fp'
  | 'overflowed';

export interface DeviceSnapshot {
  pc: number;
  acc: number;
  sp: number;
  fp: number;
  data_reg: [number, number, number, number];
  addr_reg: [number, number];
  overflowed: boolean;
}

export interface StackBounds {
  /** First byte of the stack region (inclusive). */
  from: number;
  /** End of the stack region (exclusive). */
  to: number;
}

// Controller -> device
export type Command =
  | { type: 'step' }
  | { type: 'step-ignoring-breakpoints' }
  | { type: 'set-breakpoint'; address: number }
  | { type: 'clear-breakpoint'; address: number }
  | { type: 'request-dump' }
  | { type: 'input-key'; key: string }
  | { type: 'input-string'; text: string }
  | { type: 'request-memory'; from: number; to: number }
  | { type: 'request-stack' }
  | { type: 'set-memory'; address: number; bytes: Buffer }
  | { type: 'set-register'; register: RegisterName; value: number }
  | { type: 'stop' };

export type CommandType = Command['type'];

// Device -> controller
export type DeviceEvent =
  | { type: 'output'; text: string }
  | { type: 'error-output'; text: string }
  | { type: 'breakpoint-hit'; address: number }
  | { type: 'dump-result'; json: string }
  | { type: 'memory-result'; bytes: Buffer }
  | { type: 'stack-result'; bytes: Buffer }
  | { type: 'key-requested' }
  | { type: 'string-requested' }
  | { type: 'end-of-program' }
  | { type: 'crashed' };

export type DeviceEventType = DeviceEvent['type'];

export type EventOfType<T extends DeviceEventType> = Extract<DeviceEvent, { type: T }>;

export type PendingInputRequest = 'none' | 'key' | 'string';

export type RunResult =
  | { status: 'ok' }
  | { status: 'awaiting-key' }
  | { status: 'awaiting-string' }
  | { status: 'halted' }
  | { status: 'crashed'; reason?: string };

export type SessionState =
  | { kind: 'idle' }
  | { kind: 'suspended'; pending: 'key' | 'string' }
  | { kind: 'finished'; reason: 'end-of-program' | 'crashed' }
  | { kind: 'stopped' };

export type SessionOutcome = 'stopped' | 'end-of-program' | 'crashed' | 'disconnected';
