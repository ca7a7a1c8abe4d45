// Types
export type {
  RegisterName,
  DeviceSnapshot,
  StackBounds,
  Command,
  CommandType,
  DeviceEvent,
  DeviceEventType,
  EventOfType,
  PendingInputRequest,
  RunResult,
  SessionState,
  SessionOutcome,
} from './types.ts';

// Wire format
export {
  encodeCommand,
  decodeCommand,
  encodeEvent,
  decodeEvent,
  FrameReader,
  encodeChunks,
  readChunks,
  chunkCount,
  MAX_CHUNK,
  COMMAND_PREFIX,
  EVENT_PREFIX,
  REGISTERS,
  NAMED_KEYS,
  isRegisterName,
  isSupportedKey,
  resolveKey,
  registerSpec,
} from './protocol/index.ts';
export type { DecodeResult, ReadItem, NamedKey, RegisterSpec } from './protocol/index.ts';

// Engine
export { Device } from './device.ts';
export { BreakpointRegistry } from './breakpoints.ts';
export { StateInspector, serializeSnapshot, parseSnapshot } from './inspector.ts';
export { IoBridge } from './io-bridge.ts';
export type { EventSink } from './io-bridge.ts';
export { ExecutionController } from './controller.ts';
export type { ControllerOptions } from './controller.ts';
export { PipedSession, runPipedSession } from './session.ts';
export type { PipedSessionOptions } from './session.ts';

// Controller side
export { DeviceClient } from './client/device-client.ts';
export type { DeviceClientOptions, SpawnOptions } from './client/device-client.ts';
export { CommandScript } from './script/command-script.ts';
export { DebugModel, validateDebugModel } from './debug/debug-model.ts';
export type { DebugModelData, DebugOp, DebugLabel, DebugDataString } from './debug/debug-model.ts';

// Address utilities
export { parseAddress, formatAddress } from './address.ts';

// Config
export type { ProjectConfig } from './config/project-config.ts';
export {
  CONFIG_FILENAME,
  loadProjectConfig,
  validateConfig,
  writeProjectConfig,
} from './config/project-config.ts';
