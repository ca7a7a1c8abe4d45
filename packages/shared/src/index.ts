export {
  StepLinkError,
  DecodeError,
  ProtocolViolation,
  AddressOutOfRange,
  DeviceCrash,
  ConnectionError,
  TimeoutError,
  ProtocolError,
  isStepLinkError,
  errorMessage,
} from './errors.ts';
export type { ErrorCode } from './errors.ts';

export { toHex, fromHex, hexDump } from './hex.ts';

export { createLogger, silentLogger } from './logger.ts';
export type { Logger, LoggerOptions } from './logger.ts';
