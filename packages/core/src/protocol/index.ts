export { encodeCommand, decodeCommand } from './command-codec.ts';
export { encodeEvent, decodeEvent } from './event-codec.ts';
export { FrameReader } from './frame-reader.ts';
export type { ReadItem } from './frame-reader.ts';
export { encodeChunks, readChunks, chunkCount } from './frames.ts';
export type { DecodeResult } from './frames.ts';
export {
  MAX_CHUNK,
  COMMAND_PREFIX,
  EVENT_PREFIX,
  REGISTERS,
  NAMED_KEYS,
  isRegisterName,
  isSupportedKey,
  resolveKey,
  registerSpec,
} from './wire.ts';
export type { NamedKey, RegisterSpec } from './wire.ts';
