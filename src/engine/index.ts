// Public codec surface

export type {
  LevelCode,
  Mine,
  MouseEventCode,
  MouseEventName,
  ReplayEvent,
  ReplayFooter,
  ReplayProfile,
  ReplayRecord,
} from "../types";

// Streams
export { ByteReader, ByteWriter } from "./byteStream";

// AVF
export { parseAvf, parseAvfBytes, avfReader } from "./avfParser";
export { writeAvf, writeAvfBytes } from "./avfWriter";

// CVF
export { compress, compressRecord, assertCompressible } from "./cvfWriter";
export { decompress, decompressRecord, cvfReader } from "./cvfReader";

// Component codecs
export { encodeMineBitmap, decodeMineBitmap, mineBitmapSize } from "./mineField";
export { encodeEventBlock, decodeEventBlock } from "./eventStream";
export { encodeVarints, decodeVarints } from "./varint";
export { zigzagEncode, zigzagDecode } from "./deltaCoding";
export { deriveRealTime } from "./footer";
export { MOUSE_EVENT_NAMES, profileOf } from "./constants";
export { levelName } from "./header";

// Outer stream + whole files
export type { CompressionBackend } from "./backends";
export {
  COMPRESSION_BACKENDS,
  DEFAULT_BACKEND,
  isCompressionBackend,
  unwrapPayload,
  wrapPayload,
} from "./backends";
export { compressBytes, decompressBytes } from "./publicApi";
export { compressFile, decompressFile } from "./replayIO";
export type { ConvertOptions, ConvertResult } from "./replayIO";

// Errors
export type {
  CompressionErrorCode,
  DecodeErrorCode,
  FormatErrorCode,
  ReplayCodecErrorCode,
} from "./errors";
export {
  CompressionError,
  DecodeError,
  FormatError,
  ReplayCodecError,
  isReplayCodecError,
} from "./errors";
