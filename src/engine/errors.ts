export type FormatErrorCode =
  | "INVALID_LEVEL"
  | "TRUNCATED"
  | "UNKNOWN_EVENT_TYPE"
  | "INVALID_EVENT_TIME"
  | "MISPLACED_EVENT_START"
  | "MALFORMED_FOOTER";

export type CompressionErrorCode =
  | "VALUE_TOO_LARGE"
  | "NEGATIVE_VALUE"
  | "BLOCK_TOO_LARGE"
  | "MINE_OUT_OF_RANGE"
  | "MINE_ORDER"
  | "MINE_COUNT_MISMATCH"
  | "UNDELIMITED_SPAN";

export type DecodeErrorCode =
  | "TRUNCATED_BLOCK"
  | "UNKNOWN_OPCODE"
  | "INVALID_LEVEL"
  | "TRUNCATED"
  | "MALFORMED_FOOTER"
  | "MINE_COUNT_MISMATCH"
  | "MINE_OUT_OF_RANGE"
  | "EVENT_OUT_OF_RANGE"
  | "BACKEND_FAILURE";

export type ReplayCodecErrorCode = FormatErrorCode | CompressionErrorCode | DecodeErrorCode;

/**
 * Base class for every failure raised by the codec. All of them are terminal
 * for the file being processed.
 */
export class ReplayCodecError<C extends ReplayCodecErrorCode = ReplayCodecErrorCode> extends Error {
  readonly code: C;

  constructor(code: C, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Raised while parsing AVF input. */
export class FormatError extends ReplayCodecError<FormatErrorCode> {}

/** Raised while building CVF output. */
export class CompressionError extends ReplayCodecError<CompressionErrorCode> {}

/** Raised while reading CVF input. */
export class DecodeError extends ReplayCodecError<DecodeErrorCode> {}

export function isReplayCodecError(err: unknown): err is ReplayCodecError {
  return err instanceof ReplayCodecError;
}
