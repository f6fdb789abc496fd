import type { ClientMessage, ErrorMessage, ReplaySummary, ServerErrorCode, ServerMessage } from "./protocol";
import {
  COMPRESSION_BACKENDS,
  compressRecord,
  decompressRecord,
  isReplayCodecError,
  levelName,
  parseAvfBytes,
  profileOf,
  writeAvfBytes,
  type CompressionBackend,
  type ReplayRecord,
  unwrapPayload,
  wrapPayload,
} from "../engine";

export const SERVER_VERSION = "1.0.0";

export type HandlerOptions = {
  defaultBackend: CompressionBackend;
  maxPayloadBytes: number;
};

function withReqId<T extends ServerMessage>(msg: T, reqId?: string): T {
  if (!reqId) return msg;
  return { ...msg, reqId };
}

export function mkError(code: ServerErrorCode, message: string, reqId?: string): ErrorMessage {
  const msg: ErrorMessage = { type: "error", code, message };
  return withReqId(msg, reqId);
}

class PayloadTooLarge extends Error {}

function decodePayload(payload: string, opts: HandlerOptions): Uint8Array {
  const bytes = new Uint8Array(Buffer.from(payload, "base64"));
  if (bytes.length > opts.maxPayloadBytes) {
    throw new PayloadTooLarge(`Payload of ${bytes.length} bytes exceeds ${opts.maxPayloadBytes}`);
  }
  return bytes;
}

function encodePayload(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64");
}

export function summarize(record: ReplayRecord): ReplaySummary {
  const last = record.events[record.events.length - 1];
  return {
    version: record.version,
    profile: profileOf(record.version),
    level: record.level,
    levelName: levelName(record.level),
    cols: record.cols,
    rows: record.rows,
    mineCount: record.mineCount,
    eventCount: record.events.length,
    durationMs: last ? last.gametime : 0,
    skin: record.footer.skin,
    playerId: record.footer.playerId,
    arbiterVersion: record.footer.arbiterVersion,
  };
}

function dispatch(msg: ClientMessage, opts: HandlerOptions): ServerMessage {
  switch (msg.type) {
    case "hello":
      return {
        type: "welcome",
        serverVersion: SERVER_VERSION,
        backends: COMPRESSION_BACKENDS,
        defaultBackend: opts.defaultBackend,
      };

    case "compress": {
      const backend = msg.backend ?? opts.defaultBackend;
      const input = decodePayload(msg.payload, opts);
      const output = wrapPayload(compressRecord(parseAvfBytes(input)), backend);
      return {
        type: "compressed",
        payload: encodePayload(output),
        backend,
        inputBytes: input.length,
        outputBytes: output.length,
      };
    }

    case "decompress": {
      const backend = msg.backend ?? opts.defaultBackend;
      const input = decodePayload(msg.payload, opts);
      const output = writeAvfBytes(decompressRecord(unwrapPayload(input, backend)));
      return {
        type: "decompressed",
        payload: encodePayload(output),
        backend,
        inputBytes: input.length,
        outputBytes: output.length,
      };
    }

    case "inspect":
      return {
        type: "summary",
        summary: summarize(parseAvfBytes(decodePayload(msg.payload, opts))),
      };
  }
}

/**
 * Handle one validated client message. Codec failures become error
 * envelopes carrying the codec's error code; anything else propagates.
 */
export function handleClientMessage(msg: ClientMessage, opts: HandlerOptions): ServerMessage {
  try {
    return withReqId(dispatch(msg, opts), msg.reqId);
  } catch (err: unknown) {
    if (isReplayCodecError(err)) {
      return mkError(err.code, err.message, msg.reqId);
    }
    if (err instanceof PayloadTooLarge) {
      return mkError("PAYLOAD_TOO_LARGE", err.message, msg.reqId);
    }
    throw err;
  }
}
