import {
  brotliCompressSync,
  brotliDecompressSync,
  constants,
  deflateSync,
  gunzipSync,
  gzipSync,
  inflateSync,
} from "node:zlib";
import { DecodeError } from "./errors";

/** Outer byte stream a CVF payload is wrapped in. */
export const COMPRESSION_BACKENDS = ["plain", "gzip", "deflate", "brotli"] as const;

export type CompressionBackend = (typeof COMPRESSION_BACKENDS)[number];

export const DEFAULT_BACKEND: CompressionBackend = "brotli";

export function isCompressionBackend(x: unknown): x is CompressionBackend {
  return typeof x === "string" && COMPRESSION_BACKENDS.some((b) => b === x);
}

export function wrapPayload(payload: Uint8Array, backend: CompressionBackend): Uint8Array {
  switch (backend) {
    case "plain":
      return payload;
    case "gzip":
      return new Uint8Array(gzipSync(payload, { level: 9 }));
    case "deflate":
      return new Uint8Array(deflateSync(payload, { level: 9 }));
    case "brotli":
      return new Uint8Array(
        brotliCompressSync(payload, {
          params: {
            [constants.BROTLI_PARAM_QUALITY]: constants.BROTLI_MAX_QUALITY,
            [constants.BROTLI_PARAM_SIZE_HINT]: payload.length,
          },
        })
      );
  }
}

export function unwrapPayload(wrapped: Uint8Array, backend: CompressionBackend): Uint8Array {
  try {
    switch (backend) {
      case "plain":
        return wrapped;
      case "gzip":
        return new Uint8Array(gunzipSync(wrapped));
      case "deflate":
        return new Uint8Array(inflateSync(wrapped));
      case "brotli":
        return new Uint8Array(brotliDecompressSync(wrapped));
    }
  } catch (err: unknown) {
    throw new DecodeError(
      "BACKEND_FAILURE",
      `Could not unwrap ${backend} stream: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }
}
