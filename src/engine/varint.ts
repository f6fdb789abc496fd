import { CompressionError, DecodeError } from "./errors";

export const VARINT_MAX = 0x7fff;

/**
 * 1 or 2 byte unsigned integers:
 *   0xxxxxxx           -> 0 .. 0x7F
 *   1xxxxxxx xxxxxxxx  -> 0x80 .. 0x7FFF
 */
export function encodeVarints(values: readonly number[]): Uint8Array {
  const out: number[] = [];
  for (const v of values) {
    if (!Number.isInteger(v) || v < 0) {
      throw new CompressionError("NEGATIVE_VALUE", `Varint value must be a non-negative integer, got ${v}`);
    }
    if (v < 0x80) {
      out.push(v);
    } else if (v <= VARINT_MAX) {
      out.push(0x80 | (v >> 8), v & 0xff);
    } else {
      throw new CompressionError("VALUE_TOO_LARGE", `Varint value ${v} exceeds ${VARINT_MAX}`);
    }
  }
  return Uint8Array.from(out);
}

export function decodeVarints(bytes: Uint8Array): number[] {
  const out: number[] = [];
  let i = 0;
  while (i < bytes.length) {
    const b = bytes[i];
    if ((b & 0x80) === 0) {
      out.push(b);
      i += 1;
      continue;
    }
    if (i + 1 >= bytes.length) {
      throw new DecodeError("TRUNCATED_BLOCK", `Varint at offset ${i} is missing its second byte`);
    }
    out.push(((b & 0x7f) << 8) | bytes[i + 1]);
    i += 2;
  }
  return out;
}
