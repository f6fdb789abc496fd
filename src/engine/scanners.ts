import type { ByteReader } from "./byteStream";

/**
 * Collect bytes until `terminator`. The terminator is consumed but not
 * included in the result.
 */
export function collectUntilByte(reader: ByteReader, terminator: number): Uint8Array {
  const start = reader.position;
  for (;;) {
    if (reader.readByte() === terminator) {
      return reader.span(start, reader.position - 1);
    }
  }
}

export type PairTest = (previous: number, current: number) => boolean;

/**
 * Read one byte unconditionally, then keep reading until `test(previous,
 * current)` holds. Leaves the cursor just past the matching byte.
 */
export function scanUntilPair(reader: ByteReader, test: PairTest): void {
  let previous = reader.readByte();
  for (;;) {
    const current = reader.readByte();
    if (test(previous, current)) return;
    previous = current;
  }
}

/** The marker in front of the event stream: a byte <= 1 followed by 1. */
export const isEventStart: PairTest = (previous, current) => previous <= 1 && current === 1;

/**
 * Read `lead` bytes, then single bytes until the last `sequence.length` bytes
 * read equal `sequence`. Returns everything read, sequence included.
 */
export function collectThroughSequence(
  reader: ByteReader,
  sequence: readonly number[],
  lead: number
): Uint8Array {
  if (lead < sequence.length - 1) {
    throw new RangeError(`Lead of ${lead} is too short for a ${sequence.length}-byte sequence`);
  }

  const start = reader.position;
  const keep = sequence.length - 1;
  const leading = reader.readBytes(lead);
  const window: number[] = keep > 0 ? Array.from(leading.subarray(lead - keep)) : [];

  for (;;) {
    window.push(reader.readByte());
    if (window.length > sequence.length) window.shift();
    if (window.length === sequence.length && window.every((b, i) => b === sequence[i])) {
      return reader.span(start, reader.position);
    }
  }
}
