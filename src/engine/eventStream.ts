import type { MouseEventCode, ReplayEvent, ReplayProfile } from "../types";
import type { ByteReader, ByteWriter } from "./byteStream";
import { eventRecordSize, isMouseEventCode, OPCODE_END } from "./constants";
import { deltaEncode, prefixSum, zigzagDecode, zigzagEncode } from "./deltaCoding";
import { baseOpcode, lookupCompound, resolveOpcode } from "./dictionary";
import { CompressionError, DecodeError, FormatError } from "./errors";
import { decodeVarints, encodeVarints } from "./varint";

export const MAX_EVENT_BLOCK_LENGTH = 0xffffff;

// Largest value of each AVF record field
const MAX_POSITION = 0xffff;
const MAX_GAMETIME = 0xffff * 1000 - 1;

// =============================================================================
// AVF event records
// =============================================================================

export type AvfEventRun = {
  events: ReplayEvent[];

  /** The terminating record, kept verbatim. */
  sentinel: Uint8Array;
};

/**
 * Read fixed-size records until the sentinel (stored seconds of 0).
 *
 * Record layout: mouse, x hi, sec lo, x lo, hundredths, y hi, sec hi, y lo
 * and, for FreeSweeper, a trailing millisecond byte.
 */
export function readAvfEvents(reader: ByteReader, profile: ReplayProfile): AvfEventRun {
  const size = eventRecordSize(profile);
  const events: ReplayEvent[] = [];

  for (;;) {
    const offset = reader.position;
    const record = reader.readBytes(size);
    const [mouse, x1, s2, x2, hun, y1, s1, y2] = record;
    const sec = ((s1 << 8) | s2) - 1;

    if (sec < 0) {
      return { events, sentinel: record };
    }

    if (!isMouseEventCode(mouse)) {
      throw new FormatError("UNKNOWN_EVENT_TYPE", `Unknown mouse event ${mouse} at offset ${offset}`);
    }

    const ms = profile === "freesweeper" ? record[8] : 0;
    if (hun > 99 || ms > 9) {
      throw new FormatError(
        "INVALID_EVENT_TIME",
        `Event at offset ${offset} has sub-second fields ${hun}/${ms} that do not fit a time`
      );
    }

    events.push({
      kind: mouse,
      gametime: 1000 * sec + 10 * hun + ms,
      xpos: (x1 << 8) | x2,
      ypos: (y1 << 8) | y2,
    });
  }
}

export function writeAvfEvents(events: readonly ReplayEvent[], writer: ByteWriter, profile: ReplayProfile): void {
  for (const e of events) {
    const sec = Math.floor(e.gametime / 1000) + 1;
    const hun = Math.floor((e.gametime % 1000) / 10);

    writer.writeByte(e.kind);
    writer.writeByte(e.xpos >> 8);
    writer.writeByte(sec & 0xff);
    writer.writeByte(e.xpos & 0xff);
    writer.writeByte(hun);
    writer.writeByte(e.ypos >> 8);
    writer.writeByte(sec >> 8);
    writer.writeByte(e.ypos & 0xff);

    if (profile === "freesweeper") {
      writer.writeByte(e.gametime % 10);
    }
  }
}

// =============================================================================
// CVF event block
// =============================================================================

/**
 * Build the event block body: opcode run, 0xFF, then the varint residuals
 * (all time deltas, then all x deltas, then all y deltas) of the events the
 * compound dictionary did not absorb.
 */
export function encodeEventBlock(events: readonly ReplayEvent[]): Uint8Array {
  const dts = deltaEncode(events.map((e) => Math.floor(e.gametime / 10)));
  const dxs = deltaEncode(events.map((e) => e.xpos)).map(zigzagEncode);
  const dys = deltaEncode(events.map((e) => e.ypos)).map(zigzagEncode);

  const opcodes: number[] = [];
  const tR: number[] = [];
  const xR: number[] = [];
  const yR: number[] = [];

  for (let i = 0; i < events.length; i++) {
    const op = events[i].kind;
    const dt = dts[i];
    if (dt < 0) {
      throw new CompressionError("NEGATIVE_VALUE", `Event ${i} is earlier than event ${i - 1}`);
    }

    const code = lookupCompound(op, dt, dxs[i], dys[i]);
    if (code !== undefined) {
      opcodes.push(code);
      continue;
    }

    opcodes.push(baseOpcode(op));
    tR.push(dt);
    xR.push(dxs[i]);
    yR.push(dys[i]);
  }

  const residuals = encodeVarints([...tR, ...xR, ...yR]);

  const block = new Uint8Array(opcodes.length + 1 + residuals.length);
  block.set(opcodes, 0);
  block[opcodes.length] = OPCODE_END;
  block.set(residuals, opcodes.length + 1);
  return block;
}

export function decodeEventBlock(block: Uint8Array): ReplayEvent[] {
  const end = block.indexOf(OPCODE_END);
  if (end < 0) {
    throw new DecodeError("TRUNCATED_BLOCK", "Event block has no end-of-opcodes marker");
  }

  const resolved = Array.from(block.subarray(0, end), (code, i) => {
    const r = resolveOpcode(code);
    if (!r) {
      throw new DecodeError("UNKNOWN_OPCODE", `Unknown opcode ${code} at event ${i}`);
    }
    return r;
  });

  const residuals = decodeVarints(block.subarray(end + 1));
  const baseCount = resolved.filter((r) => r.kind === "base").length;
  if (residuals.length !== baseCount * 3) {
    throw new DecodeError(
      "TRUNCATED_BLOCK",
      `Event block carries ${residuals.length} residuals for ${baseCount} non-dictionary events`
    );
  }

  const kinds: MouseEventCode[] = [];
  const dts: number[] = [];
  const dxs: number[] = [];
  const dys: number[] = [];
  let cursor = 0;

  for (const r of resolved) {
    if (r.kind === "compound") {
      kinds.push(r.vector.op);
      dts.push(r.vector.dt);
      dxs.push(r.vector.dx);
      dys.push(r.vector.dy);
      continue;
    }
    kinds.push(r.op);
    dts.push(residuals[cursor]);
    dxs.push(residuals[baseCount + cursor]);
    dys.push(residuals[2 * baseCount + cursor]);
    cursor += 1;
  }

  const ts = prefixSum(dts);
  const xs = prefixSum(dxs.map(zigzagDecode));
  const ys = prefixSum(dys.map(zigzagDecode));

  return kinds.map((kind, i) => {
    const event = { kind, gametime: ts[i] * 10, xpos: xs[i], ypos: ys[i] };
    assertRecordable(event, i);
    return event;
  });
}

/** Decoded events must fit the AVF record they will be written as. */
function assertRecordable(e: ReplayEvent, index: number): void {
  if (e.xpos < 0 || e.xpos > MAX_POSITION || e.ypos < 0 || e.ypos > MAX_POSITION) {
    throw new DecodeError(
      "EVENT_OUT_OF_RANGE",
      `Event ${index} decodes to position (${e.xpos}, ${e.ypos}) outside 0..${MAX_POSITION}`
    );
  }
  if (e.gametime > MAX_GAMETIME) {
    throw new DecodeError("EVENT_OUT_OF_RANGE", `Event ${index} decodes to time ${e.gametime}ms past ${MAX_GAMETIME}ms`);
  }
}

/** Length-prefixed (u24 BE) event block. */
export function writeEventBlock(writer: ByteWriter, events: readonly ReplayEvent[]): void {
  const block = encodeEventBlock(events);
  if (block.length > MAX_EVENT_BLOCK_LENGTH) {
    throw new CompressionError("BLOCK_TOO_LARGE", `Event block of ${block.length} bytes overflows its length field`);
  }
  writer.writeU24BE(block.length);
  writer.writeBytes(block);
}

export function readEventBlock(reader: ByteReader): ReplayEvent[] {
  const length = reader.readU24BE();
  if (reader.remaining < length) {
    throw new DecodeError(
      "TRUNCATED_BLOCK",
      `Event block declares ${length} bytes but only ${reader.remaining} remain`
    );
  }
  return decodeEventBlock(reader.readBytes(length));
}

// =============================================================================
// FreeSweeper millisecond corrections
// =============================================================================

export function encodeTimeCorrections(events: readonly ReplayEvent[]): Uint8Array {
  return Uint8Array.from(events, (e) => e.gametime % 10);
}

export function applyTimeCorrections(events: ReplayEvent[], corrections: Uint8Array): void {
  const bad = corrections.findIndex((c) => c > 9);
  if (bad >= 0) {
    throw new DecodeError(
      "EVENT_OUT_OF_RANGE",
      `Millisecond correction ${corrections[bad]} for event ${bad} is not a single digit`
    );
  }
  events.forEach((e, i) => {
    e.gametime += corrections[i];
  });
}
