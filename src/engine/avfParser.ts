import type { Mine, ReplayRecord } from "../types";
import { ByteReader, joinBytes } from "./byteStream";
import {
  CHECKSUM_LABEL,
  CHECKSUM_TAIL_LENGTH,
  FOOTER_FIELD_SEPARATOR,
  INFO_CLOSE,
  INFO_OPEN,
  profileOf,
} from "./constants";
import { FormatError } from "./errors";
import { readAvfEvents } from "./eventStream";
import { parseAvfFooter } from "./footer";
import { readHeader } from "./header";
import { collectThroughSequence, collectUntilByte, isEventStart, scanUntilPair } from "./scanners";

export function avfReader(bytes: Uint8Array): ByteReader {
  return new ByteReader(
    bytes,
    (needed, position) =>
      new FormatError("TRUNCATED", `AVF input ends at ${position} while ${needed} more byte(s) were expected`)
  );
}

function readMinePairs(reader: ByteReader, count: number): Mine[] {
  const mines: Mine[] = [];
  for (let i = 0; i < count; i++) {
    const row = reader.readByte();
    const col = reader.readByte();
    mines.push({ row, col });
  }
  return mines;
}

/**
 * Find where the event records begin. The format has no length for the
 * bytes before them; the first record is recognised by its x-high byte
 * (<= 1) followed by a seconds-low byte of 1, which leaves the cursor three
 * bytes past the record start.
 */
function readPreevent(reader: ByteReader): Uint8Array {
  const start = reader.position;
  scanUntilPair(reader, isEventStart);
  const eventStart = reader.position - 3;
  if (eventStart < start) {
    throw new FormatError(
      "MISPLACED_EVENT_START",
      `Event records would start at ${eventStart}, before the end of the info block at ${start}`
    );
  }
  const preevent = reader.span(start, eventStart);
  reader.seekBack(3);
  return preevent;
}

/**
 * Two bytes, everything through "cs=", and the fixed tail that follow the
 * sentinel record.
 * FreeSweeper also keeps its first footer line here.
 */
export function readPresuffixTail(reader: ByteReader, freesweeper: boolean): Uint8Array {
  const start = reader.position;
  collectThroughSequence(reader, CHECKSUM_LABEL, 2);
  reader.readBytes(CHECKSUM_TAIL_LENGTH);
  if (freesweeper) {
    collectUntilByte(reader, FOOTER_FIELD_SEPARATOR);
  }
  return reader.span(start, reader.position);
}

/**
 * Parse an AVF replay from a reader positioned at its first byte.
 */
export function parseAvf(reader: ByteReader): ReplayRecord {
  const header = readHeader(
    reader,
    (level) => new FormatError("INVALID_LEVEL", `Unknown level ${level}`)
  );
  const profile = profileOf(header.version);

  const mines = readMinePairs(reader, header.mineCount);

  const prestamp = collectUntilByte(reader, INFO_OPEN);
  const tsInfo = collectUntilByte(reader, INFO_CLOSE);
  const preevent = readPreevent(reader);

  const { events, sentinel } = readAvfEvents(reader, profile);
  const presuffix = joinBytes(sentinel, readPresuffixTail(reader, profile === "freesweeper"));

  const footer = parseAvfFooter(reader.readRest(), { profile, events, tsInfo });

  return {
    ...header,
    mines,
    prestamp,
    tsInfo,
    preevent,
    events,
    presuffix,
    footer,
  };
}

export function parseAvfBytes(bytes: Uint8Array): ReplayRecord {
  return parseAvf(avfReader(bytes));
}
