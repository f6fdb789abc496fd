import type { ReplayRecord } from "../types";
import { ByteReader, joinBytes } from "./byteStream";
import { eventRecordSize, INFO_CLOSE, INFO_OPEN, profileOf } from "./constants";
import { DecodeError } from "./errors";
import { applyTimeCorrections, readEventBlock } from "./eventStream";
import { decodeCvfFooter } from "./footer";
import { readHeader } from "./header";
import { readPresuffixTail } from "./avfParser";
import { decodeMineBitmap, mineBitmapSize } from "./mineField";
import { collectUntilByte, isEventStart, scanUntilPair } from "./scanners";

export function cvfReader(bytes: Uint8Array): ByteReader {
  return new ByteReader(
    bytes,
    (needed, position) =>
      new DecodeError("TRUNCATED", `CVF input ends at ${position} while ${needed} more byte(s) were expected`)
  );
}

/**
 * Read a CVF payload (already unwrapped from its backend) into a record.
 */
export function decompress(reader: ByteReader): ReplayRecord {
  const header = readHeader(
    reader,
    (level) => new DecodeError("INVALID_LEVEL", `Unknown level ${level}`)
  );
  const profile = profileOf(header.version);

  const mines = decodeMineBitmap(
    reader.readBytes(mineBitmapSize(header.rows, header.cols)),
    header.rows,
    header.cols
  );

  if (mines.length !== header.mineCount) {
    throw new DecodeError(
      "MINE_COUNT_MISMATCH",
      `Mine bitmap holds ${mines.length} mines but the header declares ${header.mineCount}`
    );
  }
  // AVF stores each mine as a (row, col) byte pair
  const wide = mines.find((m) => m.row > 0xff || m.col > 0xff);
  if (wide) {
    throw new DecodeError("MINE_OUT_OF_RANGE", `Mine (${wide.row}, ${wide.col}) does not fit an AVF mine record`);
  }

  const prestamp = collectUntilByte(reader, INFO_OPEN);
  const tsInfo = collectUntilByte(reader, INFO_CLOSE);

  // preevent runs up to the 0x00 0x01 block marker
  const preeventStart = reader.position;
  scanUntilPair(reader, isEventStart);
  const preevent = reader.span(preeventStart, reader.position - 2);

  const events = readEventBlock(reader);
  if (profile === "freesweeper") {
    applyTimeCorrections(events, reader.readBytes(events.length));
  }

  const sentinel = reader.readBytes(eventRecordSize(profile));
  const presuffix = joinBytes(sentinel, readPresuffixTail(reader, profile === "freesweeper"));

  const footer = decodeCvfFooter(reader.readRest());

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

export function decompressRecord(bytes: Uint8Array): ReplayRecord {
  return decompress(cvfReader(bytes));
}
