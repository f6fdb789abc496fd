import type { ReplayRecord } from "../types";
import { ByteReader, ByteWriter } from "./byteStream";
import {
  EVENT_BLOCK_MARKER,
  eventRecordSize,
  FOOTER_FIELD_SEPARATOR,
  INFO_CLOSE,
  INFO_OPEN,
  profileOf,
} from "./constants";
import { CompressionError } from "./errors";
import { encodeTimeCorrections, writeEventBlock } from "./eventStream";
import { encodeCvfFooter } from "./footer";
import { writeHeader } from "./header";
import { readPresuffixTail } from "./avfParser";
import { assertMinesInBitmapOrder, encodeMineBitmap } from "./mineField";
import { isEventStart } from "./scanners";

function undelimited(message: string): CompressionError {
  return new CompressionError("UNDELIMITED_SPAN", message);
}

/**
 * CVF has no lengths for the opaque spans; each one is found again by the
 * same scan that delimited it in AVF. Reject records whose spans would not
 * be found at the same boundaries.
 */
function assertSpansDelimited(record: ReplayRecord): void {
  if (record.prestamp.includes(INFO_OPEN)) {
    throw undelimited("prestamp contains '['");
  }
  if (record.tsInfo.includes(INFO_CLOSE)) {
    throw undelimited("tsInfo contains ']'");
  }
  for (let i = 1; i < record.preevent.length; i++) {
    if (isEventStart(record.preevent[i - 1], record.preevent[i])) {
      throw undelimited(`preevent contains an event-start marker at ${i - 1}`);
    }
  }

  const profile = profileOf(record.version);
  const reader = new ByteReader(record.presuffix, () => undelimited("presuffix ends before its checksum tail"));
  reader.readBytes(eventRecordSize(profile));
  readPresuffixTail(reader, profile === "freesweeper");
  if (reader.remaining !== 0) {
    throw undelimited(`presuffix has ${reader.remaining} byte(s) past its checksum tail`);
  }

  const { skin, playerId, arbiterVersion } = record.footer;
  if ([skin, playerId, arbiterVersion].some((f) => f.includes(String.fromCharCode(FOOTER_FIELD_SEPARATOR)))) {
    throw undelimited("footer field contains a carriage return");
  }
}

export function assertCompressible(record: ReplayRecord): void {
  if (record.mines.length !== record.mineCount) {
    throw new CompressionError(
      "MINE_COUNT_MISMATCH",
      `Record lists ${record.mines.length} mines but declares ${record.mineCount}`
    );
  }
  assertMinesInBitmapOrder(record.mines, record.rows, record.cols);
  assertSpansDelimited(record);
}

/**
 * Write a record in CVF layout. Nothing is written when the record is
 * rejected.
 */
export function compress(record: ReplayRecord, writer: ByteWriter): void {
  assertCompressible(record);
  const profile = profileOf(record.version);

  // Build into a scratch writer so a failure leaves `writer` untouched
  const out = new ByteWriter(2048);

  writeHeader(out, record);
  out.writeBytes(encodeMineBitmap(record.mines, record.rows, record.cols));

  out.writeBytes(record.prestamp);
  out.writeByte(INFO_OPEN);
  out.writeBytes(record.tsInfo);
  out.writeByte(INFO_CLOSE);
  out.writeBytes(record.preevent);

  out.writeBytes(EVENT_BLOCK_MARKER);
  writeEventBlock(out, record.events);
  if (profile === "freesweeper") {
    out.writeBytes(encodeTimeCorrections(record.events));
  }

  out.writeBytes(record.presuffix);
  out.writeBytes(encodeCvfFooter(record.footer));

  writer.writeBytes(out.toBytes());
}

export function compressRecord(record: ReplayRecord): Uint8Array {
  const writer = new ByteWriter(2048);
  compress(record, writer);
  return writer.toBytes();
}
