import type { ReplayRecord } from "../types";
import { ByteWriter } from "./byteStream";
import { INFO_CLOSE, INFO_OPEN, profileOf } from "./constants";
import { writeAvfEvents } from "./eventStream";
import { renderAvfFooter } from "./footer";
import { writeHeader } from "./header";

/**
 * Write a record back out in AVF layout. A record produced by parseAvf comes
 * out byte-identical to its input.
 */
export function writeAvf(record: ReplayRecord, writer: ByteWriter): void {
  const profile = profileOf(record.version);

  writeHeader(writer, record);

  for (const { row, col } of record.mines) {
    writer.writeByte(row);
    writer.writeByte(col);
  }

  writer.writeBytes(record.prestamp);
  writer.writeByte(INFO_OPEN);
  writer.writeBytes(record.tsInfo);
  writer.writeByte(INFO_CLOSE);
  writer.writeBytes(record.preevent);

  writeAvfEvents(record.events, writer, profile);

  writer.writeBytes(record.presuffix);
  writer.writeBytes(
    renderAvfFooter(record.footer, { profile, events: record.events, tsInfo: record.tsInfo })
  );
}

export function writeAvfBytes(record: ReplayRecord): Uint8Array {
  const writer = new ByteWriter(4096);
  writeAvf(record, writer);
  return writer.toBytes();
}
