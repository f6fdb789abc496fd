import type { LevelCode, ReplayRecord } from "../types";
import type { ByteReader, ByteWriter } from "./byteStream";
import { CUSTOM_LEVEL, isLevelCode, STANDARD_LEVELS } from "./constants";

export type ReplayHeader = Pick<ReplayRecord, "version" | "prefix" | "level" | "cols" | "rows" | "mineCount">;

/**
 * Version, opaque prefix, level and, for custom boards, the explicit
 * dimensions. Shared by AVF and CVF.
 */
export function readHeader(reader: ByteReader, invalidLevel: (level: number) => Error): ReplayHeader {
  const version = reader.readByte();
  const prefix = reader.readBytes(4);
  const level = reader.readByte();

  if (!isLevelCode(level)) {
    throw invalidLevel(level);
  }

  if (level === CUSTOM_LEVEL) {
    const cols = reader.readByte() + 1;
    const rows = reader.readByte() + 1;
    const mineCount = reader.readU16BE();
    return { version, prefix, level, cols, rows, mineCount };
  }

  return { version, prefix, level, ...STANDARD_LEVELS[level - 3] };
}

export function writeHeader(writer: ByteWriter, header: ReplayHeader): void {
  if (header.prefix.length !== 4) {
    throw new RangeError(`Header prefix must be 4 bytes, got ${header.prefix.length}`);
  }
  writer.writeByte(header.version);
  writer.writeBytes(header.prefix);
  writer.writeByte(header.level);
  if (header.level === CUSTOM_LEVEL) {
    writer.writeByte(header.cols - 1);
    writer.writeByte(header.rows - 1);
    writer.writeU16BE(header.mineCount);
  }
}

export function levelName(level: LevelCode): string {
  switch (level) {
    case 3:
      return "beginner";
    case 4:
      return "intermediate";
    case 5:
      return "expert";
    case 6:
      return "custom";
  }
}
