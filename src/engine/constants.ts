import type { LevelCode, MouseEventCode, MouseEventName, ReplayProfile } from "../types";

export const MOUSE_EVENT_NAMES: Readonly<Record<MouseEventCode, MouseEventName>> = {
  1: "move",
  3: "lmb_down",
  5: "lmb_up",
  9: "rmb_down",
  17: "rmb_up",
  33: "mmb_down",
  65: "mmb_up",
  145: "rmb_up",
  193: "mmb_up",
  11: "shift_lmb_down",
  21: "lmb_up",
};

export function isMouseEventCode(n: number): n is MouseEventCode {
  return Object.prototype.hasOwnProperty.call(MOUSE_EVENT_NAMES, n);
}

export type BoardDimensions = {
  cols: number;
  rows: number;
  mineCount: number;
};

// Indexed by level - 3
export const STANDARD_LEVELS: readonly BoardDimensions[] = [
  { cols: 8, rows: 8, mineCount: 10 },
  { cols: 16, rows: 16, mineCount: 40 },
  { cols: 30, rows: 16, mineCount: 99 },
];

export const CUSTOM_LEVEL = 6 as const;

export function isLevelCode(n: number): n is LevelCode {
  return n === 3 || n === 4 || n === 5 || n === 6;
}

export const FREESWEEPER_VERSION = 0;

export function profileOf(version: number): ReplayProfile {
  return version === FREESWEEPER_VERSION ? "freesweeper" : "avf";
}

/** FreeSweeper appends a millisecond correction byte to every record. */
export function eventRecordSize(profile: ReplayProfile): number {
  return profile === "freesweeper" ? 9 : 8;
}

export const INFO_OPEN = 0x5b; // [
export const INFO_CLOSE = 0x5d; // ]
export const INFO_FIELD_SEPARATOR = 0x7c; // |
export const FOOTER_FIELD_SEPARATOR = 0x0d; // \r

// "cs=" closes the checksum label; a fixed run of bytes follows it
export const CHECKSUM_LABEL: readonly number[] = [0x63, 0x73, 0x3d];
export const CHECKSUM_TAIL_LENGTH = 17;

/** Written in CVF where the event records start in AVF. */
export const EVENT_BLOCK_MARKER: readonly number[] = [0x00, 0x01];

/** Ends the opcode run inside an event block. */
export const OPCODE_END = 0xff;
