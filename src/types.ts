// src/types.ts

/** Raw mouse action codes as they appear in AVF event records. */
export type MouseEventCode = 1 | 3 | 5 | 9 | 17 | 33 | 65 | 145 | 193 | 11 | 21;

export type MouseEventName =
  | "move"
  | "lmb_down"
  | "lmb_up"
  | "rmb_down"
  | "rmb_up"
  | "mmb_down"
  | "mmb_up"
  | "shift_lmb_down";

/** 3 = beginner, 4 = intermediate, 5 = expert, 6 = custom */
export type LevelCode = 3 | 4 | 5 | 6;

/** AVF is the regular profile; version byte 0 selects the FreeSweeper layout. */
export type ReplayProfile = "avf" | "freesweeper";

export interface Mine {
  /** 1-indexed */
  row: number;
  /** 1-indexed */
  col: number;
}

export interface ReplayEvent {
  kind: MouseEventCode;

  /** Milliseconds since the first click. */
  gametime: number;

  xpos: number;
  ypos: number;
}

/**
 * Structured footer. The RealTime field is not stored: it is derived from the
 * last event and the info block when the AVF text is rebuilt.
 */
export interface ReplayFooter {
  skin: string;
  playerId: string;
  arbiterVersion: string;
}

export interface ReplayRecord {
  version: number;

  // Opaque, kept verbatim
  prefix: Uint8Array;

  level: LevelCode;
  cols: number;
  rows: number;
  mineCount: number;

  mines: Mine[];

  // Bytes before the bracketed info block
  prestamp: Uint8Array;

  // Content of the [...] block, pipe delimited
  tsInfo: Uint8Array;

  // Bytes between the info block and the first event
  preevent: Uint8Array;

  events: ReplayEvent[];

  // Sentinel record, checksum region and the fixed tail before the footer
  presuffix: Uint8Array;

  footer: ReplayFooter;
}
