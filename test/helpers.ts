import type { Mine, MouseEventCode, ReplayEvent } from "../src/types";
import { ReplayCodecError } from "../src/engine/errors";

export const bytes = (...xs: number[]) => Uint8Array.from(xs);
export const latin1 = (s: string) => new Uint8Array(Buffer.from(s, "latin1"));

export const BANNER_TAIL = ". Copyright © 2005-2006 Dmitriy I. Sukhomlynov";

export function ev(kind: MouseEventCode, gametime: number, xpos: number, ypos: number): ReplayEvent {
  return { kind, gametime, xpos, ypos };
}

// Five events: the first three are the textbook move/move/press, the fourth
// hits the compound table with a larger time step, the last misses it with
// deltas that need 2-byte varints.
export const SAMPLE_EVENTS: readonly ReplayEvent[] = [
  ev(1, 0, 10, 10),
  ev(1, 10, 11, 10),
  ev(3, 20, 11, 10),
  ev(5, 120, 11, 10),
  ev(1, 2340, 300, 45),
];

// Column-major order, as the mine bitmap decodes them
export const SAMPLE_MINES: readonly Mine[] = [
  { row: 1, col: 1 },
  { row: 2, col: 1 },
  { row: 8, col: 1 },
  { row: 3, col: 2 },
  { row: 5, col: 4 },
  { row: 1, col: 5 },
  { row: 4, col: 5 },
  { row: 7, col: 6 },
  { row: 2, col: 8 },
  { row: 8, col: 8 },
];

export interface AvfFixture {
  version?: number;
  prefix?: number[];
  level?: number;
  custom?: { cols: number; rows: number; mineCount: number };
  mines?: readonly Mine[];
  prestamp?: number[];
  tsInfo?: string;
  preevent?: number[];
  events?: readonly ReplayEvent[];
  sentinel?: number[];
  checksumLead?: number[];
  checksumTail?: string;
  realTime?: string | null;
  skin?: string;
  playerId?: string;
  arbiterVersion?: string;
  footer?: string;
}

export const SAMPLE_TS_INFO = "12|7|B12T3.45";
export const SAMPLE_PREEVENT = [0x30, 0x31, 0x0a, 0x02, 0x09];
export const SAMPLE_CHECKSUM_LEAD = [0x0d, 0x0a, 0x54, 0x63, 0x73, 0x3d]; // \r \n T c s =
export const SAMPLE_CHECKSUM_TAIL = "0123456789abcdefg";

/**
 * Lay out an AVF file by hand. FreeSweeper (version 0) records get a
 * millisecond byte, and its RealTime line sits before the footer proper.
 */
export function buildAvf(f: AvfFixture = {}): Uint8Array {
  const version = f.version ?? 1;
  const freesweeper = version === 0;
  const events = f.events ?? SAMPLE_EVENTS;
  const out: number[] = [];

  out.push(version, ...(f.prefix ?? [0x11, 0x22, 0x33, 0x44]), f.level ?? 3);
  if (f.custom) {
    out.push(f.custom.cols - 1, f.custom.rows - 1, f.custom.mineCount >> 8, f.custom.mineCount & 0xff);
  }
  for (const m of f.mines ?? SAMPLE_MINES) out.push(m.row, m.col);

  out.push(...(f.prestamp ?? [0x41, 0x42, 0x43, 0x05]), 0x5b);
  const tsInfo = f.tsInfo ?? SAMPLE_TS_INFO;
  out.push(...latin1(tsInfo), 0x5d);
  out.push(...(f.preevent ?? SAMPLE_PREEVENT));

  for (const e of events) {
    const sec = Math.floor(e.gametime / 1000) + 1;
    const hun = Math.floor((e.gametime % 1000) / 10);
    out.push(e.kind, e.xpos >> 8, sec & 0xff, e.xpos & 0xff, hun, e.ypos >> 8, sec >> 8, e.ypos & 0xff);
    if (freesweeper) out.push(e.gametime % 10);
  }
  out.push(...(f.sentinel ?? new Array<number>(freesweeper ? 9 : 8).fill(0)));

  out.push(...(f.checksumLead ?? SAMPLE_CHECKSUM_LEAD));
  out.push(...latin1(f.checksumTail ?? SAMPLE_CHECKSUM_TAIL));

  const last = events[events.length - 1];
  const realTime =
    f.realTime !== undefined
      ? f.realTime
      : last
        ? `${Math.floor(last.gametime / 1000)}${tsInfo.split("|").slice(-1)[0].slice(-3)}`
        : null;

  const fields = [
    `Skin: ${f.skin ?? "Classic"}`,
    f.playerId ?? "test-player",
    `Minesweeper Arbiter ${f.arbiterVersion ?? "0.52.3"}${BANNER_TAIL}`,
  ];
  if (realTime !== null) {
    const line = `RealTime: ${realTime}`;
    if (freesweeper) out.push(...latin1(`${line}\r`));
    else fields.unshift(line);
  }
  out.push(...latin1(f.footer ?? fields.join("\r")));

  return Uint8Array.from(out);
}

/** Every `step`-th cell of a rows x cols board in column-major order. */
export function spacedMines(rows: number, cols: number, count: number, step: number): Mine[] {
  const mines: Mine[] = [];
  for (let i = 0; mines.length < count && i < rows * cols; i += step) {
    mines.push({ row: (i % rows) + 1, col: Math.floor(i / rows) + 1 });
  }
  return mines;
}

/** Run `fn` and return the code of the codec error it throws. */
export function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof ReplayCodecError) return err.code;
    throw err;
  }
  return undefined;
}
