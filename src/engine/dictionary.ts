import type { MouseEventCode } from "../types";
import { isMouseEventCode, OPCODE_END } from "./constants";
import tables from "./data/opcodeTables.json";

/**
 * One compound dictionary entry: an event whose opcode, time delta and
 * zigzagged x/y deltas all match is stored as a single byte.
 */
export type CompoundVector = {
  op: MouseEventCode;
  dt: number;
  dx: number;
  dy: number;
};

export type ResolvedOpcode =
  | { kind: "compound"; vector: CompoundVector }
  | { kind: "base"; op: MouseEventCode };

function asEventCode(n: number, where: string): MouseEventCode {
  if (!isMouseEventCode(n)) {
    throw new Error(`Opcode table ${where}: ${n} is not a mouse event code`);
  }
  return n;
}

function assertCode(code: number, where: string): void {
  if (!Number.isInteger(code) || code < 0 || code >= OPCODE_END) {
    throw new Error(`Opcode table ${where}: code ${code} is outside 0..${OPCODE_END - 1}`);
  }
}

function compoundKey(op: number, dt: number, dx: number, dy: number): string {
  return `${op},${dt},${dx},${dy}`;
}

const BASE_ENCODE = new Map<MouseEventCode, number>();
const BASE_DECODE = new Map<number, MouseEventCode>();
const COMPOUND_ENCODE = new Map<string, number>();
const COMPOUND_DECODE = new Map<number, CompoundVector>();

for (const entry of tables.base) {
  if (entry.length !== 2) throw new Error(`Opcode table base: bad entry ${JSON.stringify(entry)}`);
  const [raw, code] = entry;
  const op = asEventCode(raw, "base");
  assertCode(code, "base");
  if (BASE_ENCODE.has(op) || BASE_DECODE.has(code)) {
    throw new Error(`Opcode table base: duplicate entry for ${op} / ${code}`);
  }
  BASE_ENCODE.set(op, code);
  BASE_DECODE.set(code, op);
}

for (const entry of tables.compound) {
  if (entry.length !== 5) throw new Error(`Opcode table compound: bad entry ${JSON.stringify(entry)}`);
  const [raw, dt, dx, dy, code] = entry;
  const op = asEventCode(raw, "compound");
  assertCode(code, "compound");
  const key = compoundKey(op, dt, dx, dy);
  if (COMPOUND_ENCODE.has(key) || COMPOUND_DECODE.has(code)) {
    throw new Error(`Opcode table compound: duplicate entry for ${key} / ${code}`);
  }
  if (BASE_DECODE.has(code)) {
    throw new Error(`Opcode table compound: code ${code} is also a base opcode`);
  }
  COMPOUND_ENCODE.set(key, code);
  COMPOUND_DECODE.set(code, { op, dt, dx, dy });
}

for (const op of [1, 3, 5, 9, 17, 33, 65, 145, 193, 11, 21] as const) {
  if (!BASE_ENCODE.has(op)) throw new Error(`Opcode table base: no code for ${op}`);
}

export const BASE_TABLE_SIZE = BASE_ENCODE.size;
export const COMPOUND_TABLE_SIZE = COMPOUND_ENCODE.size;

export function lookupCompound(op: MouseEventCode, dt: number, dx: number, dy: number): number | undefined {
  return COMPOUND_ENCODE.get(compoundKey(op, dt, dx, dy));
}

export function baseOpcode(op: MouseEventCode): number {
  const code = BASE_ENCODE.get(op);
  if (code === undefined) {
    throw new Error(`No base opcode for mouse event ${op}`);
  }
  return code;
}

export function resolveOpcode(code: number): ResolvedOpcode | undefined {
  const vector = COMPOUND_DECODE.get(code);
  if (vector) return { kind: "compound", vector };
  const op = BASE_DECODE.get(code);
  if (op !== undefined) return { kind: "base", op };
  return undefined;
}

export function compoundEntries(): ReadonlyMap<number, CompoundVector> {
  return COMPOUND_DECODE;
}

export function baseEntries(): ReadonlyMap<MouseEventCode, number> {
  return BASE_ENCODE;
}
