import type { Mine } from "../types";
import { CompressionError } from "./errors";

export function mineBitmapSize(rows: number, cols: number): number {
  return Math.ceil((rows * cols) / 8);
}

/**
 * Pack mines into a row-major bitmap, most significant bit first.
 */
export function encodeMineBitmap(mines: readonly Mine[], rows: number, cols: number): Uint8Array {
  const out = new Uint8Array(mineBitmapSize(rows, cols));
  for (const { row, col } of mines) {
    if (row < 1 || row > rows || col < 1 || col > cols) {
      throw new CompressionError(
        "MINE_OUT_OF_RANGE",
        `Mine (${row}, ${col}) lies outside a ${rows}x${cols} board`
      );
    }
    const idx = (row - 1) * cols + (col - 1);
    out[idx >> 3] |= 1 << (7 - (idx & 7));
  }
  return out;
}

/**
 * Unpack a bitmap. Mines come out column by column, top to bottom within a
 * column, whatever order they were packed in.
 */
export function decodeMineBitmap(bitmap: Uint8Array, rows: number, cols: number): Mine[] {
  const mines: Mine[] = [];
  for (let col = 0; col < cols; col++) {
    for (let row = 0; row < rows; row++) {
      const idx = row * cols + col;
      if ((bitmap[idx >> 3] >> (7 - (idx & 7))) & 1) {
        mines.push({ row: row + 1, col: col + 1 });
      }
    }
  }
  return mines;
}

/**
 * A bitmap only restores the mine list byte-for-byte when the list is already
 * in decode order with no repeats.
 */
export function assertMinesInBitmapOrder(mines: readonly Mine[], rows: number, cols: number): void {
  let previous = -1;
  for (const { row, col } of mines) {
    if (!Number.isInteger(row) || !Number.isInteger(col) || row < 1 || row > rows || col < 1 || col > cols) {
      throw new CompressionError(
        "MINE_OUT_OF_RANGE",
        `Mine (${row}, ${col}) lies outside a ${rows}x${cols} board`
      );
    }
    const order = (col - 1) * rows + (row - 1);
    if (order <= previous) {
      throw new CompressionError(
        "MINE_ORDER",
        `Mine (${row}, ${col}) is repeated or out of column-major order`
      );
    }
    previous = order;
  }
}
