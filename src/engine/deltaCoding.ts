/** diff[0] = values[0], diff[i] = values[i] - values[i - 1] */
export function deltaEncode(values: readonly number[]): number[] {
  return values.map((v, i) => (i === 0 ? v : v - values[i - 1]));
}

/** Inverse of deltaEncode. */
export function prefixSum(deltas: readonly number[]): number[] {
  const out: number[] = [];
  let acc = 0;
  for (const d of deltas) {
    acc += d;
    out.push(acc);
  }
  return out;
}

// Signed 32-bit in, unsigned out: 0, -1, 1, -2, 2 ... -> 0, 1, 2, 3, 4 ...
export function zigzagEncode(n: number): number {
  return ((n << 1) ^ (n >> 31)) >>> 0;
}

export function zigzagDecode(n: number): number {
  return (n >>> 1) ^ -(n & 1);
}
