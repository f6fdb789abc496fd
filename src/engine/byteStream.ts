/**
 * Called when a read runs past the end of the input. Lets each format decide
 * which error a short file turns into.
 */
export type TruncationHandler = (needed: number, position: number) => Error;

export class ByteReader {
  private pos = 0;

  constructor(
    private readonly bytes: Uint8Array,
    private readonly onTruncated: TruncationHandler
  ) {}

  get position(): number {
    return this.pos;
  }

  get remaining(): number {
    return this.bytes.length - this.pos;
  }

  private require(n: number): void {
    if (this.pos + n > this.bytes.length) {
      throw this.onTruncated(n, this.pos);
    }
  }

  readByte(): number {
    this.require(1);
    const b = this.bytes[this.pos];
    this.pos += 1;
    return b;
  }

  /** Returns a view into the input, not a copy. */
  readBytes(n: number): Uint8Array {
    this.require(n);
    const out = this.bytes.subarray(this.pos, this.pos + n);
    this.pos += n;
    return out;
  }

  readU16BE(): number {
    const hi = this.readByte();
    return (hi << 8) | this.readByte();
  }

  readU24BE(): number {
    const hi = this.readU16BE();
    return (hi << 8) | this.readByte();
  }

  readRest(): Uint8Array {
    return this.readBytes(this.remaining);
  }

  seekBack(n: number): void {
    if (n < 0 || n > this.pos) {
      throw new RangeError(`Cannot seek back ${n} bytes from position ${this.pos}`);
    }
    this.pos -= n;
  }

  /** Bytes already read between two positions. */
  span(start: number, end: number): Uint8Array {
    if (start < 0 || end > this.pos || start > end) {
      throw new RangeError(`Invalid span ${start}..${end} at position ${this.pos}`);
    }
    return this.bytes.subarray(start, end);
  }
}

export class ByteWriter {
  private buf: Uint8Array;
  private len = 0;

  constructor(initialCapacity = 1024) {
    this.buf = new Uint8Array(Math.max(16, initialCapacity));
  }

  get length(): number {
    return this.len;
  }

  private ensure(extra: number): void {
    const needed = this.len + extra;
    if (needed <= this.buf.length) return;
    let cap = this.buf.length * 2;
    while (cap < needed) cap *= 2;
    const next = new Uint8Array(cap);
    next.set(this.buf.subarray(0, this.len));
    this.buf = next;
  }

  writeByte(b: number): void {
    if (!Number.isInteger(b) || b < 0 || b > 0xff) {
      throw new RangeError(`Not a byte: ${b}`);
    }
    this.ensure(1);
    this.buf[this.len] = b;
    this.len += 1;
  }

  writeBytes(bytes: Uint8Array | readonly number[]): void {
    this.ensure(bytes.length);
    for (let i = 0; i < bytes.length; i++) {
      const b = bytes[i];
      if (!Number.isInteger(b) || b < 0 || b > 0xff) {
        throw new RangeError(`Not a byte: ${b}`);
      }
      this.buf[this.len + i] = b;
    }
    this.len += bytes.length;
  }

  writeU16BE(n: number): void {
    if (!Number.isInteger(n) || n < 0 || n > 0xffff) {
      throw new RangeError(`Not a u16: ${n}`);
    }
    this.writeByte(n >> 8);
    this.writeByte(n & 0xff);
  }

  writeU24BE(n: number): void {
    if (!Number.isInteger(n) || n < 0 || n > 0xffffff) {
      throw new RangeError(`Not a u24: ${n}`);
    }
    this.writeByte(n >> 16);
    this.writeByte((n >> 8) & 0xff);
    this.writeByte(n & 0xff);
  }

  toBytes(): Uint8Array {
    return this.buf.slice(0, this.len);
  }
}

export function decodeLatin1(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("latin1");
}

export function encodeLatin1(text: string): Uint8Array {
  return new Uint8Array(Buffer.from(text, "latin1"));
}

export function joinBytes(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((n, p) => n + p.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const p of parts) {
    out.set(p, offset);
    offset += p.length;
  }
  return out;
}
