// src/tmx/binary.ts

/** Sequential source of little-endian 32-bit cell words. */
export interface WordReader {
  readU32LE(): number;
  /** Throws when unread data is left after the last expected word. */
  assertExhausted(): void;
}

export class BinaryReader implements WordReader {
  private offset = 0;

  public constructor(private readonly buf: Buffer) {}

  public remaining(): number {
    return this.buf.length - this.offset;
  }

  public readU32LE(): number {
    this.ensure(4);
    const v = this.buf.readUInt32LE(this.offset);
    this.offset += 4;
    return v;
  }

  public assertExhausted(): void {
    if (this.remaining() !== 0) {
      throw new Error(`Unexpected trailing data: ${this.remaining()} bytes`);
    }
  }

  private ensure(n: number): void {
    if (this.offset + n > this.buf.length) {
      throw new Error(`Unexpected EOF: need ${n} bytes, have ${this.remaining()}`);
    }
  }
}

export class BinaryWriter {
  private readonly chunks: Buffer[] = [];

  public writeU32LE(v: number): void {
    if (!Number.isInteger(v) || v < 0 || v > 0xffffffff) throw new Error(`U32 out of range: ${v}`);
    const b = Buffer.alloc(4);
    b.writeUInt32LE(v >>> 0, 0);
    this.chunks.push(b);
  }

  public toBuffer(): Buffer {
    return Buffer.concat(this.chunks);
  }
}
