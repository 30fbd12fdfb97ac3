// src/tmx/inflate.ts
import { Inflate } from "pako";

import type { WordReader } from "./binary.js";

export type InflateContainer = "gzip" | "zlib";

// Compressed input is handed to the inflater in slices of this size so
// output is produced as cells are read, not all at once.
const INPUT_SLICE = 256;
const OUTPUT_CHUNK = 1024;

/**
 * Reads cell words from a gzip or zlib stream, inflating only as much
 * input as the next word needs.
 */
export class InflateReader implements WordReader {
  private readonly inflater: Inflate;
  private readonly pending: Uint8Array[] = [];
  private pendingOffset = 0;
  private available = 0;
  private inputOffset = 0;
  private ended = false;
  private endStatus = 0;

  public constructor(
    private readonly input: Uint8Array,
    container: InflateContainer,
  ) {
    // 15 accepts only a zlib header, 15 + 16 only a gzip header.
    const windowBits = container === "gzip" ? 31 : 15;
    this.inflater = new Inflate({ windowBits, chunkSize: OUTPUT_CHUNK });
    this.inflater.onData = (chunk) => {
      const bytes = chunk instanceof Uint8Array ? chunk : new Uint8Array(chunk);
      if (bytes.length === 0) return;
      this.pending.push(bytes);
      this.available += bytes.length;
    };
    this.inflater.onEnd = (status) => {
      this.ended = true;
      this.endStatus = status;
    };
  }

  public readU32LE(): number {
    while (this.available < 4 && this.pump()) {
      // keep feeding input until a full word is buffered
    }
    if (this.available < 4) {
      throw new Error(`Unexpected end of compressed data: need 4 bytes, have ${this.available}`);
    }

    let v = 0;
    for (let i = 0; i < 4; i++) v |= this.takeByte() << (8 * i);
    return v >>> 0;
  }

  public assertExhausted(): void {
    while (this.pump()) {
      // drain the rest of the stream
    }
    if (this.available > 0) {
      throw new Error(`Unexpected trailing data: ${this.available} decompressed bytes`);
    }
  }

  /** Push the next input slice. Returns false once nothing more can be produced. */
  private pump(): boolean {
    if (this.ended || this.inputOffset >= this.input.length) return false;

    const end = Math.min(this.input.length, this.inputOffset + INPUT_SLICE);
    const last = end === this.input.length;
    const ok = this.inflater.push(this.input.subarray(this.inputOffset, end), last);
    this.inputOffset = end;

    if (!ok || this.endStatus !== 0) {
      throw new Error(`Inflate failed (status ${this.endStatus})`);
    }
    return true;
  }

  private takeByte(): number {
    const head = this.pending[0]!;
    const b = head[this.pendingOffset]!;
    this.pendingOffset++;
    this.available--;
    if (this.pendingOffset === head.length) {
      this.pending.shift();
      this.pendingOffset = 0;
    }
    return b;
  }
}
