import { ok, type Result } from "../errors";
import type { ByteReader } from "./types";

/**
 * Forward-only reader over bytes already in memory.
 */
export class BufferCursor implements ByteReader {
  private pos = 0;

  constructor(private readonly bytes: Uint8Array) {}

  /**
   * Number of bytes consumed so far.
   */
  get offset(): number {
    return this.pos;
  }

  readUntil(delimiter: number, max = Number.POSITIVE_INFINITY): Result<Uint8Array> {
    const start = this.pos;
    const limit = Math.min(this.bytes.length, start + max);
    while (this.pos < limit) {
      if (this.bytes[this.pos++] === delimiter) break;
    }
    return ok(this.bytes.subarray(start, this.pos));
  }

  readExact(length: number): Result<Uint8Array> {
    const start = this.pos;
    this.pos = Math.min(this.bytes.length, start + length);
    return ok(this.bytes.subarray(start, this.pos));
  }

  /**
   * Whether every byte has been consumed.
   */
  atEnd(): boolean {
    return this.pos >= this.bytes.length;
  }
}
