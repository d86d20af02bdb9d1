import { closeSync, openSync, readSync } from "node:fs";
import { ErrorKind, fail, ok, type Result } from "../errors";
import type { ByteReader } from "./types";

/**
 * Buffered, synchronous, forward-only reader over an open file.
 *
 * Reads are served from an internal chunk that is refilled from the file
 * descriptor on demand. Every read either returns the bytes that were
 * available or stops short at end of file; I/O faults surface as
 * {@link ErrorKind.File}.
 */
export class FileCursor implements ByteReader {
  private readonly chunk: Uint8Array;
  private pos = 0;
  private len = 0;
  private ended = false;
  private fd: number | null;

  private constructor(fd: number, chunkSize: number) {
    this.fd = fd;
    this.chunk = new Uint8Array(chunkSize);
  }

  /**
   * Opens a file for reading.
   * @param path File to open
   * @param chunkSize Refill size in bytes (default: 64KB)
   */
  static open(path: string, chunkSize = 65536): Result<FileCursor> {
    try {
      return ok(new FileCursor(openSync(path, "r"), chunkSize));
    } catch (error) {
      return fail(ErrorKind.File, `cannot open ${path}`, { path }, error);
    }
  }

  /**
   * Whether the file has been closed.
   */
  get closed(): boolean {
    return this.fd === null;
  }

  /**
   * Reads one byte; `-1` at end of file.
   */
  readByte(): Result<number> {
    if (this.pos >= this.len) {
      const filled = this.fill();
      if (!filled.ok) return filled;
      if (this.pos >= this.len) return ok(-1);
    }
    return ok(this.chunk[this.pos++]);
  }

  /**
   * Reads bytes up to and including `delimiter`, or until `max` bytes have
   * been consumed, or until end of file, whichever comes first.
   * The delimiter, when found, is the last byte of the returned array.
   */
  readUntil(delimiter: number, max = Number.POSITIVE_INFINITY): Result<Uint8Array> {
    const out: number[] = [];
    while (out.length < max) {
      const next = this.readByte();
      if (!next.ok) return next;
      if (next.value < 0) break;
      out.push(next.value);
      if (next.value === delimiter) break;
    }
    return ok(Uint8Array.from(out));
  }

  /**
   * Reads up to `length` bytes. The result is shorter than `length` only when
   * the file ended first.
   */
  readExact(length: number): Result<Uint8Array> {
    const out = new Uint8Array(length);
    let filled = 0;
    while (filled < length) {
      if (this.pos >= this.len) {
        const refill = this.fill();
        if (!refill.ok) return refill;
        if (this.pos >= this.len) break;
      }
      const n = Math.min(length - filled, this.len - this.pos);
      out.set(this.chunk.subarray(this.pos, this.pos + n), filled);
      this.pos += n;
      filled += n;
    }
    return ok(filled === length ? out : out.slice(0, filled));
  }

  /**
   * Whether a read has hit end of file and no buffered bytes remain.
   */
  atEnd(): boolean {
    return this.ended && this.pos >= this.len;
  }

  /**
   * Closes the underlying descriptor. Closing twice is a no-op.
   */
  close(): Result<void> {
    if (this.fd === null) return ok(undefined);
    const fd = this.fd;
    this.fd = null;
    try {
      closeSync(fd);
      return ok(undefined);
    } catch (error) {
      return fail(ErrorKind.File, "close failed", undefined, error);
    }
  }

  private fill(): Result<void> {
    if (this.ended) return ok(undefined);
    if (this.fd === null) return fail(ErrorKind.File, "read after close");
    try {
      const n = readSync(this.fd, this.chunk, 0, this.chunk.length, null);
      this.pos = 0;
      this.len = n;
      if (n === 0) this.ended = true;
      return ok(undefined);
    } catch (error) {
      return fail(ErrorKind.File, "read failed", undefined, error);
    }
  }
}
