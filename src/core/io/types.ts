import type { Result } from "../errors";

/**
 * Forward-only byte reader shared by the file and in-memory cursors.
 */
export interface ByteReader {
  /**
   * Reads bytes up to and including `delimiter`, or until `max` bytes have
   * been consumed, or until the input ends.
   */
  readUntil(delimiter: number, max?: number): Result<Uint8Array>;
  /** Reads up to `length` bytes; shorter only at the end of the input */
  readExact(length: number): Result<Uint8Array>;
}
