import type { Result } from "../core/errors";

/**
 * Supplies the raw schema text of a live instrumentation source.
 */
export interface SchemaSource {
  /** Reads the whole schema document */
  readSchema(): Result<Uint8Array>;
}

/**
 * Supplies raw group bytes for a live connection.
 */
export interface RawByteSource {
  /**
   * Reads exactly `size` bytes of a group.
   * Fails with `NoConnection` when the data is unavailable or short.
   */
  readGroup(cid: number, groupName: string, size: number): Result<Uint8Array>;

  /**
   * Reads `length` bytes of a group starting at `offset`.
   * Fails with `NoConnection` when the group is unavailable, `File` when short.
   */
  readRange(cid: number, groupName: string, offset: number, length: number): Result<Uint8Array>;
}

/**
 * Enumerates the connection ids currently exposed by the source.
 */
export interface ConnectionDirectory {
  listConnectionIds(): Result<number[]>;
}

/**
 * Everything a live catalogue needs from its source.
 */
export type LiveSource = SchemaSource & RawByteSource & ConnectionDirectory;
