import { ErrorKind, fail, ok, type Result } from "../core/errors";
import type { LiveSource } from "./types";

/**
 * In-process live source holding the schema and per-connection group bytes
 * in memory. Useful for tests and for feeding captured data back through
 * the live code paths.
 */
export class MemorySource implements LiveSource {
  private schema: Uint8Array;
  private readonly data = new Map<number, Map<string, Uint8Array>>();

  constructor(schema: string | Uint8Array) {
    this.schema = typeof schema === "string" ? new TextEncoder().encode(schema) : schema;
  }

  /**
   * Replaces the schema document.
   */
  setSchema(schema: string | Uint8Array): void {
    this.schema = typeof schema === "string" ? new TextEncoder().encode(schema) : schema;
  }

  /**
   * Stores the bytes of one group for a connection, registering the connection.
   */
  setGroup(cid: number, groupName: string, bytes: Uint8Array): void {
    let groups = this.data.get(cid);
    if (!groups) {
      groups = new Map();
      this.data.set(cid, groups);
    }
    groups.set(groupName, Uint8Array.from(bytes));
  }

  /**
   * Forgets a connection and all of its groups.
   */
  removeConnection(cid: number): void {
    this.data.delete(cid);
  }

  readSchema(): Result<Uint8Array> {
    return ok(Uint8Array.from(this.schema));
  }

  readGroup(cid: number, groupName: string, size: number): Result<Uint8Array> {
    const bytes = this.data.get(cid)?.get(groupName);
    if (!bytes || bytes.length < size) {
      return fail(ErrorKind.NoConnection, `no ${groupName} data for connection ${cid}`, { cid, group: groupName });
    }
    return ok(bytes.slice(0, size));
  }

  readRange(cid: number, groupName: string, offset: number, length: number): Result<Uint8Array> {
    const bytes = this.data.get(cid)?.get(groupName);
    if (!bytes) {
      return fail(ErrorKind.NoConnection, `no ${groupName} data for connection ${cid}`, { cid, group: groupName });
    }
    if (offset + length > bytes.length) {
      return fail(ErrorKind.File, `short read of ${groupName}@${offset} for connection ${cid}`, { cid, group: groupName, offset });
    }
    return ok(bytes.slice(offset, offset + length));
  }

  listConnectionIds(): Result<number[]> {
    return ok([...this.data.keys()]);
  }
}
