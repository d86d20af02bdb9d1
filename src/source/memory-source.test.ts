import { describe, it, expect } from "vitest";
import { attachLive } from "../catalogue";
import { ErrorKind, unwrap } from "../core/errors";
import { MemorySource } from "./memory-source";

describe("MemorySource", () => {
  it("should serve the current schema", () => {
    const source = new MemorySource("1.0\n/read\nPktsOut 0 3\n");
    source.setSchema("2.0\n/read\nPktsOut 0 3 4\nPktsIn 4 3 4\n");

    const catalogue = unwrap(attachLive({ source }));

    expect(catalogue.version).toBe("2.0");
    expect(unwrap(catalogue.findGroup("read")).size).toBe(8);
  });

  it("should keep its own copy of stored bytes", () => {
    const source = new MemorySource("1.0\n");
    const bytes = new Uint8Array([1, 2, 3, 4]);
    source.setGroup(5, "read", bytes);
    bytes[0] = 9;

    expect([...unwrap(source.readGroup(5, "read", 4))]).toEqual([1, 2, 3, 4]);
    expect([...unwrap(source.readGroup(5, "read", 2))]).toEqual([1, 2]);
    expect([...unwrap(source.readRange(5, "read", 1, 2))]).toEqual([2, 3]);
  });

  it("should list connections in the order they were added", () => {
    const source = new MemorySource("1.0\n");
    source.setGroup(9, "read", new Uint8Array(4));
    source.setGroup(3, "read", new Uint8Array(4));
    source.setGroup(9, "spec", new Uint8Array(4));

    expect(unwrap(source.listConnectionIds())).toEqual([9, 3]);
  });

  it("should report missing and short data", () => {
    const source = new MemorySource("1.0\n");
    source.setGroup(5, "read", new Uint8Array(4));

    const missing = source.readGroup(6, "read", 4);
    const short = source.readRange(5, "read", 2, 4);

    expect(missing.ok ? undefined : missing.error.kind).toBe(ErrorKind.NoConnection);
    expect(short.ok ? undefined : short.error.kind).toBe(ErrorKind.File);
  });
});
