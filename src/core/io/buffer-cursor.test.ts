import { describe, it, expect } from "vitest";
import { unwrap } from "../errors";
import { BufferCursor } from "./buffer-cursor";

describe("BufferCursor", () => {
  const bytes = Uint8Array.from([0x61, 0x62, 0x00, 0x63, 0x0a, 1, 2, 3, 4, 5]);

  it("should read up to and including a delimiter and track the offset", () => {
    const cursor = new BufferCursor(bytes);

    expect([...unwrap(cursor.readUntil(0x00))]).toEqual([0x61, 0x62, 0x00]);
    expect(cursor.offset).toBe(3);
    expect([...unwrap(cursor.readUntil(0x0a))]).toEqual([0x63, 0x0a]);
    expect(cursor.offset).toBe(5);
  });

  it("should stop a delimited read at the byte limit", () => {
    const cursor = new BufferCursor(bytes);

    expect([...unwrap(cursor.readUntil(0x0a, 2))]).toEqual([0x61, 0x62]);
    expect(cursor.offset).toBe(2);
  });

  it("should return short reads at the end and then nothing", () => {
    const cursor = new BufferCursor(bytes);
    unwrap(cursor.readExact(8));

    expect(cursor.atEnd()).toBe(false);
    expect([...unwrap(cursor.readExact(4))]).toEqual([4, 5]);
    expect(cursor.atEnd()).toBe(true);
    expect(unwrap(cursor.readUntil(0x0a)).length).toBe(0);
  });
});
