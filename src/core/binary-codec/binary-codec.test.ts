import { describe, it, expect } from "vitest";
import { BinaryCodec, BinaryPrimitives, getSchemaSize, type Schema, viewOf } from "./index";

interface Sample {
  id: number;
  port: number;
  addr: Uint8Array;
  label: string;
  total: bigint;
}

const RecordSchema: Schema<Sample> = {
  id: BinaryPrimitives.u32_le,
  port: BinaryPrimitives.padded(BinaryPrimitives.u16_le, 4),
  addr: BinaryPrimitives.bytes(4),
  label: BinaryPrimitives.cstring(8),
  total: BinaryPrimitives.u64_le,
};

function empty(): Sample {
  return { id: 0, port: 0, addr: new Uint8Array(4), label: "", total: 0n };
}

describe("BinaryCodec", () => {
  describe("getSchemaSize", () => {
    it("should sum the field sizes", () => {
      expect(getSchemaSize(RecordSchema)).toBe(4 + 4 + 4 + 8 + 8);
    });

    it("should return the same size on repeated calls", () => {
      expect(getSchemaSize(RecordSchema)).toBe(getSchemaSize(RecordSchema));
    });
  });

  describe("encode", () => {
    it("should write fields in schema order, little-endian", () => {
      const buf = BinaryCodec.encode(RecordSchema, {
        id: 0x01020304,
        port: 443,
        addr: new Uint8Array([192, 0, 2, 1]),
        label: "tcp",
        total: 1n,
      });

      expect([...buf]).toEqual([
        0x04, 0x03, 0x02, 0x01,
        0xbb, 0x01, 0x00, 0x00,
        192, 0, 2, 1,
        0x74, 0x63, 0x70, 0, 0, 0, 0, 0,
        1, 0, 0, 0, 0, 0, 0, 0,
      ]);
    });

    it("should zero-fill short byte runs and truncate long ones", () => {
      const short = BinaryCodec.encode({ addr: BinaryPrimitives.bytes(4) }, { addr: new Uint8Array([9]) });
      const long = BinaryCodec.encode({ addr: BinaryPrimitives.bytes(2) }, { addr: new Uint8Array([1, 2, 3]) });

      expect([...short]).toEqual([9, 0, 0, 0]);
      expect([...long]).toEqual([1, 2]);
    });

    it("should throw when a string does not fit its slot", () => {
      expect(() => BinaryCodec.encode({ s: BinaryPrimitives.cstring(2) }, { s: "abc" })).toThrow(RangeError);
    });
  });

  describe("decode", () => {
    it("should read back what encode wrote", () => {
      const input: Sample = {
        id: 7,
        port: 8080,
        addr: new Uint8Array([10, 0, 0, 1]),
        label: "readonly",
        total: 2n ** 40n,
      };

      expect(BinaryCodec.decode(RecordSchema, BinaryCodec.encode(RecordSchema, input), empty())).toEqual(input);
    });

    it("should stop strings at the first NUL", () => {
      const out = BinaryCodec.decode(
        { s: BinaryPrimitives.cstring(4) },
        new Uint8Array([0x61, 0, 0x62, 0]),
        { s: "" }
      );

      expect(out.s).toBe("a");
    });

    it("should reject a buffer smaller than the schema", () => {
      expect(() => BinaryCodec.decode(RecordSchema, new Uint8Array(10), empty())).toThrow(
        "Buffer too small: expected 28 bytes, got 10"
      );
    });
  });

  describe("primitives", () => {
    it("should read signed values", () => {
      const view = viewOf(new Uint8Array([0xff, 0xff, 0xff, 0xff]));

      expect(BinaryPrimitives.i32_le.read(view, 0)).toBe(-1);
      expect(BinaryPrimitives.u32_le.read(view, 0)).toBe(4294967295);
    });

    it("should view only the bytes of a subarray", () => {
      const whole = new Uint8Array([1, 2, 3, 4, 5, 6]);
      const view = viewOf(whole.subarray(2, 4));

      expect(view.byteLength).toBe(2);
      expect(BinaryPrimitives.u16_le.read(view, 0)).toBe(0x0403);
    });

    it("should reject padding narrower than the field", () => {
      expect(() => BinaryPrimitives.padded(BinaryPrimitives.u32_le, 2)).toThrow(RangeError);
    });
  });
});
