import { describe, it, expect } from "vitest";
import { AddressType, decodeValue, FieldType, renderIPv6, renderValue, typeWidth } from "./index";

function ipv6(...groups: number[]): Uint8Array {
  const out = new Uint8Array(16);
  const view = new DataView(out.buffer);
  groups.forEach((g, i) => view.setUint16(i * 2, g, false));
  return out;
}

function inetAddress(address: number[], type: AddressType): Uint8Array {
  const out = new Uint8Array(17);
  out.set(address);
  out[16] = type;
  return out;
}

describe("typeWidth", () => {
  it("should size every known type", () => {
    expect(typeWidth(FieldType.Integer)).toBe(4);
    expect(typeWidth(FieldType.TimeTicks)).toBe(4);
    expect(typeWidth(FieldType.Counter64)).toBe(8);
    expect(typeWidth(FieldType.InetPortNumber)).toBe(2);
    expect(typeWidth(FieldType.InetAddress)).toBe(17);
    expect(typeWidth(FieldType.InetAddressIPv6)).toBe(17);
    expect(typeWidth(FieldType.Str32)).toBe(32);
    expect(typeWidth(FieldType.Octet)).toBe(1);
  });

  it("should size unknown types as zero", () => {
    expect(typeWidth(13)).toBe(0);
    expect(typeWidth(-1)).toBe(0);
  });
});

describe("decodeValue", () => {
  it("should decode signed and unsigned 32-bit integers", () => {
    const bytes = new Uint8Array([0xfe, 0xff, 0xff, 0xff]);

    expect(decodeValue(FieldType.Integer32, bytes)).toBe(-2);
    expect(decodeValue(FieldType.Counter32, bytes)).toBe(4294967294);
    expect(decodeValue(FieldType.Gauge32, new Uint8Array([5, 0, 0, 0]))).toBe(5);
  });

  it("should decode 64-bit counters as bigints", () => {
    expect(decodeValue(FieldType.Counter64, new Uint8Array([0, 0, 0, 0, 1, 0, 0, 0]))).toBe(2n ** 32n);
  });

  it("should decode ports", () => {
    expect(decodeValue(FieldType.InetPortNumber, new Uint8Array([0x50, 0x00]))).toBe(80);
  });

  it("should dispatch generic addresses on their family byte", () => {
    expect(decodeValue(FieldType.InetAddress, inetAddress([192, 0, 2, 7], AddressType.IPv4))).toBe("192.0.2.7");
    expect(decodeValue(FieldType.InetAddress, inetAddress([0xfe, 0x80, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 1], AddressType.IPv6))).toBe(
      "fe80::1"
    );
  });

  it("should stop strings at the first NUL", () => {
    const bytes = new Uint8Array(32);
    bytes.set(new TextEncoder().encode("Established"));

    expect(decodeValue(FieldType.Str32, bytes)).toBe("Established");
  });

  it("should flag unknown types", () => {
    expect(decodeValue(99, new Uint8Array(4))).toBe("unknown type");
  });
});

describe("renderValue", () => {
  it("should render octets as unpadded lowercase hex", () => {
    expect(renderValue(FieldType.Octet, new Uint8Array([0x0a]))).toBe("0xa");
    expect(renderValue(FieldType.Octet, new Uint8Array([0xff]))).toBe("0xff");
  });

  it("should render numbers and addresses as text", () => {
    expect(renderValue(FieldType.Integer, new Uint8Array([0xff, 0xff, 0xff, 0xff]))).toBe("-1");
    expect(renderValue(FieldType.Counter64, new Uint8Array([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff]))).toBe(
      "18446744073709551615"
    );
    expect(renderValue(FieldType.InetAddressIPv4, new Uint8Array([127, 0, 0, 1]))).toBe("127.0.0.1");
  });
});

describe("renderIPv6", () => {
  it("should compress the all-zero address", () => {
    expect(renderIPv6(new Uint8Array(16))).toBe("::");
  });

  it("should not compress a lone zero group", () => {
    expect(renderIPv6(ipv6(0x2001, 0xdb8, 0, 1, 1, 1, 1, 1))).toBe("2001:db8:0:1:1:1:1:1");
  });

  it("should print every group when none is zero", () => {
    expect(renderIPv6(ipv6(1, 2, 3, 4, 5, 6, 7, 0xabcd))).toBe("1:2:3:4:5:6:7:abcd");
  });

  it("should compress the longest run", () => {
    expect(renderIPv6(ipv6(0x2001, 0, 0, 1, 0, 0, 0, 1))).toBe("2001:0:0:1::1");
  });

  it("should prefer the leftmost of equal runs", () => {
    expect(renderIPv6(ipv6(0x2001, 0xdb8, 0, 0, 1, 0, 0, 1))).toBe("2001:db8::1:0:0:1");
  });

  it("should compress leading and trailing runs", () => {
    expect(renderIPv6(ipv6(0, 0, 0, 0, 0, 0, 0, 1))).toBe("::1");
    expect(renderIPv6(ipv6(0xfe80, 0, 0, 0, 0, 0, 0, 0))).toBe("fe80::");
  });
});
