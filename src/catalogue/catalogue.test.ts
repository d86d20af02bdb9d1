import { describe, it, expect, beforeEach } from "vitest";
import { ErrorKind, fail, type Result, unwrap } from "../core/errors";
import { MemorySource } from "../source";
import { attachLive } from "./attach";
import { Provenance } from "./catalogue";
import { parseLegacyNames } from "./legacy-names";
import { parseSchema } from "./schema-parser";

function errorKind<T>(result: Result<T>): ErrorKind | undefined {
  return result.ok ? undefined : result.error.kind;
}

const SCHEMA = [
  "2.0",
  "/spec",
  "LocalAddressType 0 0 4",
  "LocalAddress 4 9 17",
  "RemAddress 21 9 17",
  "LocalPort 38 8 2",
  "RemPort 40 8 2",
  "/read",
  "CurMSS 0 1 4",
  "PktsOut 4 3 4",
  "",
].join("\n");

const LEGACY_SCHEMA = [
  "1.0",
  "/spec",
  "LocalAddress 0 2",
  "RemoteAddress 4 2",
  "LocalPort 8 8",
  "RemotePort 10 8",
  "",
].join("\n");

function specBytes(
  addressType: number,
  local: number[],
  remote: number[],
  localPort: number,
  remotePort: number
): Uint8Array {
  const out = new Uint8Array(42);
  const view = new DataView(out.buffer);
  view.setInt32(0, addressType, true);
  out.set(local, 4);
  out[20] = addressType;
  out.set(remote, 21);
  out[37] = addressType;
  view.setUint16(38, localPort, true);
  view.setUint16(40, remotePort, true);
  return out;
}

const V6_LOCAL = [0x20, 0x01, 0x0d, 0xb8, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 1];
const V6_REMOTE = [0x20, 0x01, 0x0d, 0xb8, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 2];

class BrokenSource extends MemorySource {
  override readSchema(): Result<Uint8Array> {
    return fail(ErrorKind.File, "schema unavailable");
  }
}

describe("Catalogue", () => {
  let source: MemorySource;

  beforeEach(() => {
    source = new MemorySource(SCHEMA);
    source.setGroup(7, "spec", specBytes(1, [10, 0, 0, 1], [192, 168, 1, 2], 8080, 443));
    source.setGroup(9, "spec", specBytes(2, V6_LOCAL, V6_REMOTE, 5001, 80));
  });

  describe("attachLive", () => {
    it("should parse the schema read from the source", () => {
      const catalogue = unwrap(attachLive({ source, quiet: true }));

      expect(catalogue.provenance).toBe(Provenance.Live);
      expect(catalogue.source).toBe(source);
      expect(catalogue.groups().map((g) => g.name)).toEqual(["read"]);
    });

    it("should report an unreadable schema as a header error", () => {
      const result = attachLive({ source: new BrokenSource(SCHEMA) });

      expect(errorKind(result)).toBe(ErrorKind.Header);
      expect(result.ok ? undefined : result.error.cause).toBeInstanceOf(Error);
    });
  });

  describe("groups", () => {
    it("should find groups by name but not the `spec` group", () => {
      const catalogue = unwrap(parseSchema(SCHEMA));

      expect(unwrap(catalogue.findGroup("read")).size).toBe(8);
      expect(errorKind(catalogue.findGroup("spec"))).toBe(ErrorKind.NoGroup);
      expect(errorKind(catalogue.findGroup("tune"))).toBe(ErrorKind.NoGroup);
    });

    it("should find a field together with its group", () => {
      const catalogue = unwrap(parseSchema(SCHEMA));
      const { group, field } = unwrap(catalogue.findFieldAndGroup("PktsOut"));

      expect(group.name).toBe("read");
      expect(field.offset).toBe(4);
      expect(errorKind(catalogue.findFieldAndGroup("LocalPort"))).toBe(ErrorKind.NoVar);
    });

    it("should release everything on detach", () => {
      const catalogue = unwrap(parseSchema(SCHEMA));
      const read = unwrap(catalogue.findGroup("read"));

      catalogue.detach();

      expect(catalogue.detached).toBe(true);
      expect(catalogue.groups()).toEqual([]);
      expect(catalogue.specGroup).toBeUndefined();
      expect(read.fieldCount).toBe(0);
    });
  });

  describe("connections", () => {
    it("should read each connection's identity from the `spec` group", () => {
      const catalogue = unwrap(attachLive({ source }));
      const [v4, v6] = unwrap(catalogue.connections());

      expect(v4.cid).toBe(7);
      expect(v4.addressType).toBe(1);
      expect(v4.catalogue).toBe(catalogue);
      expect(v4.spec.srcAddr).toEqual(new Uint8Array([10, 0, 0, 1]));
      expect(v4.spec.dstAddr).toEqual(new Uint8Array([192, 168, 1, 2]));
      expect(v4.spec.srcPort).toBe(8080);
      expect(v4.spec.dstPort).toBe(443);

      expect(v6.cid).toBe(9);
      expect(v6.addressType).toBe(2);
      expect(v6.specV6.srcAddr).toEqual(new Uint8Array(V6_LOCAL));
      expect(v6.specV6.dstAddr).toEqual(new Uint8Array(V6_REMOTE));
      expect(v6.specV6.srcPort).toBe(5001);
      expect(v6.specV6.dstPort).toBe(80);
    });

    it("should use the legacy remote field names for legacy schemas", () => {
      const legacy = new MemorySource(LEGACY_SCHEMA);
      legacy.setGroup(3, "spec", new Uint8Array([127, 0, 0, 1, 127, 0, 0, 2, 0x50, 0x00, 0x90, 0x1f]));
      const [connection] = unwrap(unwrap(attachLive({ source: legacy })).connections());

      expect(connection.addressType).toBe(1);
      expect(connection.spec).toEqual({
        srcAddr: new Uint8Array([127, 0, 0, 1]),
        dstAddr: new Uint8Array([127, 0, 0, 2]),
        srcPort: 80,
        dstPort: 8080,
      });
    });

    it("should replace the connection set on every refresh", () => {
      const catalogue = unwrap(attachLive({ source }));
      const first = unwrap(catalogue.lookupConnection(7));

      source.removeConnection(9);
      const current = unwrap(catalogue.connections());

      expect(current.map((c) => c.cid)).toEqual([7]);
      expect(current[0]).not.toBe(first);
    });

    it("should find connections by tuple and by id", () => {
      const catalogue = unwrap(attachLive({ source }));

      const byTuple = unwrap(
        catalogue.findConnection({
          dstPort: 443,
          dstAddr: new Uint8Array([192, 168, 1, 2]),
          srcPort: 8080,
          srcAddr: new Uint8Array([10, 0, 0, 1]),
        })
      );
      const byTupleV6 = unwrap(
        catalogue.findConnectionV6({
          dstPort: 80,
          dstAddr: new Uint8Array(V6_REMOTE),
          srcPort: 5001,
          srcAddr: new Uint8Array(V6_LOCAL),
        })
      );

      expect(byTuple.cid).toBe(7);
      expect(byTupleV6.cid).toBe(9);
      expect(unwrap(catalogue.lookupConnection(9)).cid).toBe(9);
      expect(errorKind(catalogue.lookupConnection(42))).toBe(ErrorKind.NoConnection);
    });

    it("should not match a tuple that differs only in the local address", () => {
      const catalogue = unwrap(attachLive({ source }));
      const result = catalogue.findConnection({
        dstPort: 443,
        dstAddr: new Uint8Array([192, 168, 1, 2]),
        srcPort: 8080,
        srcAddr: new Uint8Array([10, 0, 0, 9]),
      });

      expect(errorKind(result)).toBe(ErrorKind.NoConnection);
    });

    it("should refuse connection queries on a replayed catalogue", () => {
      const catalogue = unwrap(parseSchema(SCHEMA));

      expect(errorKind(catalogue.connections())).toBe(ErrorKind.AgentType);
      expect(errorKind(catalogue.lookupConnection(7))).toBe(ErrorKind.AgentType);
    });

    it("should fail without a spec group", () => {
      const bare = new MemorySource("2.0\n/read\nCurMSS 0 1 4\n");
      bare.setGroup(1, "read", new Uint8Array(4));

      expect(errorKind(unwrap(attachLive({ source: bare })).connections())).toBe(ErrorKind.NoGroup);
    });

    it("should fail when a remote endpoint field is missing", () => {
      const partial = new MemorySource("2.0\n/spec\nLocalAddress 0 2 4\nLocalPort 4 8 2\n");
      partial.setGroup(1, "spec", new Uint8Array(6));

      expect(errorKind(unwrap(attachLive({ source: partial })).connections())).toBe(ErrorKind.NoVar);
    });
  });
});

describe("parseLegacyNames", () => {
  it("should map every renamed name to the current variable name", () => {
    const text = [
      "----------------------------------------",
      "VariableName:\tStartTimeStamp",
      "RenameFrom:\tStartTimeSec StartTime",
      "ShortDescr:\tStart Time",
      "----------------------------------------",
      "VariableName:\tCurMSS",
      "RenameFrom:\tCurrentMSS",
      "----------------------------------------",
      "VariableName:\tPipeSize",
      "Description:\tOctets in flight.",
      "",
    ].join("\n");

    expect(Object.fromEntries(parseLegacyNames(text))).toEqual({
      StartTimeSec: "StartTimeStamp",
      StartTime: "StartTimeStamp",
      CurrentMSS: "CurMSS",
    });
  });

  it("should ignore lines with fewer than two fields", () => {
    expect(parseLegacyNames("VariableName:\nRenameFrom:\n").size).toBe(0);
  });
});
