import { BinaryPrimitives, viewOf } from "../core/binary-codec";
import { ErrorKind, fail, ok, type Result } from "../core/errors";
import { LogLevel, type Logger } from "../core/logger";
import { AddressType } from "../core/type-codec";
import type { LiveSource } from "../source";
import { Connection, type ConnectionSpec, emptySpec, specEquals } from "./connection";
import type { Field } from "./field";
import type { FieldGroup } from "./field-group";

/**
 * Where a catalogue's data comes from.
 */
export enum Provenance {
  /** Attached to a live instrumentation source */
  Live = "live",
  /** Recovered from a log file */
  Replayed = "replayed",
}

/** Version prefix of the legacy schema variant, whose fields carry no declared length */
export const LEGACY_VERSION_PREFIX = "1.";

/** Name of the distinguished group describing connection identity fields */
export const SPEC_GROUP_NAME = "spec";

/**
 * A parsed schema: the set of field groups plus, for live catalogues,
 * the connections currently exposed by the source.
 *
 * Groups are kept most recently declared first. The `spec` group is held
 * apart and is not returned by {@link groups} or {@link findGroup}.
 */
export class Catalogue {
  private readonly groupList: FieldGroup[] = [];
  private spec: FieldGroup | undefined;
  private connectionList: Connection[] = [];
  private released = false;

  constructor(
    /** Version string from the first schema line */
    readonly version: string,
    /** Diagnostics sink shared by the catalogue's groups and fields */
    readonly logger: Logger,
    /** Live source; absent for a replayed catalogue */
    readonly source?: LiveSource
  ) {}

  get provenance(): Provenance {
    return this.source ? Provenance.Live : Provenance.Replayed;
  }

  /**
   * Whether field declarations carry a fourth, length, token.
   */
  get hasDeclaredLength(): boolean {
    return !this.isLegacy;
  }

  /**
   * Whether the schema is of the legacy major version.
   */
  get isLegacy(): boolean {
    return this.version.startsWith(LEGACY_VERSION_PREFIX);
  }

  /**
   * The `spec` group, when the schema declares one.
   */
  get specGroup(): FieldGroup | undefined {
    return this.spec;
  }

  /**
   * Whether {@link detach} has released this catalogue.
   */
  get detached(): boolean {
    return this.released;
  }

  /**
   * Forward iteration over the groups, `spec` excluded.
   */
  groups(): FieldGroup[] {
    return [...this.groupList];
  }

  /**
   * Looks a group up by name. The first match wins.
   */
  findGroup(name: string): Result<FieldGroup> {
    const group = this.groupList.find((g) => g.name === name);
    return group ? ok(group) : fail(ErrorKind.NoGroup, name, { name });
  }

  /**
   * Searches every group, in order, for a field of the given name.
   */
  findFieldAndGroup(name: string): Result<{ group: FieldGroup; field: Field }> {
    for (const group of this.groupList) {
      const field = group.findField(name);
      if (field.ok) return ok({ group, field: field.value });
    }
    return fail(ErrorKind.NoVar, name, { name });
  }

  /**
   * Refreshes and returns the live connection set.
   */
  connections(): Result<Connection[]> {
    const refreshed = this.refreshConnections();
    if (!refreshed.ok) return refreshed;
    return ok([...this.connectionList]);
  }

  /**
   * Replaces the connection set with the connections the source lists now.
   * The previous set is dropped before the rescan, so a failed refresh
   * leaves it empty.
   */
  refreshConnections(): Result<void> {
    const source = this.source;
    if (!source) return fail(ErrorKind.AgentType, "connections require a live catalogue");

    this.connectionList = [];
    const ids = source.listConnectionIds();
    if (!ids.ok) return ids;

    const spec = this.spec;
    if (!spec) return fail(ErrorKind.NoGroup, SPEC_GROUP_NAME, { name: SPEC_GROUP_NAME });

    const fresh: Connection[] = [];
    for (const cid of ids.value) {
      const connection = this.readConnection(source, spec, cid);
      if (!connection.ok) return connection;
      fresh.push(connection.value);
    }
    this.connectionList = fresh;
    this.logger.log(LogLevel.Debug, `refreshed ${fresh.length} connections`);
    return ok(undefined);
  }

  /**
   * Finds the live connection with the given IPv4 tuple.
   */
  findConnection(spec: ConnectionSpec): Result<Connection> {
    return this.findLive((c) => specEquals(c.spec, spec));
  }

  /**
   * Finds the live connection with the given IPv6 tuple.
   */
  findConnectionV6(specV6: ConnectionSpec): Result<Connection> {
    return this.findLive((c) => specEquals(c.specV6, specV6));
  }

  /**
   * Finds the live connection with the given id.
   */
  lookupConnection(cid: number): Result<Connection> {
    return this.findLive((c) => c.cid === cid);
  }

  /**
   * Releases every group, field and connection this catalogue owns.
   * Snapshots allocated against it must not be used afterwards.
   */
  detach(): void {
    for (const group of this.groupList) group.clear();
    this.spec?.clear();
    this.groupList.length = 0;
    this.spec = undefined;
    this.connectionList = [];
    this.released = true;
  }

  /**
   * Registers a freshly parsed group.
   * @internal
   */
  addGroup(group: FieldGroup): void {
    if (group.name === SPEC_GROUP_NAME) {
      this.spec = group;
    } else {
      this.groupList.unshift(group);
    }
  }

  /**
   * Installs the single connection of a replayed catalogue.
   * @internal
   */
  adoptConnection(connection: Connection): void {
    this.connectionList = [connection];
  }

  private findLive(match: (connection: Connection) => boolean): Result<Connection> {
    const refreshed = this.refreshConnections();
    if (!refreshed.ok) return refreshed;
    const connection = this.connectionList.find(match);
    return connection ? ok(connection) : fail(ErrorKind.NoConnection);
  }

  private readConnection(source: LiveSource, spec: FieldGroup, cid: number): Result<Connection> {
    const readField = (name: string): Result<Uint8Array> => {
      const field = spec.findField(name);
      if (!field.ok) return field;
      return source.readRange(cid, spec.name, field.value.offset, field.value.width);
    };

    let addressType = AddressType.IPv4;
    if (spec.findField("LocalAddressType").ok) {
      const raw = readField("LocalAddressType");
      if (!raw.ok) return raw;
      addressType = toAddressType(raw.value);
    }

    const [remoteAddressName, remotePortName] = this.isLegacy
      ? ["RemoteAddress", "RemotePort"]
      : ["RemAddress", "RemPort"];

    const localAddress = readField("LocalAddress");
    if (!localAddress.ok) return localAddress;
    const remoteAddress = readField(remoteAddressName);
    if (!remoteAddress.ok) return remoteAddress;
    const localPort = readField("LocalPort");
    if (!localPort.ok) return localPort;
    const remotePort = readField(remotePortName);
    if (!remotePort.ok) return remotePort;

    const addressLength = addressType === AddressType.IPv4 ? 4 : 16;
    const tuple: ConnectionSpec = {
      dstPort: toPort(remotePort.value),
      dstAddr: fit(remoteAddress.value, addressLength),
      srcPort: toPort(localPort.value),
      srcAddr: fit(localAddress.value, addressLength),
    };

    return ok(
      addressType === AddressType.IPv4
        ? new Connection(cid, this, addressType, tuple, emptySpec(16))
        : new Connection(cid, this, addressType, emptySpec(4), tuple)
    );
  }
}

function toAddressType(raw: Uint8Array): AddressType {
  const code = raw.length >= 4 ? BinaryPrimitives.i32_le.read(viewOf(raw), 0) : raw[0];
  switch (code) {
    case AddressType.IPv4:
      return AddressType.IPv4;
    case AddressType.IPv6:
      return AddressType.IPv6;
    case AddressType.DNS:
      return AddressType.DNS;
    default:
      return AddressType.Unknown;
  }
}

function toPort(raw: Uint8Array): number {
  return raw.length >= 2 ? BinaryPrimitives.u16_le.read(viewOf(raw), 0) : raw[0];
}

/**
 * Copies the leading `length` bytes, zero-filling when the input is shorter.
 */
function fit(raw: Uint8Array, length: number): Uint8Array {
  const out = new Uint8Array(length);
  out.set(raw.subarray(0, length));
  return out;
}
