import type { Connection, Field, FieldGroup } from "../catalogue";
import { ErrorKind, fail, ok, type Result } from "../core/errors";
import { decodeValue, type FieldValue, renderValue } from "../core/type-codec";

function toBigInt(bytes: Uint8Array): bigint {
  let value = 0n;
  for (let i = bytes.length - 1; i >= 0; i--) value = (value << 8n) | BigInt(bytes[i]);
  return value;
}

function fromBigInt(value: bigint, width: number): Uint8Array {
  const out = new Uint8Array(width);
  for (let i = 0; i < width; i++) {
    out[i] = Number(value & 0xffn);
    value >>= 8n;
  }
  return out;
}

/**
 * A point-in-time copy of one group's bytes for one connection.
 *
 * `data` always holds exactly `group.size` bytes. Reads and deltas require
 * the field and the other snapshot to belong to the very same group object;
 * a same-named group from another catalogue does not qualify.
 */
export class Snapshot {
  private constructor(
    readonly group: FieldGroup,
    readonly connection: Connection,
    readonly data: Uint8Array
  ) {}

  /**
   * Allocates a zero-filled snapshot of `group` for `connection`.
   * Both must come from the same catalogue.
   */
  static alloc(group: FieldGroup, connection: Connection): Result<Snapshot> {
    if (group.catalogue !== connection.catalogue) {
      return fail(ErrorKind.Inval, "group and connection belong to different catalogues", {
        group: group.name,
        cid: connection.cid,
      });
    }
    let data: Uint8Array;
    try {
      data = new Uint8Array(group.size);
    } catch (error) {
      return fail(ErrorKind.NoMem, `cannot allocate ${group.size} bytes`, { group: group.name }, error);
    }
    return ok(new Snapshot(group, connection, data));
  }

  /**
   * Fills the snapshot with the connection's current group bytes.
   * Only live catalogues can capture; on failure the data is left as it was.
   */
  capture(): Result<void> {
    const source = this.group.catalogue.source;
    if (!source) return fail(ErrorKind.AgentType, "capture requires a live catalogue");

    const bytes = source.readGroup(this.connection.cid, this.group.name, this.group.size);
    if (!bytes.ok) return bytes;
    this.data.set(bytes.value);
    return ok(undefined);
  }

  /**
   * Copies out the raw bytes of a field.
   */
  read(field: Field): Result<Uint8Array> {
    if (field.group !== this.group) {
      return fail(ErrorKind.Inval, `${field.name} is not in group ${this.group.name}`, {
        field: field.name,
        group: this.group.name,
      });
    }
    return ok(this.data.slice(field.offset, field.offset + field.width));
  }

  /**
   * Reads and decodes a field.
   */
  readValue(field: Field): Result<FieldValue> {
    const bytes = this.read(field);
    return bytes.ok ? ok(decodeValue(field.type, bytes.value)) : bytes;
  }

  /**
   * Reads a field and renders it as text.
   */
  renderField(field: Field): Result<string> {
    const bytes = this.read(field);
    return bytes.ok ? ok(renderValue(field.type, bytes.value)) : bytes;
  }

  /**
   * Computes `this - other` for a field, as an unsigned little-endian integer
   * of the field's width, wrapping modulo 2^(8 * width).
   *
   * Nothing checks which snapshot is the newer one; pass them in the order
   * you want subtracted.
   */
  delta(field: Field, other: Snapshot): Result<Uint8Array> {
    if (other.group !== this.group) {
      return fail(ErrorKind.Inval, "snapshots belong to different groups", {
        group: this.group.name,
        other: other.group.name,
      });
    }
    const mine = this.read(field);
    if (!mine.ok) return mine;
    const theirs = other.read(field);
    if (!theirs.ok) return theirs;

    const width = mine.value.length;
    const modulus = 1n << BigInt(8 * width);
    const diff = (((toBigInt(mine.value) - toBigInt(theirs.value)) % modulus) + modulus) % modulus;
    return ok(fromBigInt(diff, width));
  }

  /**
   * {@link delta}, decoded with the field's type.
   */
  deltaValue(field: Field, other: Snapshot): Result<FieldValue> {
    const bytes = this.delta(field, other);
    return bytes.ok ? ok(decodeValue(field.type, bytes.value)) : bytes;
  }

  /**
   * Overwrites this snapshot's data with `src`'s.
   * Both must share the same group and connection.
   */
  copyFrom(src: Snapshot): Result<void> {
    if (src.connection !== this.connection || src.group !== this.group) {
      return fail(ErrorKind.Inval, "snapshots differ in group or connection", { group: this.group.name });
    }
    this.data.set(src.data.subarray(0, src.group.size));
    return ok(undefined);
  }
}
