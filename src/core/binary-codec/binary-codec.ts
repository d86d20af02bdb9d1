/**
 * A binary field descriptor.
 * Defines how a single value is serialized/deserialized
 * at a fixed byte size.
 */
export type BinaryField<T> = {
  /** Size of the field in bytes */
  size: number;

  /**
   * Writes a value into a DataView at the given offset.
   * @param dv DataView to write into
   * @param o Byte offset
   * @param v Value to write
   */
  write(dv: DataView, o: number, v: T): void;

  /**
   * Reads a value from a DataView at the given offset.
   * @param dv DataView to read from
   * @param o Byte offset
   */
  read(dv: DataView, o: number): T;

  /**
   * Returns the nil value
   */
  toNil(): T;
};

/**
 * A schema mapping object keys to binary fields.
 * The order of iteration defines the binary layout.
 *
 * IMPORTANT:
 * Property order is respected as insertion order.
 * Do not rely on computed or dynamic keys.
 */
export type Schema<T> = {
  [K in keyof T]: BinaryField<T[K]>;
};

/**
 * Cache of computed schema byte sizes, keyed by schema object.
 */
const schemaSizes = new WeakMap<object, number>();

/**
 * Computes and caches the total byte size of a schema.
 * @param schema Binary schema definition
 */
export function getSchemaSize<T extends object>(schema: Schema<T>): number {
  const cached = schemaSizes.get(schema);
  if (cached !== undefined) return cached;

  let size = 0;
  for (const k of Object.keys(schema) as (keyof T)[]) {
    size += schema[k].size;
  }

  schemaSizes.set(schema, size);
  return size;
}

/**
 * Creates a DataView spanning exactly the bytes of a Uint8Array.
 */
export function viewOf(buf: Uint8Array): DataView {
  return new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
}

/**
 * Base codec implementation.
 * Handles schema-driven encoding/decoding.
 */
export class BaseBinaryCodec {
  /**
   * Encodes an object into a binary buffer using the given schema.
   *
   * Allocates a right-sized buffer per call.
   *
   * @param schema Binary schema definition
   * @param data Object to encode
   * @returns A Uint8Array containing the encoded bytes
   */
  protected static encodeInto<T extends object>(
    schema: Schema<T>,
    data: T
  ): Uint8Array {
    const size = getSchemaSize(schema);
    const buffer = new ArrayBuffer(size);
    const view = new DataView(buffer);

    let o = 0;
    for (const k of Object.keys(schema) as (keyof T)[]) {
      const f = schema[k];
      f.write(view, o, data[k]);
      o += f.size;
    }

    return new Uint8Array(buffer);
  }

  /**
   * Decodes a binary buffer into a target object using the given schema.
   *
   * Validates buffer size before reading.
   *
   * @param schema Binary schema definition
   * @param buf Buffer containing encoded data
   * @param target Target object to mutate
   * @returns The mutated target object
   */
  static decodeInto<T extends object>(
    schema: Schema<T>,
    buf: Uint8Array,
    target: T
  ): T {
    const expectedSize = getSchemaSize(schema);

    if (buf.byteLength < expectedSize) {
      throw new RangeError(
        `Buffer too small: expected ${expectedSize} bytes, got ${buf.byteLength}`
      );
    }

    const view = viewOf(buf);

    let o = 0;
    for (const k of Object.keys(schema) as (keyof T)[]) {
      const f = schema[k];
      target[k] = f.read(view, o);
      o += f.size;
    }

    return target;
  }
}

/**
 * Built-in binary primitive field definitions.
 *
 * Values captured from the instrumentation source are in the host order of
 * the instrumented machine, which is little-endian; the `_le` variants are the
 * ones the snapshot and log formats use.
 */
export class BinaryPrimitives {
  /** Unsigned 8-bit integer */
  static readonly u8: BinaryField<number> = {
    size: 1,
    write: (dv, o, v) => dv.setUint8(o, v),
    read: (dv, o) => dv.getUint8(o),
    toNil: () => 0,
  };

  /** Unsigned 16-bit integer (little-endian) */
  static readonly u16_le: BinaryField<number> = {
    size: 2,
    write: (dv, o, v) => dv.setUint16(o, v, true),
    read: (dv, o) => dv.getUint16(o, true),
    toNil: () => 0,
  };

  /** Unsigned 32-bit integer (little-endian) */
  static readonly u32_le: BinaryField<number> = {
    size: 4,
    write: (dv, o, v) => dv.setUint32(o, v, true),
    read: (dv, o) => dv.getUint32(o, true),
    toNil: () => 0,
  };

  /** Signed 32-bit integer (little-endian) */
  static readonly i32_le: BinaryField<number> = {
    size: 4,
    write: (dv, o, v) => dv.setInt32(o, v, true),
    read: (dv, o) => dv.getInt32(o, true),
    toNil: () => 0,
  };

  /** Unsigned 64-bit integer (little-endian) */
  static readonly u64_le: BinaryField<bigint> = {
    size: 8,
    write: (dv, o, v) => dv.setBigUint64(o, v, true),
    read: (dv, o) => dv.getBigUint64(o, true),
    toNil: () => 0n,
  };

  /**
   * Raw byte run of a fixed length, copied in and out verbatim.
   * Shorter input is zero-filled; longer input is truncated.
   * @param length Number of bytes
   */
  static bytes(length: number): BinaryField<Uint8Array> {
    return {
      size: length,
      write(dv, o, v) {
        for (let i = 0; i < length; i++) dv.setUint8(o + i, i < v.length ? v[i] : 0);
      },
      read(dv, o) {
        const out = new Uint8Array(length);
        for (let i = 0; i < length; i++) out[i] = dv.getUint8(o + i);
        return out;
      },
      toNil: () => new Uint8Array(length),
    };
  }

  /**
   * String stored in a fixed-width NUL-padded slot.
   * Reading stops at the first NUL; a value filling the slot has no NUL.
   * @param length Slot size in bytes
   */
  static cstring(length: number): BinaryField<string> {
    return {
      size: length,
      write(dv, o, v) {
        const bytes = new TextEncoder().encode(v);
        if (bytes.length > length)
          throw new RangeError(`String too long, max ${length} bytes`);
        for (let i = 0; i < length; i++) dv.setUint8(o + i, i < bytes.length ? bytes[i] : 0);
      },
      read(dv, o) {
        let end = 0;
        while (end < length && dv.getUint8(o + end) !== 0) end++;
        const bytes = new Uint8Array(end);
        for (let i = 0; i < end; i++) bytes[i] = dv.getUint8(o + i);
        return new TextDecoder().decode(bytes);
      },
      toNil: () => "",
    };
  }

  /**
   * Pads a field to a wider slot, mirroring struct member alignment.
   * The trailing bytes are written as zero and ignored when reading.
   * @param field Field occupying the start of the slot
   * @param size Total slot size in bytes
   */
  static padded<T>(field: BinaryField<T>, size: number): BinaryField<T> {
    if (size < field.size) {
      throw new RangeError(`Padded size ${size} is smaller than field size ${field.size}`);
    }
    return {
      size,
      write(dv, o, v) {
        field.write(dv, o, v);
        for (let i = field.size; i < size; i++) dv.setUint8(o + i, 0);
      },
      read: (dv, o) => field.read(dv, o),
      toNil: () => field.toNil(),
    };
  }
}

/**
 * Public codec API.
 * Exposes encode/decode helpers over {@link BinaryPrimitives} schemas.
 */
export class BinaryCodec extends BaseBinaryCodec {
  /**
   * Encodes an object into a binary buffer.
   */
  static encode<T extends object>(
    schema: Schema<T>,
    data: T
  ): Uint8Array {
    return this.encodeInto(schema, data);
  }

  /**
   * Decodes a binary buffer into an existing object.
   */
  static decode<T extends object>(
    schema: Schema<T>,
    buf: Uint8Array,
    target: T
  ): T {
    return this.decodeInto(schema, buf, target);
  }
}
