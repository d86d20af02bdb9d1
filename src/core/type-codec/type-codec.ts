import { BinaryPrimitives, viewOf } from "../binary-codec";

/**
 * Field type tags, numbered as the instrumentation source numbers them.
 */
export enum FieldType {
  Integer = 0,
  Integer32 = 1,
  InetAddressIPv4 = 2,
  Counter32 = 3,
  Gauge32 = 4,
  Unsigned32 = 5,
  TimeTicks = 6,
  Counter64 = 7,
  InetPortNumber = 8,
  InetAddress = 9,
  InetAddressIPv6 = 10,
  Str32 = 11,
  Octet = 12,
}

/**
 * Address family discriminator, stored in byte 16 of an
 * {@link FieldType.InetAddress} value and in connection identities.
 */
export enum AddressType {
  Unknown = 0,
  IPv4 = 1,
  IPv6 = 2,
  DNS = 16,
}

/**
 * A decoded field value.
 */
export type FieldValue = number | bigint | string;

/** Byte offset of the discriminator in a generic address value */
export const ADDRESS_TYPE_OFFSET = 16;

/**
 * Returns the wire width in bytes of a type tag, or 0 for unrecognized tags.
 */
export function typeWidth(type: number): number {
  switch (type) {
    case FieldType.Integer:
    case FieldType.Integer32:
    case FieldType.InetAddressIPv4:
    case FieldType.Counter32:
    case FieldType.Gauge32:
    case FieldType.Unsigned32:
    case FieldType.TimeTicks:
      return 4;
    case FieldType.Counter64:
      return 8;
    case FieldType.InetPortNumber:
      return 2;
    case FieldType.InetAddress:
    case FieldType.InetAddressIPv6:
      return 17;
    case FieldType.Str32:
      return 32;
    case FieldType.Octet:
      return 1;
    default:
      return 0;
  }
}

/**
 * Resolves a generic address to its concrete family by its discriminator byte.
 */
function concreteType(type: number, bytes: Uint8Array): number {
  if (type !== FieldType.InetAddress) return type;
  return bytes[ADDRESS_TYPE_OFFSET] === AddressType.IPv4
    ? FieldType.InetAddressIPv4
    : FieldType.InetAddressIPv6;
}

/**
 * Renders four address bytes as a dotted quad.
 */
export function renderIPv4(bytes: Uint8Array): string {
  return `${bytes[0]}.${bytes[1]}.${bytes[2]}.${bytes[3]}`;
}

/**
 * Renders sixteen address bytes in canonical compressed IPv6 form.
 *
 * The longest run of two or more all-zero groups becomes `::`; on a tie the
 * leftmost run wins. A lone zero group is printed as `0`.
 *
 * @example
 * ```ts
 * renderIPv6(new Uint8Array(16)); // "::"
 * ```
 */
export function renderIPv6(bytes: Uint8Array): string {
  const view = viewOf(bytes);
  const groups: number[] = [];
  for (let i = 0; i < 8; i++) groups.push(view.getUint16(i * 2, false));

  let bestStart = -1;
  let bestLength = 0;
  for (let i = 0; i < 8; ) {
    if (groups[i] !== 0) {
      i++;
      continue;
    }
    let j = i;
    while (j < 8 && groups[j] === 0) j++;
    if (j - i > bestLength) {
      bestStart = i;
      bestLength = j - i;
    }
    i = j;
  }

  const hex = (from: number, to: number) =>
    groups.slice(from, to).map((g) => g.toString(16)).join(":");

  if (bestLength < 2) return hex(0, 8);
  return `${hex(0, bestStart)}::${hex(bestStart + bestLength, 8)}`;
}

/**
 * Returns the bytes of a NUL-terminated string, without the terminator.
 */
function cstringBytes(bytes: Uint8Array): Uint8Array {
  const end = bytes.indexOf(0);
  return end < 0 ? bytes : bytes.subarray(0, end);
}

/**
 * Decodes a typed value from its raw bytes.
 *
 * Integers and ports decode to numbers, 64-bit counters to bigints, and
 * addresses and strings to their text form. Unrecognized types decode to
 * `"unknown type"`.
 */
export function decodeValue(type: number, bytes: Uint8Array): FieldValue {
  const view = viewOf(bytes);
  switch (concreteType(type, bytes)) {
    case FieldType.Integer:
    case FieldType.Integer32:
      return BinaryPrimitives.i32_le.read(view, 0);
    case FieldType.Counter32:
    case FieldType.Gauge32:
    case FieldType.Unsigned32:
    case FieldType.TimeTicks:
      return BinaryPrimitives.u32_le.read(view, 0);
    case FieldType.Counter64:
      return BinaryPrimitives.u64_le.read(view, 0);
    case FieldType.InetPortNumber:
      return BinaryPrimitives.u16_le.read(view, 0);
    case FieldType.InetAddressIPv4:
      return renderIPv4(bytes);
    case FieldType.InetAddressIPv6:
      return renderIPv6(bytes);
    case FieldType.Str32:
      return new TextDecoder().decode(cstringBytes(bytes));
    case FieldType.Octet:
      return BinaryPrimitives.u8.read(view, 0);
    default:
      return "unknown type";
  }
}

/**
 * Renders a typed value as text.
 *
 * Same as {@link decodeValue} except that octets render as a hex literal
 * (`0x1f`) and every value comes back as a string.
 */
export function renderValue(type: number, bytes: Uint8Array): string {
  if (type === FieldType.Octet) return `0x${bytes[0].toString(16)}`;
  return String(decodeValue(type, bytes));
}
