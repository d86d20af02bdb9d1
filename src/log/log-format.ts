import { BinaryPrimitives, getSchemaSize, type Schema } from "../core/binary-codec";
import { GROUP_NAME_MAX } from "../catalogue";

/** Line that separates the embedded schema from the preamble */
export const END_OF_HEADER_MARKER = "----End-Of-Header---- -1 -1";

/** Line that precedes every snapshot record */
export const BEGIN_SNAP_DATA = "----Begin-Snap-Data----";

/** Longest marker line read, newline included */
export const MARKER_LINE_MAX = 80;

/**
 * Fixed-size block written right after the end-of-header line:
 * capture time, group name and the connection's IPv4 tuple.
 */
export interface LogPreamble {
  /** Seconds since the epoch */
  time: number;
  groupName: string;
  dstPort: number;
  dstAddr: Uint8Array;
  srcPort: number;
  srcAddr: Uint8Array;
}

/**
 * Preamble layout. The tuple mirrors an aligned struct of
 * `{ u16 dstPort; u32 dstAddr; u16 srcPort; u32 srcAddr }`, so each port
 * is followed by two padding bytes.
 *
 * ```
 * ┌──────┬────────────┬─────────┬─────────┬─────────┬─────────┐
 * │ time │ group name │ dstPort │ dstAddr │ srcPort │ srcAddr │
 * │ u32  │  32 bytes  │ u16+pad │ 4 bytes │ u16+pad │ 4 bytes │
 * └──────┴────────────┴─────────┴─────────┴─────────┴─────────┘
 * ```
 */
export const PreambleSchema: Schema<LogPreamble> = {
  time: BinaryPrimitives.u32_le,
  groupName: BinaryPrimitives.cstring(GROUP_NAME_MAX),
  dstPort: BinaryPrimitives.padded(BinaryPrimitives.u16_le, 4),
  dstAddr: BinaryPrimitives.bytes(4),
  srcPort: BinaryPrimitives.padded(BinaryPrimitives.u16_le, 4),
  srcAddr: BinaryPrimitives.bytes(4),
};

/** Preamble size in bytes (52) */
export const PREAMBLE_SIZE = getSchemaSize(PreambleSchema);

/**
 * A preamble with every member at its nil value, as a decode target.
 */
export function emptyPreamble(): LogPreamble {
  return {
    time: PreambleSchema.time.toNil(),
    groupName: PreambleSchema.groupName.toNil(),
    dstPort: PreambleSchema.dstPort.toNil(),
    dstAddr: PreambleSchema.dstAddr.toNil(),
    srcPort: PreambleSchema.srcPort.toNil(),
    srcAddr: PreambleSchema.srcAddr.toNil(),
  };
}
