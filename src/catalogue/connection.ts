import { AddressType } from "../core/type-codec";
import type { Catalogue } from "./catalogue";

/**
 * A connection's addressing 4-tuple.
 * Addresses are raw network-order bytes (4 for IPv4, 16 for IPv6).
 */
export interface ConnectionSpec {
  dstPort: number;
  dstAddr: Uint8Array;
  srcPort: number;
  srcAddr: Uint8Array;
}

/** Connection id given to the single connection recovered from a log */
export const LOG_CONNECTION_ID = -1;

/**
 * Builds an all-zero spec for the given address width.
 */
export function emptySpec(addressLength: 4 | 16): ConnectionSpec {
  return {
    dstPort: 0,
    dstAddr: new Uint8Array(addressLength),
    srcPort: 0,
    srcAddr: new Uint8Array(addressLength),
  };
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) if (a[i] !== b[i]) return false;
  return true;
}

/**
 * Compares two specs member by member.
 */
export function specEquals(a: ConnectionSpec, b: ConnectionSpec): boolean {
  return (
    a.dstPort === b.dstPort &&
    a.srcPort === b.srcPort &&
    bytesEqual(a.dstAddr, b.dstAddr) &&
    bytesEqual(a.srcAddr, b.srcAddr)
  );
}

/**
 * One connection known to a {@link Catalogue}.
 *
 * Live catalogues replace their connection set wholesale on every refresh,
 * so a held Connection may become orphaned; re-resolve it before use.
 */
export class Connection {
  constructor(
    /** Connection id; {@link LOG_CONNECTION_ID} for a replayed connection */
    readonly cid: number,
    /** Owning catalogue */
    readonly catalogue: Catalogue,
    readonly addressType: AddressType,
    /** IPv4 tuple */
    readonly spec: ConnectionSpec = emptySpec(4),
    /** IPv6 tuple */
    readonly specV6: ConnectionSpec = emptySpec(16)
  ) {}
}
