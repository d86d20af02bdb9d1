/**
 * Snapshots: byte copies of one group for one connection.
 *
 * @example
 * ```ts
 * import { attachLive } from "./catalogue";
 * import { Snapshot } from "./snapshot";
 *
 * const catalogue = unwrap(attachLive());
 * const group = unwrap(catalogue.findGroup("read"));
 * const [connection] = unwrap(catalogue.connections());
 *
 * const before = unwrap(Snapshot.alloc(group, connection));
 * const after = unwrap(Snapshot.alloc(group, connection));
 * unwrap(before.capture());
 * // ... later
 * unwrap(after.capture());
 *
 * const pktsOut = unwrap(group.findField("PktsOut"));
 * unwrap(after.deltaValue(pktsOut, before)); // packets sent in between
 * ```
 */

export { Snapshot } from "./snapshot";
