/**
 * Binary snapshot logs.
 *
 * A log embeds the schema it was written under, then one fixed preamble,
 * then any number of records:
 *
 * ```
 * <schema text>\0
 * ----End-Of-Header---- -1 -1\n
 * <preamble: time, group name, connection tuple>
 * ----Begin-Snap-Data----\n<group.size bytes>
 * ...
 * ```
 *
 * @example
 * ```ts
 * const writer = unwrap(LogWriter.open("conn.log", connection, group));
 * unwrap(snapshot.capture());
 * unwrap(writer.write(snapshot));
 * unwrap(writer.close());
 * ```
 */

export {
  BEGIN_SNAP_DATA,
  emptyPreamble,
  END_OF_HEADER_MARKER,
  MARKER_LINE_MAX,
  PREAMBLE_SIZE,
  PreambleSchema,
} from "./log-format";
export type { LogPreamble } from "./log-format";
export { LogReader } from "./log-reader";
export type { LogReaderOptions, ReplayStep } from "./log-reader";
export { logEntryValues, snapshotValues, VALUE_PREFIX } from "./log-values";
export { LogWriter } from "./log-writer";
export type { LogWriterOptions } from "./log-writer";
export { SnapLog } from "./snap-log";
export type { SnapLogOptions } from "./snap-log";
