import { renderIPv4, renderValue, type FieldValue } from "../core/type-codec";
import type { Snapshot } from "../snapshot";
import type { LogReader } from "./log-reader";

/** Prefix of every extracted value name */
export const VALUE_PREFIX = "web100_log_entry";

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Turns rendered text into a number when it is an integer, a bigint when it
 * is an integer too large for a number, and leaves it as text otherwise.
 */
function toFieldValue(text: string): FieldValue {
  if (!INTEGER_PATTERN.test(text)) return text;
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : BigInt(text);
}

/**
 * Flattens a log's header information into named values: schema version,
 * log time and the logged connection tuple.
 */
export function logEntryValues(reader: LogReader): Record<string, FieldValue> {
  const { spec } = reader.connection;
  return {
    [`${VALUE_PREFIX}_version`]: reader.catalogue.version,
    [`${VALUE_PREFIX}_log_time`]: reader.time,
    [`${VALUE_PREFIX}_connection_spec_local_af`]: 0,
    [`${VALUE_PREFIX}_connection_spec_local_ip`]: renderIPv4(spec.srcAddr),
    [`${VALUE_PREFIX}_connection_spec_local_port`]: spec.srcPort,
    [`${VALUE_PREFIX}_connection_spec_remote_ip`]: renderIPv4(spec.dstAddr),
    [`${VALUE_PREFIX}_connection_spec_remote_port`]: spec.dstPort,
  };
}

/**
 * Renders every non-deprecated field of a snapshot into named values.
 *
 * Field names pass through `legacyNames` (see `parseLegacyNames`) so that
 * logs written under old names come out under the current ones.
 */
export function snapshotValues(
  snapshot: Snapshot,
  legacyNames: ReadonlyMap<string, string> = new Map()
): Record<string, FieldValue> {
  const values: Record<string, FieldValue> = {};
  for (const field of snapshot.group.fields()) {
    const bytes = snapshot.data.subarray(field.offset, field.offset + field.width);
    const name = legacyNames.get(field.name) ?? field.name;
    values[`${VALUE_PREFIX}_snap_${name}`] = toFieldValue(renderValue(field.type, bytes));
  }
  return values;
}
