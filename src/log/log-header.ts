import {
  type Catalogue,
  Connection,
  type FieldGroup,
  LOG_CONNECTION_ID,
  parseSchema,
} from "../catalogue";
import { BinaryCodec } from "../core/binary-codec";
import { ErrorKind, fail, ok, type Result } from "../core/errors";
import type { ByteReader } from "../core/io";
import type { Logger } from "../core/logger";
import { AddressType } from "../core/type-codec";
import {
  emptyPreamble,
  END_OF_HEADER_MARKER,
  MARKER_LINE_MAX,
  PREAMBLE_SIZE,
  PreambleSchema,
} from "./log-format";

/**
 * Everything a log holds ahead of its first record.
 */
export interface LogHeader {
  catalogue: Catalogue;
  group: FieldGroup;
  connection: Connection;
  time: number;
}

const NUL = 0x00;
const NEWLINE = 0x0a;

const decoder = new TextDecoder();

/**
 * Reads one marker line, newline included, and checks it equals `marker`.
 * An empty read means the input ended before the line started.
 */
export function readMarkerLine(reader: ByteReader, marker: string): Result<"match" | "mismatch" | "empty"> {
  const line = reader.readUntil(NEWLINE, MARKER_LINE_MAX);
  if (!line.ok) return line;
  if (line.value.length === 0) return ok("empty");
  return ok(decoder.decode(line.value) === `${marker}\n` ? "match" : "mismatch");
}

/**
 * Parses the embedded schema, the end-of-header line and the preamble, and
 * builds the replayed catalogue with its single connection. The catalogue
 * is detached again on any failure after it was built.
 * @param label Names the log in error details
 */
export function readLogHeader(reader: ByteReader, label: string, logger: Logger): Result<LogHeader> {
  const header = reader.readUntil(NUL);
  if (!header.ok) return header;
  if (header.value[header.value.length - 1] !== NUL) {
    return fail(ErrorKind.Header, `${label} ends inside the schema`, { path: label });
  }

  const parsed = parseSchema(decoder.decode(header.value.subarray(0, header.value.length - 1)), { logger });
  if (!parsed.ok) return parsed;
  const catalogue = parsed.value;

  const abandon = <T>(failure: Result<T>): Result<T> => {
    catalogue.detach();
    return failure;
  };

  const marker = readMarkerLine(reader, END_OF_HEADER_MARKER);
  if (!marker.ok) return abandon(marker);
  if (marker.value !== "match") {
    return abandon(fail(ErrorKind.EndOfHeader, label, { path: label }));
  }

  const raw = reader.readExact(PREAMBLE_SIZE);
  if (!raw.ok) return abandon(raw);
  if (raw.value.length < PREAMBLE_SIZE) {
    return abandon(fail(ErrorKind.File, `${label} has a short preamble`, { path: label }));
  }
  const preamble = BinaryCodec.decode(PreambleSchema, raw.value, emptyPreamble());

  const connection = new Connection(LOG_CONNECTION_ID, catalogue, AddressType.IPv4, {
    dstPort: preamble.dstPort,
    dstAddr: preamble.dstAddr,
    srcPort: preamble.srcPort,
    srcAddr: preamble.srcAddr,
  });
  catalogue.adoptConnection(connection);

  const group = catalogue.findGroup(preamble.groupName);
  if (!group.ok) return abandon(group);

  return ok({ catalogue, group: group.value, connection, time: preamble.time });
}
