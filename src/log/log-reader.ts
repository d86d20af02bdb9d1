import { type Catalogue, type Connection, type FieldGroup, Provenance } from "../catalogue";
import { ErrorKind, fail, ok, type Result } from "../core/errors";
import { FileCursor } from "../core/io";
import { createLogger, LogLevel, type Logger, type LoggerOptions } from "../core/logger";
import { Snapshot } from "../snapshot";
import { BEGIN_SNAP_DATA } from "./log-format";
import { readLogHeader, readMarkerLine } from "./log-header";

/**
 * Outcome of one replay step: a record was read, or the log ended cleanly.
 */
export type ReplayStep = "snapshot" | "end";

/**
 * Options for {@link LogReader.open}.
 */
export interface LogReaderOptions extends LoggerOptions {
  /** Diagnostics sink (default: a console logger scoped "LogReader") */
  logger?: Logger;
}

/**
 * Replays the snapshots stored in a log file.
 *
 * Opening the log rebuilds a replayed catalogue from the embedded schema,
 * holding the logged group and a single connection (cid -1) built from the
 * logged tuple. {@link close} releases both.
 *
 * @example
 * ```ts
 * const reader = unwrap(LogReader.open("conn.log"));
 * const snapshot = unwrap(reader.allocSnapshot());
 * while (unwrap(reader.next(snapshot)) === "snapshot") {
 *   console.log(snapshotValues(snapshot));
 * }
 * unwrap(reader.close());
 * ```
 */
export class LogReader {
  private constructor(
    private readonly cursor: FileCursor,
    /** Replayed catalogue parsed from the embedded schema */
    readonly catalogue: Catalogue,
    /** Group every record holds */
    readonly group: FieldGroup,
    /** Connection rebuilt from the logged tuple */
    readonly connection: Connection,
    /** Time the log was opened for writing, in seconds since the epoch */
    readonly time: number,
    private readonly logger: Logger
  ) {}

  /**
   * Opens a log and reads everything up to the first record.
   */
  static open(path: string, options: LogReaderOptions = {}): Result<LogReader> {
    const logger = options.logger ?? createLogger("LogReader", options);

    const opened = FileCursor.open(path);
    if (!opened.ok) return opened;
    const cursor = opened.value;

    const header = readLogHeader(cursor, path, logger);
    if (!header.ok) {
      const closed = cursor.close();
      if (!closed.ok) logger.log(LogLevel.Warning, closed.error.message);
      return header;
    }
    const { catalogue, group, connection, time } = header.value;

    logger.log(LogLevel.Debug, `opened ${path}: version ${catalogue.version}, group ${group.name}`);
    return ok(new LogReader(cursor, catalogue, group, connection, time, logger));
  }

  /**
   * Allocates a snapshot bound to this log's group and connection.
   */
  allocSnapshot(): Result<Snapshot> {
    return Snapshot.alloc(this.group, this.connection);
  }

  /**
   * Reads the next record into `snapshot`.
   * Returns `"end"` when the file ends cleanly before another record.
   */
  next(snapshot: Snapshot): Result<ReplayStep> {
    if (this.cursor.closed) return fail(ErrorKind.File, "log is closed");
    if (snapshot.group.catalogue.provenance !== Provenance.Replayed) {
      return fail(ErrorKind.AgentType, "snapshot does not belong to a replayed catalogue");
    }
    if (snapshot.group !== this.group) {
      return fail(ErrorKind.Inval, `snapshot of group ${snapshot.group.name} read from a ${this.group.name} log`);
    }

    const marker = readMarkerLine(this.cursor, BEGIN_SNAP_DATA);
    if (!marker.ok) return marker;
    if (marker.value === "empty") return ok("end");
    if (marker.value === "mismatch") {
      return fail(ErrorKind.MissingSnapMagic, `expected ${BEGIN_SNAP_DATA} before a record`);
    }

    const data = this.cursor.readExact(this.group.size);
    if (!data.ok) return data;
    if (data.value.length < this.group.size) {
      return fail(ErrorKind.FileTruncatedSnapData, `expected ${this.group.size} bytes, got ${data.value.length}`);
    }
    snapshot.data.set(data.value);
    return ok("snapshot");
  }

  /**
   * Whether a read has reached the end of the file.
   */
  eof(): boolean {
    return this.cursor.atEnd();
  }

  /**
   * Closes the file and releases the replayed catalogue.
   */
  close(): Result<void> {
    if (this.cursor.closed) return ok(undefined);
    const closed = this.cursor.close();
    this.catalogue.detach();
    this.logger.log(LogLevel.Debug, "closed log");
    return closed;
  }
}
