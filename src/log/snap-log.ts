import { readFileSync } from "node:fs";
import type { Catalogue, Connection, FieldGroup } from "../catalogue";
import { ErrorKind, fail, ok, type Result } from "../core/errors";
import { BufferCursor } from "../core/io";
import { createLogger, LogLevel, type Logger, type LoggerOptions } from "../core/logger";
import { Snapshot } from "../snapshot";
import { BEGIN_SNAP_DATA } from "./log-format";
import { readLogHeader } from "./log-header";

/**
 * Options for {@link SnapLog.parse} and {@link SnapLog.load}.
 */
export interface SnapLogOptions extends LoggerOptions {
  /** Diagnostics sink (default: a console logger scoped "SnapLog") */
  logger?: Logger;
  /** Names the log in error details (default: "<buffer>", or the path) */
  label?: string;
}

const MARKER_BYTES = new TextEncoder().encode(`${BEGIN_SNAP_DATA}\n`);

/**
 * A whole log held in memory, with random access to its records.
 *
 * Every record is the begin marker line followed by `group.size` bytes, so
 * record `n` starts at `bodyOffset + n * recordLength`.
 *
 * ```
 * ┌────────┬──────────┬──────────────────────┬──────────────────────┐
 * │ schema │ preamble │ marker │ group bytes │ marker │ group bytes │ ...
 * └────────┴──────────┴──────────────────────┴──────────────────────┘
 *                     ^ bodyOffset
 * ```
 */
export class SnapLog {
  private constructor(
    private readonly raw: Uint8Array,
    /** Offset of the first record */
    readonly bodyOffset: number,
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
   * Parses a log already read into memory. The bytes are kept, not copied.
   */
  static parse(raw: Uint8Array, options: SnapLogOptions = {}): Result<SnapLog> {
    const logger = options.logger ?? createLogger("SnapLog", options);
    const cursor = new BufferCursor(raw);

    const header = readLogHeader(cursor, options.label ?? "<buffer>", logger);
    if (!header.ok) return header;
    const { catalogue, group, connection, time } = header.value;

    return ok(new SnapLog(raw, cursor.offset, catalogue, group, connection, time, logger));
  }

  /**
   * Reads a log file whole and parses it.
   */
  static load(path: string, options: SnapLogOptions = {}): Result<SnapLog> {
    let raw: Uint8Array;
    try {
      raw = readFileSync(path);
    } catch (error) {
      return fail(ErrorKind.File, `cannot read ${path}`, { path }, error);
    }
    return SnapLog.parse(raw, { ...options, label: options.label ?? path });
  }

  /**
   * Bytes per record, marker line included.
   */
  get recordLength(): number {
    return MARKER_BYTES.length + this.group.size;
  }

  /**
   * Number of whole records in the body. A trailing partial record is not
   * counted.
   */
  count(): number {
    return Math.floor((this.raw.length - this.bodyOffset) / this.recordLength);
  }

  /**
   * Checks the body's framing: the first and last records start with the
   * begin marker and the body is a whole number of records.
   * An empty body is valid.
   */
  validate(): Result<void> {
    const total = this.raw.length - this.bodyOffset;
    if (total === 0) return ok(undefined);

    if (!this.hasMarkerAt(this.bodyOffset)) {
      return fail(ErrorKind.MissingSnapMagic, "first record has no begin marker");
    }
    if (total % this.recordLength !== 0) {
      return fail(
        ErrorKind.FileTruncatedSnapData,
        `body of ${total} bytes is not a multiple of ${this.recordLength}`
      );
    }
    if (!this.hasMarkerAt(this.recordOffset(this.count() - 1))) {
      return fail(ErrorKind.MissingSnapMagic, "last record has no begin marker");
    }
    return ok(undefined);
  }

  /**
   * Allocates a snapshot bound to this log's group and connection.
   */
  allocSnapshot(): Result<Snapshot> {
    return Snapshot.alloc(this.group, this.connection);
  }

  /**
   * Returns record `index` as a new snapshot.
   */
  snapshotAt(index: number): Result<Snapshot> {
    if (this.catalogue.detached) return fail(ErrorKind.Inval, "log has been closed");
    if (!Number.isInteger(index) || index < 0 || index >= this.count()) {
      return fail(ErrorKind.Inval, `no record ${index}`, { count: this.count() });
    }
    const offset = this.recordOffset(index);
    if (!this.hasMarkerAt(offset)) {
      return fail(ErrorKind.MissingSnapMagic, `record ${index} has no begin marker`);
    }

    const snapshot = this.allocSnapshot();
    if (!snapshot.ok) return snapshot;
    const start = offset + MARKER_BYTES.length;
    snapshot.value.data.set(this.raw.subarray(start, start + this.group.size));
    return snapshot;
  }

  /**
   * Releases the replayed catalogue. Closing twice is a no-op.
   */
  close(): void {
    if (this.catalogue.detached) return;
    this.catalogue.detach();
    this.logger.log(LogLevel.Debug, "released log");
  }

  private recordOffset(index: number): number {
    return this.bodyOffset + index * this.recordLength;
  }

  private hasMarkerAt(offset: number): boolean {
    if (offset + MARKER_BYTES.length > this.raw.length) return false;
    for (let i = 0; i < MARKER_BYTES.length; i++) {
      if (this.raw[offset + i] !== MARKER_BYTES[i]) return false;
    }
    return true;
  }
}
