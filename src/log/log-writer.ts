import { closeSync, openSync, writeSync } from "node:fs";
import { type Connection, type FieldGroup, specEquals } from "../catalogue";
import { BinaryCodec } from "../core/binary-codec";
import { ErrorKind, fail, ok, type Result } from "../core/errors";
import { createLogger, LogLevel, type Logger, type LoggerOptions } from "../core/logger";
import type { Snapshot } from "../snapshot";
import { BEGIN_SNAP_DATA, END_OF_HEADER_MARKER, PreambleSchema } from "./log-format";

/**
 * Options for {@link LogWriter.open}.
 */
export interface LogWriterOptions extends LoggerOptions {
  /** Current time in seconds since the epoch (default: the system clock) */
  clock?: () => number;
  /** Diagnostics sink (default: a console logger scoped "LogWriter") */
  logger?: Logger;
}

const encoder = new TextEncoder();

function writeAll(fd: number, bytes: Uint8Array): void {
  let written = 0;
  while (written < bytes.length) {
    written += writeSync(fd, bytes, written, bytes.length - written);
  }
}

/**
 * Appends snapshots of one group and one connection to a log file.
 *
 * The file starts with the live schema text, so a reader can interpret the
 * records without access to the source that produced them.
 */
export class LogWriter {
  private fd: number | null;

  private constructor(
    fd: number,
    /** Path of the log file */
    readonly path: string,
    readonly group: FieldGroup,
    readonly connection: Connection,
    /** Time written to the preamble, in seconds since the epoch */
    readonly time: number,
    private readonly logger: Logger
  ) {
    this.fd = fd;
  }

  /**
   * Creates (or truncates) a log file and writes its header and preamble.
   * The schema is read again from the catalogue's live source.
   */
  static open(
    path: string,
    connection: Connection,
    group: FieldGroup,
    options: LogWriterOptions = {}
  ): Result<LogWriter> {
    const logger = options.logger ?? createLogger("LogWriter", options);

    if (group.catalogue !== connection.catalogue) {
      return fail(ErrorKind.Inval, "group and connection belong to different catalogues", {
        group: group.name,
        cid: connection.cid,
      });
    }
    const source = group.catalogue.source;
    if (!source) return fail(ErrorKind.AgentType, "logging requires a live catalogue");

    const schema = source.readSchema();
    if (!schema.ok) return fail(ErrorKind.Header, "cannot read live schema", undefined, schema.error);

    let fd: number;
    try {
      fd = openSync(path, "w");
    } catch (error) {
      return fail(ErrorKind.File, `cannot create ${path}`, { path }, error);
    }

    const time = (options.clock ?? (() => Math.floor(Date.now() / 1000)))() >>> 0;
    try {
      writeAll(fd, schema.value);
      writeAll(fd, Uint8Array.of(0));
      writeAll(fd, encoder.encode(`${END_OF_HEADER_MARKER}\n`));
      writeAll(
        fd,
        BinaryCodec.encode(PreambleSchema, {
          time,
          groupName: group.name,
          dstPort: connection.spec.dstPort,
          dstAddr: connection.spec.dstAddr,
          srcPort: connection.spec.srcPort,
          srcAddr: connection.spec.srcAddr,
        })
      );
    } catch (error) {
      try {
        closeSync(fd);
      } catch (closeError) {
        logger.log(LogLevel.Warning, `cannot close ${path}: ${String(closeError)}`);
      }
      return fail(ErrorKind.File, `cannot write header to ${path}`, { path }, error);
    }

    logger.log(LogLevel.Debug, `opened ${path} for group ${group.name}, connection ${connection.cid}`);
    return ok(new LogWriter(fd, path, group, connection, time, logger));
  }

  /**
   * Whether {@link close} has been called.
   */
  get closed(): boolean {
    return this.fd === null;
  }

  /**
   * Appends one snapshot record.
   * The snapshot must be of this log's group and of a connection with the
   * same 4-tuple.
   */
  write(snapshot: Snapshot): Result<void> {
    if (this.fd === null) return fail(ErrorKind.File, `${this.path} is closed`);
    if (snapshot.group !== this.group) {
      return fail(ErrorKind.Inval, `snapshot of group ${snapshot.group.name} written to a ${this.group.name} log`);
    }
    if (!specEquals(snapshot.connection.spec, this.connection.spec)) {
      return fail(ErrorKind.Inval, "snapshot belongs to another connection", { cid: snapshot.connection.cid });
    }

    try {
      writeAll(this.fd, encoder.encode(`${BEGIN_SNAP_DATA}\n`));
      writeAll(this.fd, snapshot.data.subarray(0, this.group.size));
    } catch (error) {
      return fail(ErrorKind.File, `cannot write to ${this.path}`, { path: this.path }, error);
    }
    return ok(undefined);
  }

  /**
   * Closes the file. Closing twice is a no-op.
   */
  close(): Result<void> {
    if (this.fd === null) return ok(undefined);
    const fd = this.fd;
    this.fd = null;
    try {
      closeSync(fd);
    } catch (error) {
      return fail(ErrorKind.File, `cannot close ${this.path}`, { path: this.path }, error);
    }
    this.logger.log(LogLevel.Debug, `closed ${this.path}`);
    return ok(undefined);
  }
}
