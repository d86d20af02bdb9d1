import { accessSync, closeSync, constants, openSync, readFileSync, readSync, readdirSync } from "node:fs";
import { join } from "node:path";
import { type SnaplogConfig, resolveConfig } from "../core/config";
import { ErrorKind, fail, ok, type Result } from "../core/errors";
import { createLogger, LogLevel, type Logger } from "../core/logger";
import type { LiveSource } from "./types";

/** Name of the per-connection file whose readability marks a live connection */
const READ_FILE_NAME = "read";

const CID_PATTERN = /^\d+$/;

/**
 * Live source over the instrumentation directory tree:
 * `<root>/header` for the schema, `<root>/<cid>/<group>` for group bytes.
 *
 * @example
 * ```ts
 * const source = new ProcfsSource({ rootDir: "/proc/web100" });
 * const ids = unwrap(source.listConnectionIds());
 * ```
 */
export class ProcfsSource implements LiveSource {
  private readonly config: Required<SnaplogConfig>;
  private readonly logger: Logger;

  constructor(config: SnaplogConfig = {}, logger?: Logger) {
    this.config = resolveConfig(config);
    this.logger = logger ?? createLogger("ProcfsSource", this.config);
  }

  /**
   * Root directory this source reads from.
   */
  get rootDir(): string {
    return this.config.rootDir;
  }

  readSchema(): Result<Uint8Array> {
    try {
      return ok(readFileSync(this.config.headerFile));
    } catch (error) {
      return fail(ErrorKind.File, `cannot read ${this.config.headerFile}`, { path: this.config.headerFile }, error);
    }
  }

  readGroup(cid: number, groupName: string, size: number): Result<Uint8Array> {
    const bytes = this.readAt(cid, groupName, 0, size);
    if (!bytes.ok) return bytes;
    if (bytes.value.length !== size) {
      return fail(ErrorKind.NoConnection, `short read of ${groupName} for connection ${cid}`, {
        cid,
        group: groupName,
        expected: size,
        actual: bytes.value.length,
      });
    }
    return bytes;
  }

  readRange(cid: number, groupName: string, offset: number, length: number): Result<Uint8Array> {
    const bytes = this.readAt(cid, groupName, offset, length);
    if (!bytes.ok) return bytes;
    if (bytes.value.length !== length) {
      return fail(ErrorKind.File, `short read of ${groupName}@${offset} for connection ${cid}`, {
        cid,
        group: groupName,
        offset,
      });
    }
    return bytes;
  }

  listConnectionIds(): Result<number[]> {
    let entries: string[];
    try {
      entries = readdirSync(this.config.rootDir);
    } catch (error) {
      return fail(ErrorKind.File, `cannot list ${this.config.rootDir}`, { path: this.config.rootDir }, error);
    }

    const ids: number[] = [];
    for (const entry of entries) {
      if (!CID_PATTERN.test(entry)) continue;
      try {
        accessSync(join(this.config.rootDir, entry, READ_FILE_NAME), constants.R_OK);
      } catch {
        this.logger.log(LogLevel.Debug, `skipping ${entry}: no readable ${READ_FILE_NAME} file`);
        continue;
      }
      ids.push(Number(entry));
    }
    return ok(ids);
  }

  /**
   * Reads up to `length` bytes at `offset`; the result is shorter only at end of file.
   */
  private readAt(cid: number, groupName: string, offset: number, length: number): Result<Uint8Array> {
    const path = join(this.config.rootDir, String(cid), groupName);
    let fd: number;
    try {
      fd = openSync(path, "r");
    } catch (error) {
      return fail(ErrorKind.NoConnection, `cannot open ${path}`, { cid, group: groupName }, error);
    }

    const out = new Uint8Array(length);
    let filled = 0;
    let readError: unknown;
    try {
      while (filled < length) {
        const n = readSync(fd, out, filled, length - filled, offset + filled);
        if (n === 0) break;
        filled += n;
      }
    } catch (error) {
      readError = error;
    }

    try {
      closeSync(fd);
    } catch (error) {
      return fail(ErrorKind.File, `cannot close ${path}`, { cid, group: groupName }, error);
    }
    if (readError !== undefined) {
      return fail(ErrorKind.File, `cannot read ${path}`, { cid, group: groupName }, readError);
    }
    return ok(filled === length ? out : out.slice(0, filled));
  }
}
