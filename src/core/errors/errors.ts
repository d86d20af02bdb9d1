/**
 * Error taxonomy shared by every operation in the library.
 *
 * Operations never throw for expected failures. They return a {@link Result},
 * a tagged union of a success value or a {@link SnaplogError} carrying a
 * machine-readable {@link ErrorKind}. The numeric kinds match the codes the
 * instrumentation source's tooling has always reported, so they can be
 * compared against values recorded elsewhere.
 */

/**
 * Machine-readable error kinds.
 */
export enum ErrorKind {
  Success = 0,
  /** I/O fault on an open/read/write/close/seek */
  File = 1,
  /** Operation requires a provenance the catalogue does not have */
  AgentType = 2,
  /** Allocation failure */
  NoMem = 3,
  /** No raw data available for a connection/group pair */
  NoConnection = 4,
  /** Mismatched or foreign entities */
  Inval = 5,
  /** Schema text malformed */
  Header = 6,
  /** Named field lookup failed */
  NoVar = 7,
  /** Named group lookup failed */
  NoGroup = 8,
  /** Socket address resolution failed (raised by socket-resolving collaborators) */
  Sock = 9,
  /** Schema/version mismatch detected downstream */
  KernVer = 10,
  FileTruncatedSnapData = 11,
  LogHeader = 12,
  MissingSnapMagic = 13,
  EndOfHeader = 14,
}

const messages = new Map<number, string>([
  [ErrorKind.Success, "success"],
  [ErrorKind.File, "file read/write error"],
  [ErrorKind.AgentType, "unsupported agent type"],
  [ErrorKind.NoMem, "no memory"],
  [ErrorKind.NoConnection, "connection not found"],
  [ErrorKind.Inval, "invalid arguments"],
  [ErrorKind.Header, "could not parse schema header"],
  [ErrorKind.NoVar, "variable not found"],
  [ErrorKind.NoGroup, "group not found"],
  [ErrorKind.Sock, "socket operation failed"],
  [ErrorKind.KernVer, "unexpected error due to kernel version mismatch"],
  [ErrorKind.FileTruncatedSnapData, "truncated snapshot data"],
  [ErrorKind.LogHeader, "missing log header"],
  [ErrorKind.MissingSnapMagic, "missing snaplog header"],
  [ErrorKind.EndOfHeader, "missing end of header"],
]);

/**
 * Returns the canonical one-line description of an error kind.
 * Unknown numeric codes describe themselves as "unknown error".
 */
export function describeError(kind: number): string {
  return messages.get(kind) ?? "unknown error";
}

/**
 * Error value carried by a failed {@link Result}.
 */
export class SnaplogError extends Error {
  /** Machine-readable kind */
  public readonly kind: ErrorKind;
  /** Structured context for diagnostics */
  public readonly details?: Record<string, unknown>;

  constructor(kind: ErrorKind, message?: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message ? `${describeError(kind)}: ${message}` : describeError(kind), { cause });
    this.name = "SnaplogError";
    this.kind = kind;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Success-or-error tagged union returned by every fallible operation.
 */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: SnaplogError };

/**
 * Wraps a success value.
 */
export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

/**
 * Builds a failed result of the given kind.
 */
export function fail<T = never>(
  kind: ErrorKind,
  message?: string,
  details?: Record<string, unknown>,
  cause?: unknown
): Result<T> {
  return { ok: false, error: new SnaplogError(kind, message, details, cause) };
}

/**
 * Returns the value of a successful result, or throws its error.
 *
 * @example
 * ```ts
 * const catalogue = unwrap(parseSchema(text));
 * ```
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}
