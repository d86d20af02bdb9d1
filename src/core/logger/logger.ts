/**
 * Log levels for library diagnostics.
 */
export enum LogLevel {
  Error = "ERROR",
  Warning = "WARNING",
  Info = "INFO",
  Debug = "DEBUG",
}

/**
 * Minimal logging surface the library writes to.
 * Pass your own implementation to route diagnostics elsewhere.
 */
export interface Logger {
  log(level: LogLevel, message: string): void;
}

/**
 * Options for the console-backed logger.
 */
export interface LoggerOptions {
  /** Print debug messages (default: false) */
  debug?: boolean;
  /** Suppress warnings, such as deprecated-field notices (default: false) */
  quiet?: boolean;
}

/**
 * Creates a logger that writes `[scope] message` lines to the console.
 *
 * Debug output is dropped unless `debug` is set, and warnings are dropped
 * when `quiet` is set. Errors are always printed.
 *
 * @example
 * ```ts
 * const logger = createLogger("Catalogue", { debug: true });
 * logger.log(LogLevel.Debug, "new group: tcp");
 * ```
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const debug = options.debug ?? false;
  const quiet = options.quiet ?? false;

  return {
    log(level, message) {
      const formatted = `[${scope}] ${message}`;
      switch (level) {
        case LogLevel.Error:
          console.error(formatted);
          break;
        case LogLevel.Warning:
          if (!quiet) console.warn(formatted);
          break;
        case LogLevel.Info:
          console.info(formatted);
          break;
        case LogLevel.Debug:
          if (debug) console.debug(formatted);
          break;
      }
    },
  };
}
