import { type SnaplogConfig, resolveConfig } from "../core/config";
import { ErrorKind, fail, type Result } from "../core/errors";
import type { Logger } from "../core/logger";
import { type LiveSource, ProcfsSource } from "../source";
import type { Catalogue } from "./catalogue";
import { parseSchema } from "./schema-parser";

/**
 * Options for {@link attachLive}.
 */
export interface AttachOptions extends SnaplogConfig {
  /** Live source (default: a {@link ProcfsSource} over `rootDir`) */
  source?: LiveSource;
  /** Diagnostics sink */
  logger?: Logger;
}

/**
 * Attaches to a live instrumentation source by reading and parsing its schema.
 */
export function attachLive(options: AttachOptions = {}): Result<Catalogue> {
  const config = resolveConfig(options);
  const source = options.source ?? new ProcfsSource(config, options.logger);

  const schema = source.readSchema();
  if (!schema.ok) {
    return fail(ErrorKind.Header, "cannot read live schema", { path: config.headerFile }, schema.error);
  }
  return parseSchema(new TextDecoder().decode(schema.value), {
    source,
    logger: options.logger,
    debug: config.debug,
    quiet: config.quiet,
  });
}
