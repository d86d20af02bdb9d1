import { join } from "node:path";

/**
 * Library configuration.
 */
export interface SnaplogConfig {
  /**
   * Root of the instrumentation tree (default: "/proc/web100").
   * Holds the schema file and one directory per connection id.
   */
  rootDir?: string;

  /**
   * Path of the live schema file (default: `<rootDir>/header`)
   */
  headerFile?: string;

  /**
   * Enable debug logging
   */
  debug?: boolean;

  /**
   * Suppress warnings such as the deprecated-field notice (default: false)
   */
  quiet?: boolean;
}

/** Default root of the instrumentation tree */
export const DEFAULT_ROOT_DIR = "/proc/web100";

/** Name of the schema file under the root */
export const HEADER_FILE_NAME = "header";

/**
 * Fills in every unset configuration value with its default.
 */
export function resolveConfig(config: SnaplogConfig = {}): Required<SnaplogConfig> {
  const rootDir = config.rootDir ?? DEFAULT_ROOT_DIR;
  return {
    rootDir,
    headerFile: config.headerFile ?? join(rootDir, HEADER_FILE_NAME),
    debug: config.debug ?? false,
    quiet: config.quiet ?? false,
  };
}
