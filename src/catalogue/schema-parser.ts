import { ErrorKind, fail, ok, type Result } from "../core/errors";
import { createLogger, LogLevel, type Logger, type LoggerOptions } from "../core/logger";
import type { LiveSource } from "../source";
import { Catalogue } from "./catalogue";
import { DEPRECATION_MARKER, Field } from "./field";
import { FieldGroup, GROUP_NAME_MAX } from "./field-group";

/** Maximum field name length in bytes, deprecation marker included */
export const FIELD_NAME_MAX = 32;

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Options for {@link parseSchema}.
 */
export interface ParseSchemaOptions extends LoggerOptions {
  /** Live source the schema was read from; makes the catalogue live */
  source?: LiveSource;
  /** Diagnostics sink (default: a console logger scoped "Catalogue") */
  logger?: Logger;
}

function byteLength(text: string): number {
  return new TextEncoder().encode(text).length;
}

function parseInteger(token: string): number | undefined {
  return INTEGER_PATTERN.test(token) ? Number.parseInt(token, 10) : undefined;
}

/**
 * Parses schema text into a {@link Catalogue}.
 *
 * The first line is the version string. The rest is a whitespace-separated
 * token stream: `/name` (or `/` then `name`) opens a group, anything else
 * declares a field of the current group as `name offset type`, followed by
 * `length` unless the version has the legacy prefix. A leading `_` marks a
 * field deprecated. Fields of an unrecognized type are dropped.
 *
 * @example
 * ```ts
 * const catalogue = unwrap(parseSchema("1.0\n/tcp\nCurMSS 0 1\n"));
 * unwrap(catalogue.findGroup("tcp")).size; // 4
 * ```
 */
export function parseSchema(text: string, options: ParseSchemaOptions = {}): Result<Catalogue> {
  const logger = options.logger ?? createLogger("Catalogue", options);

  const newline = text.indexOf("\n");
  const version = newline < 0 ? text : text.slice(0, newline);
  if (version.length === 0) return fail(ErrorKind.Header, "missing version line");

  const catalogue = new Catalogue(version, logger, options.source);
  const arity = catalogue.hasDeclaredLength ? 4 : 3;
  const tokens = (newline < 0 ? "" : text.slice(newline + 1)).split(/\s+/).filter((t) => t.length > 0);

  let group: FieldGroup | undefined;
  let i = 0;
  while (i < tokens.length) {
    const token = tokens[i++];

    if (token.startsWith("/")) {
      let name = token.slice(1);
      if (name.length === 0) {
        if (i >= tokens.length) return fail(ErrorKind.Header, "group name missing");
        name = tokens[i++];
      }
      if (byteLength(name) > GROUP_NAME_MAX) {
        return fail(ErrorKind.Header, `group name too long: ${name}`, { name });
      }
      group = new FieldGroup(name, catalogue);
      catalogue.addGroup(group);
      logger.log(LogLevel.Debug, `new group: ${name}`);
      continue;
    }

    if (!group) return fail(ErrorKind.Header, `field ${token} declared before any group`, { name: token });
    if (byteLength(token) > FIELD_NAME_MAX) {
      return fail(ErrorKind.Header, `field name too long: ${token}`, { name: token });
    }
    if (i + arity - 1 > tokens.length) {
      return fail(ErrorKind.Header, `truncated declaration of ${token}`, { name: token });
    }

    const numbers = tokens.slice(i, i + arity - 1).map(parseInteger);
    i += arity - 1;
    const [offset, type, length] = numbers;
    if (offset === undefined || type === undefined || (arity === 4 && length === undefined)) {
      return fail(ErrorKind.Header, `malformed declaration of ${token}`, { name: token });
    }
    if (offset < 0) return fail(ErrorKind.Header, `negative offset for ${token}`, { name: token, offset });

    const deprecated = token.startsWith(DEPRECATION_MARKER);
    const name = deprecated ? token.slice(DEPRECATION_MARKER.length) : token;
    const field = new Field(name, type, offset, length, deprecated, group);
    if (field.width === 0) {
      logger.log(LogLevel.Debug, `dropping ${name}: unknown type ${type}`);
      continue;
    }
    if (deprecated) logger.log(LogLevel.Debug, `deprecated var: ${name}`);
    logger.log(LogLevel.Debug, `new var: ${name} ${offset} ${type}`);
    group.addField(field);
  }

  return ok(catalogue);
}
