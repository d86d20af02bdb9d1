import { LogLevel } from "../core/logger";
import { typeWidth } from "../core/type-codec";
import type { FieldGroup } from "./field-group";

/**
 * Marker prefix of a deprecated field name in the schema text.
 */
export const DEPRECATION_MARKER = "_";

/**
 * One named, typed, offset-addressed value inside a {@link FieldGroup}.
 *
 * Deprecated fields keep their name without the marker, are hidden from
 * {@link FieldGroup.fields} and warn once, on their first lookup.
 * The warning flag is plain mutable state and is not safe to race on.
 */
export class Field {
  private warned = false;

  constructor(
    /** Field name, without the deprecation marker */
    readonly name: string,
    /** Type tag (see FieldType) */
    readonly type: number,
    /** Byte offset inside the group */
    readonly offset: number,
    /** Declared length, for schema versions that carry one */
    readonly length: number | undefined,
    /** Whether the schema marked this field as deprecated */
    readonly deprecated: boolean,
    /** Owning group */
    readonly group: FieldGroup
  ) {}

  /**
   * Wire width in bytes, derived from the type tag.
   */
  get width(): number {
    return typeWidth(this.type);
  }

  /**
   * Records an access to this field, warning on the first access to a
   * deprecated one.
   * @internal
   */
  noteAccess(): void {
    if (!this.deprecated || this.warned) return;
    this.warned = true;
    this.group.catalogue.logger.log(
      LogLevel.Warning,
      `accessing deprecated variable ${this.name}`
    );
  }
}
