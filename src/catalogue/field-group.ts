import { ErrorKind, fail, ok, type Result } from "../core/errors";
import type { Catalogue } from "./catalogue";
import type { Field } from "./field";

/** Maximum group name length in bytes, the width of its slot in a log */
export const GROUP_NAME_MAX = 32;

/**
 * One named table of fields, backed by a single fixed-size byte region.
 *
 * Fields are kept most recently declared first. `size` is the largest
 * `offset + width` over every retained field.
 */
export class FieldGroup {
  private readonly fieldList: Field[] = [];
  private byteSize = 0;

  constructor(
    /** Group name */
    readonly name: string,
    /** Owning catalogue */
    readonly catalogue: Catalogue
  ) {}

  /**
   * Size in bytes of the group's backing region.
   */
  get size(): number {
    return this.byteSize;
  }

  /**
   * Number of retained fields, deprecated ones included.
   */
  get fieldCount(): number {
    return this.fieldList.length;
  }

  /**
   * Forward iteration over the non-deprecated fields.
   */
  fields(): Field[] {
    return this.fieldList.filter((f) => !f.deprecated);
  }

  /**
   * Looks a field up by name, deprecated fields included.
   * The first match wins.
   */
  findField(name: string): Result<Field> {
    const field = this.fieldList.find((f) => f.name === name);
    if (!field) {
      return fail(ErrorKind.NoVar, `${name} in group ${this.name}`, { group: this.name, name });
    }
    field.noteAccess();
    return ok(field);
  }

  /**
   * Adds a parsed field and grows the group to cover it.
   * @internal
   */
  addField(field: Field): void {
    this.fieldList.unshift(field);
    this.byteSize = Math.max(this.byteSize, field.offset + field.width);
  }

  /**
   * Drops every field.
   * @internal
   */
  clear(): void {
    this.fieldList.length = 0;
  }
}
