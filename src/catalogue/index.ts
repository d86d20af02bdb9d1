export { attachLive } from "./attach";
export type { AttachOptions } from "./attach";
export { Catalogue, LEGACY_VERSION_PREFIX, Provenance, SPEC_GROUP_NAME } from "./catalogue";
export { Connection, emptySpec, LOG_CONNECTION_ID, specEquals } from "./connection";
export type { ConnectionSpec } from "./connection";
export { DEPRECATION_MARKER, Field } from "./field";
export { FieldGroup, GROUP_NAME_MAX } from "./field-group";
export { parseLegacyNames } from "./legacy-names";
export { FIELD_NAME_MAX, parseSchema } from "./schema-parser";
export type { ParseSchemaOptions } from "./schema-parser";
