export { BaseBinaryCodec, BinaryCodec, BinaryPrimitives, getSchemaSize, viewOf } from "./binary-codec";
export type { BinaryField, Schema } from "./binary-codec";
