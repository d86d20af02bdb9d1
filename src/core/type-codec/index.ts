export {
  ADDRESS_TYPE_OFFSET,
  AddressType,
  FieldType,
  decodeValue,
  renderIPv4,
  renderIPv6,
  renderValue,
  typeWidth,
} from "./type-codec";
export type { FieldValue } from "./type-codec";
