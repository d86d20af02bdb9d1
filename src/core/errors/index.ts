export { ErrorKind, SnaplogError, describeError, ok, fail, unwrap } from "./errors";
export type { Result } from "./errors";
