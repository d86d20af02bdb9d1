export { DEFAULT_ROOT_DIR, HEADER_FILE_NAME, resolveConfig } from "./config";
export type { SnaplogConfig } from "./config";
