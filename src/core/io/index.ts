export { BufferCursor } from "./buffer-cursor";
export { FileCursor } from "./file-cursor";
export type { ByteReader } from "./types";
