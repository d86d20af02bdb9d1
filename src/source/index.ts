export { MemorySource } from "./memory-source";
export { ProcfsSource } from "./procfs-source";
export type { ConnectionDirectory, LiveSource, RawByteSource, SchemaSource } from "./types";
