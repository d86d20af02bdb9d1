export * from "./binary-codec";
export * from "./config";
export * from "./errors";
export * from "./io";
export * from "./logger";
export * from "./type-codec";
