export * from "./errors";
export * from "./values";
export * from "./buffer-codec";
export * from "./types";
export * from "./dynamic-codec";
export * from "./node-codec";
export * from "./compression";
