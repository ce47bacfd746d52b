/**
 * Barrel exports for library-style use. The CLI and server import modules
 * directly.
 */
export * from "./config";
export * from "./errors";
export * from "./parsing";
export * from "./sort";
export * from "./lookup";
export * from "./store";
export * from "./propagation";
export * from "./report";
export * from "./pipeline";
export * from "./types";
