/**
 * Barrel exports.
 *
 * Re-exports the model, store, service and client so consumers can import
 * from `src` directly.
 */
export * from "./api";
export * from "./app";
export * from "./bmi";
export * from "./config";
export * from "./csv";
export * from "./errors";
export * from "./patient";
export * from "./service";
export * from "./store";
export * from "./types";
