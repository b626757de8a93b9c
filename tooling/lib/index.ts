/**
 * Central export point for all tooling modules
 */

export * from "./types";
export * from "./config";
export * from "./utils";
export * from "./logger";
export * from "./process";
export * from "./corpus";
export * from "./corpus-sync";
export * from "./emitter";
export * from "./audit";
export * from "./benchmark";
export * from "./pipeline";
