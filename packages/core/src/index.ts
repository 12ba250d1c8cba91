export * from "./artifact.js";
export * from "./checksum.js";
export * from "./download.js";
export * from "./errors.js";
export * from "./exec.js";
export * from "./extract.js";
export * from "./install.js";
export * from "./lock.js";
export * from "./path-setup.js";
export * from "./paths.js";
export * from "./pipeline.js";
export * from "./platform.js";
export type * from "./types.js";
export * from "./uninstall.js";
export * from "./version.js";
