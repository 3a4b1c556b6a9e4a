/**
 * sealed-settings core
 * Entry point and exports
 */

export * from "./types.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./crypto.js";
export * from "./key-session.js";
export * from "./descriptor.js";
export * from "./conversion.js";
export * from "./formats.js";
export * from "./file-store.js";
export * from "./visited-set.js";
export * from "./graph-walker.js";
export * from "./password-gate.js";
export * from "./settings-document.js";
