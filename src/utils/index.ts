/**
 * Shared utilities
 */

export * from "./logger.js";
export * from "./paths.js";
export * from "./fs.js";
export * from "./config.js";
