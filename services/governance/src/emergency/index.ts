/**
 * Emergency Module Exports
 */

export * from "./types.js";
export * from "./emergency-engine.js";
