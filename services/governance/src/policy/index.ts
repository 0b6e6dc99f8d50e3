/**
 * Policy Module Exports
 */

export * from "./types.js";
export * from "./policy-engine.js";
