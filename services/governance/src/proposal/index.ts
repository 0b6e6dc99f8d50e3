/**
 * Proposal Module Exports
 */

export * from "./types.js";
export * from "./proposal-engine.js";
