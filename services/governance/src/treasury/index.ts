/**
 * Treasury Module Exports
 */

export * from "./types.js";
export * from "./treasury.js";
export * from "./payout.js";
