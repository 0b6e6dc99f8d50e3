/**
 * Store Module Exports
 */

export * from "./governance-store.js";
