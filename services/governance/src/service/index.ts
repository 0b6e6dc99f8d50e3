/**
 * Service Module Exports
 */

export * from "./types.js";
export * from "./governance-service.js";
