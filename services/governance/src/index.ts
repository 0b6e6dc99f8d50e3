/**
 * @quorum/governance
 * Multi-signature treasury governance: threshold authorization, proposals,
 * policies and emergency override
 */

export * from "./errors.js";
export * from "./context.js";
export * from "./config.js";
export * from "./events/index.js";
export * from "./treasury/index.js";
export * from "./proposal/index.js";
export * from "./policy/index.js";
export * from "./emergency/index.js";
export * from "./store/index.js";
export * from "./service/index.js";
