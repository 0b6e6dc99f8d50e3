export * from "./types.js";
export * from "./event-bus.js";
