/**
 * @quorum/shared
 * Shared logger, constants and schemas for the quorum treasury
 */

export * from "./schemas/index.js";

export * from "./constants/index.js";

export {
  logger,
  createServiceLogger,
  governanceLogger,
  logSecurityEvent,
  audit,
  type AuditLogEntry,
} from "./logger/index.js";
