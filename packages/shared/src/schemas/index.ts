/**
 * Quorum Schemas
 * Zod schemas for boundary validation and environment configuration
 */

import { z } from "zod";
import { EMERGENCY_DEFAULTS, EVENT_HISTORY_LIMIT } from "../constants/index.js";
import { numericEnvSchema } from "./common.js";

export * from "./common.js";
export * from "./governance.js";

// ============================================
// ENVIRONMENT SCHEMA
// ============================================

export const envSchema = z.object({
  // Logging
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info"),
  LOG_FORMAT: z.enum(["json", "pretty"]).default("json"),

  // Emergency
  EMERGENCY_COOLDOWN_MS: numericEnvSchema
    .transform(Number)
    .default(String(EMERGENCY_DEFAULTS.cooldownMs)),

  // Proposals
  DEFAULT_TIME_LOCK_MS: numericEnvSchema.transform(Number).default("0"),

  // Policies
  POLICY_ENFORCEMENT: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .default("true"),

  // Events
  EVENT_HISTORY_LIMIT: numericEnvSchema
    .transform(Number)
    .default(String(EVENT_HISTORY_LIMIT)),

  // Node
  NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
});

export type EnvConfig = z.infer<typeof envSchema>;
