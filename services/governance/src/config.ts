/**
 * Governance Service Configuration
 */

import { z } from "zod";
import { envSchema } from "@quorum/shared";

// ============================================
// GOVERNANCE CONFIG SCHEMA
// ============================================

const governanceConfigSchema = z.object({
  // Emergency
  emergencyCooldownMs: z.number().int().nonnegative(),

  // Proposals
  defaultTimeLockMs: z.number().int().nonnegative(),

  // Policies are checked on withdrawal execution when a config exists
  policyEnforcement: z.boolean(),

  // Events
  eventHistoryLimit: z.number().int().positive(),
});

export type GovernanceConfig = z.infer<typeof governanceConfigSchema>;

// ============================================
// LOAD CONFIGURATION
// ============================================

export function loadGovernanceConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<GovernanceConfig> = {}
): GovernanceConfig {
  const parsed = envSchema.parse(env);

  const config: GovernanceConfig = {
    emergencyCooldownMs: parsed.EMERGENCY_COOLDOWN_MS,
    defaultTimeLockMs: parsed.DEFAULT_TIME_LOCK_MS,
    policyEnforcement: parsed.POLICY_ENFORCEMENT,
    eventHistoryLimit: parsed.EVENT_HISTORY_LIMIT,
    ...overrides,
  };

  return governanceConfigSchema.parse(config);
}
