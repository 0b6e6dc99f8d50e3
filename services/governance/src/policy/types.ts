/**
 * Policy Types
 */

import type { AccountId, ProposalCategory, SpendingPeriod } from "@quorum/shared";
import type { PolicyName } from "../events/types.js";

// ============================================
// SUB-POLICIES
// ============================================

export interface SpendingLimit {
  enabled: boolean;
  period: SpendingPeriod;
  limit: bigint;
  spent: bigint;
  periodStart: number;
}

export interface WhitelistEntry {
  account: AccountId;
  expiresAt: number;
  description: string;
}

export interface Whitelist {
  enabled: boolean;
  entries: WhitelistEntry[];
}

export interface CategoryGate {
  enabled: boolean;
  allowed: ProposalCategory[];
}

export interface AmountTier {
  minAmount: bigint;
  requiredSignatures: number;
}

export interface AmountTiers {
  enabled: boolean;
  /** Sorted by minAmount ascending */
  tiers: AmountTier[];
}

export interface TimeLockFormula {
  enabled: boolean;
  baseMs: number;
  amountDivisor: bigint;
}

// ============================================
// POLICY CONFIG
// ============================================

/**
 * Policy set attached to one treasury. A sub-policy that was never
 * configured is absent and evaluates as a pass, same as a disabled one.
 */
export interface PolicyConfig {
  readonly id: string;
  readonly treasuryId: string;
  readonly createdAt: number;
  updatedAt: number;

  spendingLimit?: SpendingLimit;
  whitelist?: Whitelist;
  categoryGate?: CategoryGate;
  amountTiers?: AmountTiers;
  timeLockFormula?: TimeLockFormula;
}

// ============================================
// EVALUATION
// ============================================

export interface PolicyCheckInput {
  recipient: AccountId;
  amount: bigint;
  category: ProposalCategory;
  signatureCount: number;
}

export interface BatchTransfer {
  recipient: AccountId;
  amount: bigint;
}

export interface PolicyEvaluation {
  allowed: boolean;
  failedPolicy?: PolicyName;
  reason?: string;
}
