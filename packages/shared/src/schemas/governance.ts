/**
 * Governance Input Schemas
 * Boundary validation for treasury, proposal, policy and emergency inputs
 */

import { z } from "zod";
import {
  PROPOSAL_CATEGORIES,
  PROPOSAL_LIMITS,
  SPENDING_PERIODS,
} from "../constants/index.js";
import {
  accountIdSchema,
  amountSchema,
  durationMsSchema,
  nonNegativeAmountSchema,
  timestampMsSchema,
} from "./common.js";

// ============================================
// ENUMS
// ============================================

export const proposalCategorySchema = z.enum(PROPOSAL_CATEGORIES);

export const spendingPeriodSchema = z.enum(SPENDING_PERIODS);

// ============================================
// CALL CONTEXT
// ============================================

export const callContextSchema = z.object({
  caller: accountIdSchema,
  now: timestampMsSchema,
});

// ============================================
// SIGNERS
// ============================================

export const signerListSchema = z.array(accountIdSchema);

// ============================================
// PROPOSALS
// ============================================

export const transactionItemSchema = z.object({
  recipient: accountIdSchema,
  amount: amountSchema,
  description: z.string().max(PROPOSAL_LIMITS.maxDescriptionLength),
});

export const proposalTextSchema = z.object({
  title: z.string().min(1, "Title must not be empty").max(PROPOSAL_LIMITS.maxTitleLength),
  description: z.string().max(PROPOSAL_LIMITS.maxDescriptionLength),
});

export const timeLockSchema = durationMsSchema;

// ============================================
// POLICIES
// ============================================

export const whitelistEntryInputSchema = z.object({
  account: accountIdSchema,
  expiresAt: timestampMsSchema,
  description: z.string().max(PROPOSAL_LIMITS.maxDescriptionLength),
});

export const amountTierSchema = z.object({
  minAmount: nonNegativeAmountSchema,
  requiredSignatures: z.number().int().min(1, "A tier must require at least one signature"),
});

export const amountTierListSchema = z
  .array(amountTierSchema)
  .refine(
    (tiers) => new Set(tiers.map((tier) => tier.minAmount)).size === tiers.length,
    "Tier minimum amounts must be unique"
  );

export const timeLockFormulaInputSchema = z.object({
  baseMs: durationMsSchema,
  amountDivisor: z.bigint().positive("Amount divisor must be positive"),
});

export const categoryListSchema = z.array(proposalCategorySchema);
