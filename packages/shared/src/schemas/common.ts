/**
 * Common Schema Primitives
 * Shared types used across all schemas
 */

import { z } from "zod";

// ============================================
// PRIMITIVE SCHEMAS
// ============================================

/**
 * Account identifier as authenticated by the hosting ledger.
 * Compared exactly; no case folding.
 */
export const accountIdSchema = z
  .string()
  .min(1, "Account identifier must not be empty")
  .refine((value) => value.trim().length > 0, "Account identifier must not be blank");

export type AccountId = z.infer<typeof accountIdSchema>;

/** Strictly positive amount in base units */
export const amountSchema = z.bigint().positive("Amount must be positive");

/** Amount in base units, zero allowed */
export const nonNegativeAmountSchema = z.bigint().nonnegative("Amount must not be negative");

/** Millisecond timestamp */
export const timestampMsSchema = z.number().int().nonnegative();

/** Millisecond duration */
export const durationMsSchema = z.number().int().nonnegative();

/** Numeric environment variable */
export const numericEnvSchema = z.string().regex(/^\d+$/, "Must be a non-negative integer");
