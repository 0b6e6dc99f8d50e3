/**
 * Policy Engine
 *
 * Composable checks layered on top of threshold authorization:
 * - Periodic spending limit (daily / weekly / monthly)
 * - Recipient whitelist with per-entry expiry
 * - Allowed proposal categories
 * - Amount tiers demanding more signatures for larger amounts
 * - Amount-scaled time-lock
 *
 * Evaluation short-circuits on the first failing enabled sub-policy, in the
 * order spending, whitelist, category, tiers. The engine is not wired into
 * the proposal engine; GovernanceService composes the two.
 */

import * as crypto from "crypto";
import {
  amountSchema,
  amountTierListSchema,
  categoryListSchema,
  governanceLogger,
  SPENDING_PERIOD_MS,
  spendingPeriodSchema,
  timeLockFormulaInputSchema,
  whitelistEntryInputSchema,
} from "@quorum/shared";
import type { AccountId, ProposalCategory } from "@quorum/shared";
import type { CallContext } from "../context.js";
import { GovernanceError, parseInput } from "../errors.js";
import type { EventSink, PolicyName } from "../events/types.js";
import type {
  AmountTier,
  BatchTransfer,
  PolicyCheckInput,
  PolicyConfig,
  PolicyEvaluation,
  SpendingLimit,
} from "./types.js";

const policyLogger = governanceLogger.child({ component: "policy-engine" });

const PASS: PolicyEvaluation = { allowed: true };

const MAX_TIME_LOCK_MS = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * Deep copy of a config; mutating the copy never reaches the original
 */
export function clonePolicyConfig(config: PolicyConfig): PolicyConfig {
  const { spendingLimit, whitelist, categoryGate, amountTiers, timeLockFormula } = config;
  return {
    ...config,
    spendingLimit: spendingLimit && { ...spendingLimit },
    whitelist: whitelist && {
      enabled: whitelist.enabled,
      entries: whitelist.entries.map((entry) => ({ ...entry })),
    },
    categoryGate: categoryGate && { enabled: categoryGate.enabled, allowed: [...categoryGate.allowed] },
    amountTiers: amountTiers && {
      enabled: amountTiers.enabled,
      tiers: amountTiers.tiers.map((tier) => ({ ...tier })),
    },
    timeLockFormula: timeLockFormula && { ...timeLockFormula },
  };
}

function periodExpired(limit: SpendingLimit, now: number): boolean {
  return now > limit.periodStart + SPENDING_PERIOD_MS[limit.period];
}

// ============================================
// POLICY ENGINE
// ============================================

export class PolicyEngine {
  constructor(private readonly events: EventSink) {}

  /**
   * Create a config with every sub-policy disabled
   */
  createConfig(treasuryId: string, ctx: CallContext): PolicyConfig {
    const config: PolicyConfig = {
      id: crypto.randomUUID(),
      treasuryId,
      createdAt: ctx.now,
      updatedAt: ctx.now,
    };

    policyLogger.info({ policyId: config.id, treasuryId }, "Policy config created");

    this.events.publish({
      type: "policy_created",
      entityId: config.id,
      actor: ctx.caller,
      timestamp: ctx.now,
      treasuryId,
    });

    return config;
  }

  // ============================================
  // SPENDING LIMIT
  // ============================================

  /**
   * Start a fresh spending window. The period arrives unchecked from
   * callers and is validated against the known periods.
   */
  setSpendingLimit(
    config: PolicyConfig,
    period: string,
    limit: bigint,
    ctx: CallContext
  ): void {
    const parsedPeriod = parseInput(spendingPeriodSchema, period, "InvalidPeriod", "spending period");
    const parsedLimit = parseInput(amountSchema, limit, "InvalidPolicyConfig", "spending limit");

    config.spendingLimit = {
      enabled: true,
      period: parsedPeriod,
      limit: parsedLimit,
      spent: 0n,
      periodStart: ctx.now,
    };
    this.touch(config, "spending_limit", true, ctx);
  }

  disableSpendingLimit(config: PolicyConfig, ctx: CallContext): void {
    if (config.spendingLimit) {
      config.spendingLimit.enabled = false;
    }
    this.touch(config, "spending_limit", false, ctx);
  }

  // ============================================
  // WHITELIST
  // ============================================

  /**
   * Add or replace the entry for an account. Enables the whitelist.
   */
  addToWhitelist(
    config: PolicyConfig,
    account: AccountId,
    expiresAt: number,
    description: string,
    ctx: CallContext
  ): void {
    const entry = parseInput(
      whitelistEntryInputSchema,
      { account, expiresAt, description },
      "InvalidPolicyConfig",
      "whitelist entry"
    );

    const entries = (config.whitelist?.entries ?? []).filter((e) => e.account !== entry.account);
    entries.push(entry);
    config.whitelist = { enabled: true, entries };

    this.touch(config, "whitelist", true, ctx);
  }

  removeFromWhitelist(config: PolicyConfig, account: AccountId, ctx: CallContext): void {
    const whitelist = config.whitelist;
    const index = whitelist ? whitelist.entries.findIndex((e) => e.account === account) : -1;
    if (!whitelist || index < 0) {
      throw new GovernanceError("WhitelistEntryNotFound", `No whitelist entry for ${account}`, {
        account,
      });
    }

    whitelist.entries.splice(index, 1);
    this.touch(config, "whitelist", whitelist.enabled, ctx);
  }

  setWhitelistEnabled(config: PolicyConfig, enabled: boolean, ctx: CallContext): void {
    if (config.whitelist) {
      config.whitelist.enabled = enabled;
    } else {
      config.whitelist = { enabled, entries: [] };
    }
    this.touch(config, "whitelist", enabled, ctx);
  }

  // ============================================
  // CATEGORY GATE
  // ============================================

  setAllowedCategories(
    config: PolicyConfig,
    categories: readonly ProposalCategory[],
    ctx: CallContext
  ): void {
    const allowed = parseInput(categoryListSchema, categories, "InvalidPolicyConfig", "category list");
    config.categoryGate = { enabled: true, allowed: [...new Set(allowed)] };
    this.touch(config, "category_gate", true, ctx);
  }

  disableCategoryGate(config: PolicyConfig, ctx: CallContext): void {
    if (config.categoryGate) {
      config.categoryGate.enabled = false;
    }
    this.touch(config, "category_gate", false, ctx);
  }

  // ============================================
  // AMOUNT TIERS
  // ============================================

  setAmountTiers(config: PolicyConfig, tiers: readonly AmountTier[], ctx: CallContext): void {
    const parsed = parseInput(amountTierListSchema, tiers, "InvalidPolicyConfig", "amount tiers");
    const sorted = [...parsed].sort((a, b) =>
      a.minAmount < b.minAmount ? -1 : a.minAmount > b.minAmount ? 1 : 0
    );

    config.amountTiers = { enabled: true, tiers: sorted };
    this.touch(config, "amount_tiers", true, ctx);
  }

  disableAmountTiers(config: PolicyConfig, ctx: CallContext): void {
    if (config.amountTiers) {
      config.amountTiers.enabled = false;
    }
    this.touch(config, "amount_tiers", false, ctx);
  }

  // ============================================
  // TIME-LOCK FORMULA
  // ============================================

  setTimeLockFormula(
    config: PolicyConfig,
    baseMs: number,
    amountDivisor: bigint,
    ctx: CallContext
  ): void {
    const formula = parseInput(
      timeLockFormulaInputSchema,
      { baseMs, amountDivisor },
      "InvalidPolicyConfig",
      "time-lock formula"
    );

    config.timeLockFormula = { enabled: true, ...formula };
    this.touch(config, "time_lock_formula", true, ctx);
  }

  disableTimeLockFormula(config: PolicyConfig, ctx: CallContext): void {
    if (config.timeLockFormula) {
      config.timeLockFormula.enabled = false;
    }
    this.touch(config, "time_lock_formula", false, ctx);
  }

  private touch(config: PolicyConfig, policy: PolicyName, enabled: boolean, ctx: CallContext): void {
    config.updatedAt = ctx.now;

    policyLogger.info({ policyId: config.id, policy, enabled }, "Policy updated");

    this.events.publish({
      type: "policy_updated",
      entityId: config.id,
      actor: ctx.caller,
      timestamp: ctx.now,
      treasuryId: config.treasuryId,
      policy,
      enabled,
    });
  }

  // ============================================
  // EVALUATION
  // ============================================

  /**
   * Evaluate a single transfer against every enabled sub-policy
   */
  evaluate(config: PolicyConfig, input: PolicyCheckInput, ctx: CallContext): PolicyEvaluation {
    return (
      this.checkSpending(config, input.amount, ctx.now, ctx) ??
      this.checkWhitelist(config, input.recipient, ctx.now, ctx) ??
      this.checkCategory(config, input.category) ??
      this.checkTiers(config, input.amount, input.signatureCount) ??
      PASS
    );
  }

  validateAll(
    config: PolicyConfig,
    recipient: AccountId,
    amount: bigint,
    category: ProposalCategory,
    signatureCount: number,
    ctx: CallContext
  ): boolean {
    return this.evaluate(config, { recipient, amount, category, signatureCount }, ctx).allowed;
  }

  /**
   * Evaluate a withdrawal batch. Spending and tiers are judged on the batch
   * total, the whitelist on every recipient.
   */
  evaluateBatch(
    config: PolicyConfig,
    transfers: readonly BatchTransfer[],
    category: ProposalCategory,
    signatureCount: number,
    ctx: CallContext
  ): PolicyEvaluation {
    return this.judgeBatch(config, transfers, category, signatureCount, ctx.now, ctx);
  }

  /**
   * Same verdict as evaluateBatch, but the config is left untouched and no
   * event is published. An expired spending window counts as empty.
   */
  previewBatch(
    config: PolicyConfig,
    transfers: readonly BatchTransfer[],
    category: ProposalCategory,
    signatureCount: number,
    now: number
  ): PolicyEvaluation {
    return this.judgeBatch(config, transfers, category, signatureCount, now);
  }

  /**
   * With a call context, expired windows are rolled and violations are
   * published; without one the checks only judge.
   */
  private judgeBatch(
    config: PolicyConfig,
    transfers: readonly BatchTransfer[],
    category: ProposalCategory,
    signatureCount: number,
    now: number,
    ctx?: CallContext
  ): PolicyEvaluation {
    let total = 0n;
    for (const transfer of transfers) {
      total += transfer.amount;
    }

    const spending = this.checkSpending(config, total, now, ctx);
    if (spending) return spending;

    for (const transfer of transfers) {
      const whitelist = this.checkWhitelist(config, transfer.recipient, now, ctx);
      if (whitelist) return whitelist;
    }

    return (
      this.checkCategory(config, category) ??
      this.checkTiers(config, total, signatureCount) ??
      PASS
    );
  }

  /**
   * Account for an executed amount in the current period
   */
  recordSpending(config: PolicyConfig, amount: bigint, ctx: CallContext): void {
    const limit = config.spendingLimit;
    if (!limit) return;

    this.rollPeriod(config, limit, ctx);
    limit.spent += amount;

    policyLogger.debug({
      policyId: config.id,
      amount: amount.toString(),
      spent: limit.spent.toString(),
    }, "Spending recorded");

    this.events.publish({
      type: "spending_recorded",
      entityId: config.id,
      actor: ctx.caller,
      timestamp: ctx.now,
      treasuryId: config.treasuryId,
      amount,
      spent: limit.spent,
    });
  }

  /**
   * Time-lock in ms demanded for an amount; 0 when the formula is off
   */
  calculateTimeLock(config: PolicyConfig, amount: bigint): number {
    const formula = config.timeLockFormula;
    if (!formula?.enabled) return 0;

    const timeLockMs = BigInt(formula.baseMs) + amount / formula.amountDivisor;
    if (timeLockMs > MAX_TIME_LOCK_MS) {
      throw new GovernanceError(
        "InvalidTimeLock",
        `Time-lock for amount ${amount} exceeds ${MAX_TIME_LOCK_MS}ms`,
        { amount: amount.toString(), timeLockMs: timeLockMs.toString() }
      );
    }
    return Number(timeLockMs);
  }

  /**
   * Highest signature requirement among tiers the amount reaches; 0 when
   * tiers are off or none applies
   */
  requiredSignatures(config: PolicyConfig, amount: bigint): number {
    const tiers = config.amountTiers;
    if (!tiers?.enabled) return 0;

    let required = 0;
    for (const tier of tiers.tiers) {
      if (amount >= tier.minAmount && tier.requiredSignatures > required) {
        required = tier.requiredSignatures;
      }
    }
    return required;
  }

  // ============================================
  // SUB-POLICY CHECKS
  // ============================================

  private rollPeriod(config: PolicyConfig, limit: SpendingLimit, ctx: CallContext): void {
    if (!periodExpired(limit, ctx.now)) return;

    const previousSpent = limit.spent;
    limit.spent = 0n;
    limit.periodStart = ctx.now;

    policyLogger.debug({ policyId: config.id, period: limit.period }, "Spending period reset");

    this.events.publish({
      type: "spending_reset",
      entityId: config.id,
      actor: ctx.caller,
      timestamp: ctx.now,
      treasuryId: config.treasuryId,
      period: limit.period,
      previousSpent,
    });
  }

  private checkSpending(
    config: PolicyConfig,
    amount: bigint,
    now: number,
    ctx?: CallContext
  ): PolicyEvaluation | undefined {
    const limit = config.spendingLimit;
    if (!limit?.enabled) return undefined;

    let spent: bigint;
    if (ctx) {
      this.rollPeriod(config, limit, ctx);
      spent = limit.spent;
    } else {
      spent = periodExpired(limit, now) ? 0n : limit.spent;
    }

    if (spent + amount <= limit.limit) return undefined;

    const failure: PolicyEvaluation = {
      allowed: false,
      failedPolicy: "spending_limit",
      reason: `Spending ${amount} would exceed the ${limit.period} limit (${spent}/${limit.limit} spent)`,
    };
    if (!ctx) return failure;

    policyLogger.warn({
      policyId: config.id,
      attempted: amount.toString(),
      spent: limit.spent.toString(),
      limit: limit.limit.toString(),
    }, "Spending limit exceeded");

    this.events.publish({
      type: "spending_limit_exceeded",
      entityId: config.id,
      actor: ctx.caller,
      timestamp: ctx.now,
      treasuryId: config.treasuryId,
      attempted: amount,
      spent: limit.spent,
      limit: limit.limit,
    });

    return failure;
  }

  private checkWhitelist(
    config: PolicyConfig,
    recipient: AccountId,
    now: number,
    ctx?: CallContext
  ): PolicyEvaluation | undefined {
    const whitelist = config.whitelist;
    if (!whitelist?.enabled) return undefined;

    const entry = whitelist.entries.find((e) => e.account === recipient);
    if (entry && entry.expiresAt >= now) return undefined;

    const failure: PolicyEvaluation = {
      allowed: false,
      failedPolicy: "whitelist",
      reason: entry
        ? `Whitelist entry for ${recipient} expired at ${entry.expiresAt}`
        : `Recipient ${recipient} is not whitelisted`,
    };
    if (!ctx) return failure;

    policyLogger.warn({ policyId: config.id, recipient, expired: entry !== undefined }, "Whitelist violation");

    this.events.publish({
      type: "whitelist_violation",
      entityId: config.id,
      actor: ctx.caller,
      timestamp: ctx.now,
      treasuryId: config.treasuryId,
      recipient,
    });

    return failure;
  }

  private checkCategory(config: PolicyConfig, category: ProposalCategory): PolicyEvaluation | undefined {
    const gate = config.categoryGate;
    if (!gate?.enabled || gate.allowed.includes(category)) return undefined;

    return {
      allowed: false,
      failedPolicy: "category_gate",
      reason: `Category ${category} is not allowed`,
    };
  }

  private checkTiers(
    config: PolicyConfig,
    amount: bigint,
    signatureCount: number
  ): PolicyEvaluation | undefined {
    const required = this.requiredSignatures(config, amount);
    if (signatureCount >= required) return undefined;

    return {
      allowed: false,
      failedPolicy: "amount_tiers",
      reason: `Amount ${amount} requires ${required} signatures, got ${signatureCount}`,
    };
  }
}

export function createPolicyEngine(events: EventSink): PolicyEngine {
  return new PolicyEngine(events);
}
