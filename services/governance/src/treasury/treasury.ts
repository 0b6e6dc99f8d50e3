/**
 * Treasury Core
 *
 * Owns the fund balance, the authorized signer set, the approval threshold
 * and the frozen flag. Mutators validate completely before touching state;
 * a rejected call leaves the treasury unchanged and publishes nothing.
 *
 * Invariants:
 * - signers is non-empty and duplicate-free
 * - 1 <= threshold <= signers.length
 * - balance >= 0
 */

import * as crypto from "crypto";
import { accountIdSchema, governanceLogger, signerListSchema } from "@quorum/shared";
import type { AccountId } from "@quorum/shared";
import type { CallContext } from "../context.js";
import { GovernanceError, parseInput } from "../errors.js";
import type { EventSink } from "../events/types.js";
import type { Disbursement, EmergencyNotice, TreasurySnapshot } from "./types.js";

const treasuryLogger = governanceLogger.child({ component: "treasury" });

// ============================================
// VALIDATION HELPERS
// ============================================

export function findDuplicate(accounts: readonly AccountId[]): AccountId | undefined {
  const seen = new Set<AccountId>();
  for (const account of accounts) {
    if (seen.has(account)) return account;
    seen.add(account);
  }
  return undefined;
}

function assertThreshold(threshold: number, signerCount: number): void {
  if (!Number.isInteger(threshold) || threshold < 1 || threshold > signerCount) {
    throw new GovernanceError(
      "InvalidThreshold",
      `Threshold must be an integer between 1 and ${signerCount}, got ${threshold}`,
      { threshold, signerCount }
    );
  }
}

function assertPositive(amount: bigint): void {
  if (amount <= 0n) {
    throw new GovernanceError("InvalidAmount", `Amount must be positive, got ${amount}`, {
      amount: amount.toString(),
    });
  }
}

// ============================================
// TREASURY
// ============================================

export class Treasury {
  readonly id: string;
  readonly createdAt: number;

  private readonly signers: AccountId[];
  private threshold: number;
  private balance: bigint = 0n;
  private frozen = false;
  private totalDeposited: bigint = 0n;
  private totalWithdrawn: bigint = 0n;
  private emergencyNotice?: EmergencyNotice;

  private constructor(
    id: string,
    signers: AccountId[],
    threshold: number,
    createdAt: number,
    private readonly events: EventSink
  ) {
    this.id = id;
    this.signers = signers;
    this.threshold = threshold;
    this.createdAt = createdAt;
  }

  /**
   * Create a treasury with an initial signer set and threshold
   */
  static create(
    signers: readonly AccountId[],
    threshold: number,
    ctx: CallContext,
    events: EventSink,
    id: string = crypto.randomUUID()
  ): Treasury {
    const parsedSigners = parseInput(signerListSchema, signers, "InvalidInput", "signer list");

    if (parsedSigners.length === 0) {
      throw new GovernanceError("InvalidSignerCount", "A treasury needs at least one signer");
    }
    assertThreshold(threshold, parsedSigners.length);

    const duplicate = findDuplicate(parsedSigners);
    if (duplicate !== undefined) {
      throw new GovernanceError("DuplicateSigner", `Signer listed twice: ${duplicate}`, {
        signer: duplicate,
      });
    }

    const treasury = new Treasury(id, [...parsedSigners], threshold, ctx.now, events);

    treasuryLogger.info({
      treasuryId: id,
      signerCount: parsedSigners.length,
      threshold,
      creator: ctx.caller,
    }, "Treasury created");

    events.publish({
      type: "treasury_created",
      entityId: id,
      actor: ctx.caller,
      timestamp: ctx.now,
      signers: [...parsedSigners],
      threshold,
    });

    return treasury;
  }

  // ============================================
  // QUERIES
  // ============================================

  getSigners(): readonly AccountId[] {
    return [...this.signers];
  }

  getSignerCount(): number {
    return this.signers.length;
  }

  getThreshold(): number {
    return this.threshold;
  }

  getBalance(): bigint {
    return this.balance;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  isSigner(account: AccountId): boolean {
    return this.signers.includes(account);
  }

  /**
   * Number of distinct signatures that belong to current signers
   */
  countValidSignatures(signatures: readonly AccountId[]): number {
    const counted = new Set<AccountId>();
    for (const signature of signatures) {
      if (this.isSigner(signature)) {
        counted.add(signature);
      }
    }
    return counted.size;
  }

  /**
   * Whether a signature set authorizes an action right now.
   * Repeated signatures count once; non-signers count zero.
   */
  canExecute(signatures: readonly AccountId[]): boolean {
    if (this.frozen) return false;
    if (signatures.length < this.threshold) return false;
    return this.countValidSignatures(signatures) >= this.threshold;
  }

  snapshot(): TreasurySnapshot {
    return {
      id: this.id,
      signers: [...this.signers],
      threshold: this.threshold,
      balance: this.balance,
      frozen: this.frozen,
      totalDeposited: this.totalDeposited,
      totalWithdrawn: this.totalWithdrawn,
      createdAt: this.createdAt,
      emergencyNotice: this.emergencyNotice ? { ...this.emergencyNotice } : undefined,
    };
  }

  // ============================================
  // FUNDS
  // ============================================

  /**
   * Deposits are accepted whether or not the treasury is frozen
   */
  deposit(amount: bigint, ctx: CallContext): bigint {
    assertPositive(amount);

    this.balance += amount;
    this.totalDeposited += amount;

    treasuryLogger.info({
      treasuryId: this.id,
      depositor: ctx.caller,
      amount: amount.toString(),
      balance: this.balance.toString(),
    }, "Deposit received");

    this.events.publish({
      type: "deposit",
      entityId: this.id,
      actor: ctx.caller,
      timestamp: ctx.now,
      amount,
      balance: this.balance,
    });

    return this.balance;
  }

  /**
   * Debit the balance for a recipient.
   *
   * Privileged: only the proposal and emergency layers call this, after
   * their own authorization gates have passed.
   */
  withdraw(amount: bigint, recipient: AccountId, ctx: CallContext): Disbursement {
    if (this.frozen) {
      throw new GovernanceError("TreasuryFrozen", `Treasury ${this.id} is frozen`);
    }
    assertPositive(amount);
    if (amount > this.balance) {
      throw new GovernanceError(
        "InsufficientBalance",
        `Withdrawal of ${amount} exceeds balance ${this.balance}`,
        { amount: amount.toString(), balance: this.balance.toString() }
      );
    }

    this.balance -= amount;
    this.totalWithdrawn += amount;

    treasuryLogger.info({
      treasuryId: this.id,
      recipient,
      amount: amount.toString(),
      balance: this.balance.toString(),
    }, "Withdrawal applied");

    this.events.publish({
      type: "withdrawal",
      entityId: this.id,
      actor: ctx.caller,
      timestamp: ctx.now,
      recipient,
      amount,
      balance: this.balance,
    });

    return { treasuryId: this.id, recipient, amount, at: ctx.now };
  }

  // ============================================
  // FREEZE
  // ============================================

  /**
   * Unconditional flag flip. Who may freeze is decided by the caller's layer.
   */
  freeze(ctx: CallContext, reason?: string): void {
    this.frozen = true;

    treasuryLogger.warn({ treasuryId: this.id, actor: ctx.caller, reason }, "Treasury frozen");

    this.events.publish({
      type: "treasury_frozen",
      entityId: this.id,
      actor: ctx.caller,
      timestamp: ctx.now,
      reason,
    });
  }

  unfreeze(ctx: CallContext): void {
    this.frozen = false;

    treasuryLogger.info({ treasuryId: this.id, actor: ctx.caller }, "Treasury unfrozen");

    this.events.publish({
      type: "treasury_unfrozen",
      entityId: this.id,
      actor: ctx.caller,
      timestamp: ctx.now,
    });
  }

  /**
   * Record that an emergency was declared against this treasury
   */
  noteEmergency(reason: string, ctx: CallContext): void {
    this.emergencyNotice = { reason, at: ctx.now };

    this.events.publish({
      type: "emergency_notice",
      entityId: this.id,
      actor: ctx.caller,
      timestamp: ctx.now,
      reason,
    });
  }

  // ============================================
  // SIGNERS & THRESHOLD
  // ============================================

  addSigner(signer: AccountId, ctx: CallContext): void {
    const parsed = parseInput(accountIdSchema, signer, "InvalidInput", "signer");
    if (this.isSigner(parsed)) {
      throw new GovernanceError("SignerAlreadyExists", `Already a signer: ${parsed}`, {
        signer: parsed,
      });
    }

    this.signers.push(parsed);

    treasuryLogger.info({
      treasuryId: this.id,
      signer: parsed,
      signerCount: this.signers.length,
    }, "Signer added");

    this.events.publish({
      type: "signer_added",
      entityId: this.id,
      actor: ctx.caller,
      timestamp: ctx.now,
      signer: parsed,
      signerCount: this.signers.length,
    });
  }

  /**
   * Remove a signer. When the remaining count drops below the threshold the
   * threshold is lowered to the new count.
   */
  removeSigner(signer: AccountId, ctx: CallContext): void {
    if (this.signers.length <= 1) {
      throw new GovernanceError("CannotRemoveLastSigner", "Cannot remove the last signer");
    }
    const index = this.signers.indexOf(signer);
    if (index < 0) {
      throw new GovernanceError("SignerNotFound", `Not a signer: ${signer}`, { signer });
    }

    this.signers.splice(index, 1);

    const thresholdAdjusted = this.threshold > this.signers.length;
    if (thresholdAdjusted) {
      this.threshold = this.signers.length;
    }

    treasuryLogger.info({
      treasuryId: this.id,
      signer,
      signerCount: this.signers.length,
      threshold: this.threshold,
      thresholdAdjusted,
    }, "Signer removed");

    this.events.publish({
      type: "signer_removed",
      entityId: this.id,
      actor: ctx.caller,
      timestamp: ctx.now,
      signer,
      signerCount: this.signers.length,
      threshold: this.threshold,
      thresholdAdjusted,
    });
  }

  updateThreshold(threshold: number, ctx: CallContext): void {
    assertThreshold(threshold, this.signers.length);

    const previousThreshold = this.threshold;
    this.threshold = threshold;

    treasuryLogger.info({
      treasuryId: this.id,
      previousThreshold,
      threshold,
    }, "Threshold updated");

    this.events.publish({
      type: "threshold_updated",
      entityId: this.id,
      actor: ctx.caller,
      timestamp: ctx.now,
      previousThreshold,
      threshold,
    });
  }
}

export function createTreasury(
  signers: readonly AccountId[],
  threshold: number,
  ctx: CallContext,
  events: EventSink
): Treasury {
  return Treasury.create(signers, threshold, ctx, events);
}
