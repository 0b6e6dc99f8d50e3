/**
 * Proposal Engine
 *
 * Per-request state machine layered on Treasury Core:
 *
 *   pending ──sign*──> pending ──execute──> executed
 *      └───────────────cancel──────────────> cancelled
 *
 * Execution re-validates everything against the treasury's current state,
 * since the treasury may have been frozen or lost signers after creation.
 */

import * as crypto from "crypto";
import {
  accountIdSchema,
  governanceLogger,
  PROPOSAL_LIMITS,
  proposalTextSchema,
  timeLockSchema,
  transactionItemSchema,
} from "@quorum/shared";
import type { AccountId } from "@quorum/shared";
import type { CallContext } from "../context.js";
import { GovernanceError, parseInput } from "../errors.js";
import type { EventSink } from "../events/types.js";
import type { PayoutSink } from "../treasury/payout.js";
import type { Treasury } from "../treasury/treasury.js";
import type { Disbursement } from "../treasury/types.js";
import type {
  Proposal,
  ProposalAction,
  ProposalDraft,
  ReadinessResult,
  TransactionItem,
} from "./types.js";

const proposalLogger = governanceLogger.child({ component: "proposal-engine" });

// ============================================
// HELPERS
// ============================================

export function totalAmount(action: ProposalAction): bigint {
  if (action.category !== "withdrawal") return 0n;
  let total = 0n;
  for (const tx of action.transactions) {
    total += tx.amount;
  }
  return total;
}

function assertSameTreasury(proposal: Proposal, treasury: Treasury): void {
  if (proposal.treasuryId !== treasury.id) {
    throw new GovernanceError(
      "TreasuryMismatch",
      `Proposal ${proposal.id} belongs to treasury ${proposal.treasuryId}, not ${treasury.id}`,
      { proposalId: proposal.id, treasuryId: treasury.id }
    );
  }
}

function assertPending(proposal: Proposal): void {
  if (proposal.status === "executed") {
    throw new GovernanceError("AlreadyExecuted", `Proposal ${proposal.id} was already executed`);
  }
  if (proposal.status === "cancelled") {
    throw new GovernanceError("AlreadyCancelled", `Proposal ${proposal.id} was cancelled`);
  }
}

function validateTransactions(transactions: readonly TransactionItem[]): TransactionItem[] {
  if (transactions.length === 0) {
    throw new GovernanceError("EmptyTransactions", "A withdrawal needs at least one transaction");
  }
  if (transactions.length > PROPOSAL_LIMITS.maxTransactions) {
    throw new GovernanceError(
      "TooManyTransactions",
      `A withdrawal carries at most ${PROPOSAL_LIMITS.maxTransactions} transactions, got ${transactions.length}`,
      { count: transactions.length }
    );
  }
  return transactions.map((tx, index) =>
    parseInput(transactionItemSchema, tx, "InvalidTransaction", `transaction #${index}`)
  );
}

// ============================================
// PROPOSAL ENGINE
// ============================================

export class ProposalEngine {
  constructor(private readonly events: EventSink) {}

  // ============================================
  // CREATION
  // ============================================

  createWithdrawalProposal(
    treasury: Treasury,
    draft: ProposalDraft,
    transactions: readonly TransactionItem[],
    ctx: CallContext
  ): Proposal {
    this.assertCanPropose(treasury, ctx);
    const validated = validateTransactions(transactions);
    return this.create(treasury, draft, { category: "withdrawal", transactions: validated }, ctx);
  }

  createAddSignerProposal(
    treasury: Treasury,
    draft: ProposalDraft,
    signer: AccountId,
    ctx: CallContext
  ): Proposal {
    this.assertCanPropose(treasury, ctx);
    const parsed = parseInput(accountIdSchema, signer, "InvalidInput", "signer");
    return this.create(treasury, draft, { category: "add_signer", signer: parsed }, ctx);
  }

  createRemoveSignerProposal(
    treasury: Treasury,
    draft: ProposalDraft,
    signer: AccountId,
    ctx: CallContext
  ): Proposal {
    this.assertCanPropose(treasury, ctx);
    const parsed = parseInput(accountIdSchema, signer, "InvalidInput", "signer");
    return this.create(treasury, draft, { category: "remove_signer", signer: parsed }, ctx);
  }

  createUpdateThresholdProposal(
    treasury: Treasury,
    draft: ProposalDraft,
    threshold: number,
    ctx: CallContext
  ): Proposal {
    this.assertCanPropose(treasury, ctx);
    if (!Number.isInteger(threshold) || threshold < 1) {
      throw new GovernanceError("InvalidThreshold", `Threshold must be a positive integer, got ${threshold}`);
    }
    return this.create(treasury, draft, { category: "update_threshold", threshold }, ctx);
  }

  createPolicyUpdateProposal(treasury: Treasury, draft: ProposalDraft, ctx: CallContext): Proposal {
    this.assertCanPropose(treasury, ctx);
    return this.create(treasury, draft, { category: "update_policy" }, ctx);
  }

  createEmergencyProposal(treasury: Treasury, draft: ProposalDraft, ctx: CallContext): Proposal {
    this.assertCanPropose(treasury, ctx);
    return this.create(treasury, draft, { category: "emergency" }, ctx);
  }

  createGenericProposal(treasury: Treasury, draft: ProposalDraft, ctx: CallContext): Proposal {
    this.assertCanPropose(treasury, ctx);
    return this.create(treasury, draft, { category: "other" }, ctx);
  }

  private assertCanPropose(treasury: Treasury, ctx: CallContext): void {
    if (treasury.isFrozen()) {
      throw new GovernanceError("TreasuryFrozen", `Treasury ${treasury.id} is frozen`);
    }
    if (!treasury.isSigner(ctx.caller)) {
      throw new GovernanceError("NotAuthorizedSigner", `${ctx.caller} is not a signer of ${treasury.id}`, {
        caller: ctx.caller,
      });
    }
  }

  private create(
    treasury: Treasury,
    draft: ProposalDraft,
    action: ProposalAction,
    ctx: CallContext
  ): Proposal {
    const text = parseInput(
      proposalTextSchema,
      { title: draft.title, description: draft.description },
      "InvalidInput",
      "proposal text"
    );
    const timeLockMs = parseInput(timeLockSchema, draft.timeLockMs, "InvalidTimeLock", "time-lock");

    const proposal: Proposal = {
      id: crypto.randomUUID(),
      treasuryId: treasury.id,
      creator: ctx.caller,
      title: text.title,
      description: text.description,
      action,
      createdAt: ctx.now,
      timeLockUntil: ctx.now + timeLockMs,
      signatures: [],
      status: "pending",
    };

    proposalLogger.info({
      proposalId: proposal.id,
      treasuryId: treasury.id,
      category: action.category,
      creator: ctx.caller,
      timeLockUntil: proposal.timeLockUntil,
    }, "Proposal created");

    this.events.publish({
      type: "proposal_created",
      entityId: proposal.id,
      actor: ctx.caller,
      timestamp: ctx.now,
      treasuryId: treasury.id,
      category: action.category,
      title: proposal.title,
      timeLockUntil: proposal.timeLockUntil,
    });

    return proposal;
  }

  // ============================================
  // SIGN
  // ============================================

  sign(proposal: Proposal, treasury: Treasury, ctx: CallContext): Proposal {
    assertSameTreasury(proposal, treasury);
    assertPending(proposal);

    if (!treasury.isSigner(ctx.caller)) {
      throw new GovernanceError("NotAuthorizedSigner", `${ctx.caller} is not a signer of ${treasury.id}`, {
        caller: ctx.caller,
      });
    }
    if (proposal.signatures.includes(ctx.caller)) {
      throw new GovernanceError("AlreadySigned", `${ctx.caller} already signed proposal ${proposal.id}`);
    }

    proposal.signatures.push(ctx.caller);

    proposalLogger.info({
      proposalId: proposal.id,
      signer: ctx.caller,
      signatureCount: proposal.signatures.length,
      threshold: treasury.getThreshold(),
    }, "Proposal signed");

    this.events.publish({
      type: "proposal_signed",
      entityId: proposal.id,
      actor: ctx.caller,
      timestamp: ctx.now,
      treasuryId: treasury.id,
      signatureCount: proposal.signatures.length,
      threshold: treasury.getThreshold(),
    });

    return proposal;
  }

  // ============================================
  // READINESS
  // ============================================

  /**
   * Report the first execution gate that would fail, without mutating anything
   */
  isReady(proposal: Proposal, treasury: Treasury, now: number): ReadinessResult {
    if (proposal.treasuryId !== treasury.id) {
      return { ready: false, reason: "Proposal belongs to another treasury" };
    }
    if (proposal.status !== "pending") {
      return { ready: false, reason: `Invalid status: ${proposal.status}` };
    }
    if (treasury.isFrozen()) {
      return { ready: false, reason: "Treasury is frozen" };
    }
    if (now < proposal.timeLockUntil) {
      return {
        ready: false,
        reason: `Time-lock not expired. Remaining: ${Math.ceil((proposal.timeLockUntil - now) / 1000)}s`,
      };
    }
    if (proposal.signatures.length < treasury.getThreshold()) {
      return {
        ready: false,
        reason: `Insufficient signatures: ${proposal.signatures.length}/${treasury.getThreshold()}`,
      };
    }
    if (!treasury.canExecute(proposal.signatures)) {
      return { ready: false, reason: "Signatures no longer satisfy the treasury threshold" };
    }
    return { ready: true };
  }

  // ============================================
  // EXECUTE
  // ============================================

  execute(
    proposal: Proposal,
    treasury: Treasury,
    ctx: CallContext,
    payouts: PayoutSink
  ): Proposal {
    assertPending(proposal);
    assertSameTreasury(proposal, treasury);

    if (treasury.isFrozen()) {
      throw new GovernanceError("TreasuryFrozen", `Treasury ${treasury.id} is frozen`);
    }
    if (ctx.now < proposal.timeLockUntil) {
      throw new GovernanceError(
        "TimeLockNotExpired",
        `Proposal ${proposal.id} is time-locked until ${proposal.timeLockUntil}`,
        { timeLockUntil: proposal.timeLockUntil, now: ctx.now }
      );
    }
    if (proposal.signatures.length < treasury.getThreshold()) {
      throw new GovernanceError(
        "ThresholdNotMet",
        `Proposal ${proposal.id} has ${proposal.signatures.length} of ${treasury.getThreshold()} signatures`,
        { signatureCount: proposal.signatures.length, threshold: treasury.getThreshold() }
      );
    }
    if (!treasury.canExecute(proposal.signatures)) {
      throw new GovernanceError(
        "InvalidProposal",
        `Signatures on proposal ${proposal.id} no longer satisfy the treasury threshold`,
        { validSignatures: treasury.countValidSignatures(proposal.signatures) }
      );
    }

    const disbursements = this.apply(proposal, treasury, ctx);

    proposalLogger.info({
      proposalId: proposal.id,
      treasuryId: treasury.id,
      category: proposal.action.category,
      executor: ctx.caller,
    }, "Proposal executed");

    this.events.publish({
      type: "proposal_executed",
      entityId: proposal.id,
      actor: ctx.caller,
      timestamp: ctx.now,
      treasuryId: treasury.id,
      category: proposal.action.category,
      totalAmount: totalAmount(proposal.action),
    });

    // Credit last: the proposal is already executed if the sink throws
    for (const disbursement of disbursements) {
      payouts.credit(disbursement);
    }

    return proposal;
  }

  private markExecuted(proposal: Proposal, ctx: CallContext): void {
    proposal.status = "executed";
    proposal.executedAt = ctx.now;
    proposal.executedBy = ctx.caller;
  }

  /**
   * Apply the action and mark the proposal executed. Signer and threshold
   * mutators validate before mutating, so their rejections leave the
   * proposal pending. A withdrawal is marked executed before its first
   * debit; the batch precheck guarantees every debit succeeds.
   */
  private apply(proposal: Proposal, treasury: Treasury, ctx: CallContext): Disbursement[] {
    const action = proposal.action;
    switch (action.category) {
      case "withdrawal": {
        const total = totalAmount(action);
        if (total > treasury.getBalance()) {
          throw new GovernanceError(
            "InsufficientBalance",
            `Batch total ${total} exceeds balance ${treasury.getBalance()}`,
            { total: total.toString(), balance: treasury.getBalance().toString() }
          );
        }
        this.markExecuted(proposal, ctx);
        const disbursements: Disbursement[] = [];
        for (const tx of action.transactions) {
          disbursements.push(treasury.withdraw(tx.amount, tx.recipient, ctx));
        }
        return disbursements;
      }
      case "add_signer":
        treasury.addSigner(action.signer, ctx);
        break;
      case "remove_signer":
        treasury.removeSigner(action.signer, ctx);
        break;
      case "update_threshold":
        treasury.updateThreshold(action.threshold, ctx);
        break;
      case "update_policy":
      case "emergency":
      case "other":
        // Recorded decisions; the integrator acts on the executed record
        break;
    }
    this.markExecuted(proposal, ctx);
    return [];
  }

  // ============================================
  // CANCEL
  // ============================================

  /**
   * Cancel a pending proposal. The creator may always cancel; anyone else
   * only once every current signer has signed.
   */
  cancel(proposal: Proposal, treasury: Treasury, ctx: CallContext): Proposal {
    assertPending(proposal);
    assertSameTreasury(proposal, treasury);

    const isCreator = proposal.creator === ctx.caller;
    const unanimous = proposal.signatures.length === treasury.getSignerCount();
    if (!isCreator && !unanimous) {
      throw new GovernanceError(
        "NotProposalCreator",
        `${ctx.caller} did not create proposal ${proposal.id}`,
        { caller: ctx.caller, creator: proposal.creator }
      );
    }

    proposal.status = "cancelled";
    proposal.cancelledAt = ctx.now;
    proposal.cancelledBy = ctx.caller;

    proposalLogger.info({
      proposalId: proposal.id,
      cancelledBy: ctx.caller,
      unanimous,
    }, "Proposal cancelled");

    this.events.publish({
      type: "proposal_cancelled",
      entityId: proposal.id,
      actor: ctx.caller,
      timestamp: ctx.now,
      treasuryId: treasury.id,
      signatureCount: proposal.signatures.length,
    });

    return proposal;
  }
}

export function createProposalEngine(events: EventSink): ProposalEngine {
  return new ProposalEngine(events);
}
