/**
 * Governance Service
 *
 * Facade over the treasury, proposal, policy and emergency engines.
 * Resolves ids through the store, forwards the call context, and composes
 * policy checks into withdrawal proposals:
 * - creation: effective time-lock = max(requested, policy formula)
 * - execution: the batch must pass the policy when enforcement is on
 * - after execution: the batch total is recorded against the spending limit
 */

import type { AccountId, ProposalCategory, SpendingPeriod } from "@quorum/shared";
import { governanceLogger } from "@quorum/shared";
import { loadGovernanceConfig, type GovernanceConfig } from "../config.js";
import type { CallContext } from "../context.js";
import { cloneEmergencyConfig, EmergencyEngine } from "../emergency/emergency-engine.js";
import type { EmergencyAuditEntry, EmergencyConfig } from "../emergency/types.js";
import { GovernanceError, isGovernanceError } from "../errors.js";
import { GovernanceEventBus } from "../events/event-bus.js";
import type { GovernanceEvent, GovernanceEventType } from "../events/types.js";
import { clonePolicyConfig, PolicyEngine } from "../policy/policy-engine.js";
import type { AmountTier, PolicyCheckInput, PolicyConfig, PolicyEvaluation } from "../policy/types.js";
import { ProposalEngine, totalAmount } from "../proposal/proposal-engine.js";
import type { Proposal, ProposalDraft, ReadinessResult, TransactionItem } from "../proposal/types.js";
import { GovernanceStore } from "../store/governance-store.js";
import { createInMemoryPayoutLedger, type PayoutSink } from "../treasury/payout.js";
import { Treasury } from "../treasury/treasury.js";
import type { TreasurySnapshot } from "../treasury/types.js";
import type { GovernanceServiceOptions, ProposalQuery, ProposalRequest } from "./types.js";

const serviceLogger = governanceLogger.child({ component: "governance-service" });

function copyProposal(proposal: Proposal): Proposal {
  return { ...proposal, signatures: [...proposal.signatures] };
}

// ============================================
// GOVERNANCE SERVICE
// ============================================

export class GovernanceService {
  readonly config: GovernanceConfig;
  readonly events: GovernanceEventBus;

  private readonly store: GovernanceStore;
  private readonly payouts: PayoutSink;
  private readonly proposals: ProposalEngine;
  private readonly policies: PolicyEngine;
  private readonly emergencies: EmergencyEngine;

  constructor(options: GovernanceServiceOptions = {}) {
    this.config = loadGovernanceConfig(options.env, options.config);
    this.events = options.events ?? new GovernanceEventBus(this.config.eventHistoryLimit);
    this.store = options.store ?? new GovernanceStore();
    this.payouts = options.payouts ?? createInMemoryPayoutLedger();

    this.proposals = new ProposalEngine(this.events);
    this.policies = new PolicyEngine(this.events);
    this.emergencies = new EmergencyEngine(this.events, this.config.emergencyCooldownMs);

    serviceLogger.info({
      policyEnforcement: this.config.policyEnforcement,
      defaultTimeLockMs: this.config.defaultTimeLockMs,
      emergencyCooldownMs: this.config.emergencyCooldownMs,
    }, "GovernanceService initialized");
  }

  /**
   * Run a call, logging rejections before they propagate
   */
  private guard<T>(operation: string, ctx: CallContext, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (isGovernanceError(error)) {
        serviceLogger.warn({
          operation,
          code: error.code,
          kind: error.kind,
          caller: ctx.caller,
          details: error.details,
        }, error.message);
      }
      throw error;
    }
  }

  private requireSigner(treasury: Treasury, ctx: CallContext): void {
    if (!treasury.isSigner(ctx.caller)) {
      throw new GovernanceError("NotAuthorizedSigner", `${ctx.caller} is not a signer of ${treasury.id}`, {
        caller: ctx.caller,
      });
    }
  }

  private requirePolicy(treasuryId: string): PolicyConfig {
    const config = this.store.findPolicyByTreasury(treasuryId);
    if (!config) {
      throw new GovernanceError("EntityNotFound", `No policy config for treasury ${treasuryId}`, {
        kind: "PolicyConfig",
        treasuryId,
      });
    }
    return config;
  }

  private requireEmergency(treasuryId: string): EmergencyConfig {
    const config = this.store.findEmergencyByTreasury(treasuryId);
    if (!config) {
      throw new GovernanceError("EntityNotFound", `No emergency config for treasury ${treasuryId}`, {
        kind: "EmergencyConfig",
        treasuryId,
      });
    }
    return config;
  }

  private draft(request: ProposalRequest, minimumTimeLockMs = 0): ProposalDraft {
    const requested = request.timeLockMs ?? this.config.defaultTimeLockMs;
    return {
      title: request.title,
      description: request.description ?? "",
      timeLockMs: Math.max(requested, minimumTimeLockMs),
    };
  }

  // ============================================
  // TREASURY
  // ============================================

  createTreasury(signers: readonly AccountId[], threshold: number, ctx: CallContext): TreasurySnapshot {
    return this.guard("createTreasury", ctx, () => {
      const treasury = Treasury.create(signers, threshold, ctx, this.events);
      this.store.treasuries.insert(treasury);
      return treasury.snapshot();
    });
  }

  deposit(treasuryId: string, amount: bigint, ctx: CallContext): bigint {
    return this.guard("deposit", ctx, () =>
      this.store.treasuries.require(treasuryId).deposit(amount, ctx)
    );
  }

  getTreasury(treasuryId: string): TreasurySnapshot {
    return this.store.treasuries.require(treasuryId).snapshot();
  }

  listTreasuries(): TreasurySnapshot[] {
    return this.store.treasuries.list().map((treasury) => treasury.snapshot());
  }

  /**
   * Remove a treasury together with its configs and settled proposals.
   * The balance must be zero and no proposal may be pending.
   */
  destroyTreasury(treasuryId: string, ctx: CallContext): void {
    this.guard("destroyTreasury", ctx, () => {
      const treasury = this.store.treasuries.require(treasuryId);
      this.requireSigner(treasury, ctx);

      if (treasury.getBalance() > 0n) {
        throw new GovernanceError("TreasuryNotEmpty", `Treasury ${treasuryId} still holds ${treasury.getBalance()}`, {
          balance: treasury.getBalance().toString(),
        });
      }
      const related = this.store.proposalsForTreasury(treasuryId);
      const pending = related.filter((proposal) => proposal.status === "pending");
      if (pending.length > 0) {
        throw new GovernanceError("PendingProposalsExist", `Treasury ${treasuryId} has ${pending.length} pending proposals`, {
          pending: pending.map((proposal) => proposal.id),
        });
      }

      for (const proposal of related) {
        this.store.proposals.delete(proposal.id);
      }
      const policy = this.store.findPolicyByTreasury(treasuryId);
      if (policy) this.store.policies.delete(policy.id);
      const emergency = this.store.findEmergencyByTreasury(treasuryId);
      if (emergency) this.store.emergencies.delete(emergency.id);
      this.store.treasuries.delete(treasuryId);

      serviceLogger.info({ treasuryId, actor: ctx.caller, proposals: related.length }, "Treasury destroyed");
    });
  }

  // ============================================
  // PROPOSALS
  // ============================================

  proposeWithdrawal(
    treasuryId: string,
    request: ProposalRequest,
    transactions: readonly TransactionItem[],
    ctx: CallContext
  ): Proposal {
    return this.guard("proposeWithdrawal", ctx, () => {
      const treasury = this.store.treasuries.require(treasuryId);

      let minimumTimeLockMs = 0;
      const policy = this.store.findPolicyByTreasury(treasuryId);
      if (policy) {
        let total = 0n;
        for (const tx of transactions) total += tx.amount;
        minimumTimeLockMs = this.policies.calculateTimeLock(policy, total);
      }

      const proposal = this.proposals.createWithdrawalProposal(
        treasury,
        this.draft(request, minimumTimeLockMs),
        transactions,
        ctx
      );
      this.store.proposals.insert(proposal);
      return copyProposal(proposal);
    });
  }

  proposeAddSigner(treasuryId: string, request: ProposalRequest, signer: AccountId, ctx: CallContext): Proposal {
    return this.guard("proposeAddSigner", ctx, () => {
      const treasury = this.store.treasuries.require(treasuryId);
      const proposal = this.proposals.createAddSignerProposal(treasury, this.draft(request), signer, ctx);
      this.store.proposals.insert(proposal);
      return copyProposal(proposal);
    });
  }

  proposeRemoveSigner(treasuryId: string, request: ProposalRequest, signer: AccountId, ctx: CallContext): Proposal {
    return this.guard("proposeRemoveSigner", ctx, () => {
      const treasury = this.store.treasuries.require(treasuryId);
      const proposal = this.proposals.createRemoveSignerProposal(treasury, this.draft(request), signer, ctx);
      this.store.proposals.insert(proposal);
      return copyProposal(proposal);
    });
  }

  proposeThresholdUpdate(treasuryId: string, request: ProposalRequest, threshold: number, ctx: CallContext): Proposal {
    return this.guard("proposeThresholdUpdate", ctx, () => {
      const treasury = this.store.treasuries.require(treasuryId);
      const proposal = this.proposals.createUpdateThresholdProposal(treasury, this.draft(request), threshold, ctx);
      this.store.proposals.insert(proposal);
      return copyProposal(proposal);
    });
  }

  proposePolicyUpdate(treasuryId: string, request: ProposalRequest, ctx: CallContext): Proposal {
    return this.guard("proposePolicyUpdate", ctx, () => {
      const treasury = this.store.treasuries.require(treasuryId);
      const proposal = this.proposals.createPolicyUpdateProposal(treasury, this.draft(request), ctx);
      this.store.proposals.insert(proposal);
      return copyProposal(proposal);
    });
  }

  proposeEmergency(treasuryId: string, request: ProposalRequest, ctx: CallContext): Proposal {
    return this.guard("proposeEmergency", ctx, () => {
      const treasury = this.store.treasuries.require(treasuryId);
      const proposal = this.proposals.createEmergencyProposal(treasury, this.draft(request), ctx);
      this.store.proposals.insert(proposal);
      return copyProposal(proposal);
    });
  }

  proposeGeneric(treasuryId: string, request: ProposalRequest, ctx: CallContext): Proposal {
    return this.guard("proposeGeneric", ctx, () => {
      const treasury = this.store.treasuries.require(treasuryId);
      const proposal = this.proposals.createGenericProposal(treasury, this.draft(request), ctx);
      this.store.proposals.insert(proposal);
      return copyProposal(proposal);
    });
  }

  signProposal(proposalId: string, ctx: CallContext): Proposal {
    return this.guard("signProposal", ctx, () => {
      const proposal = this.store.proposals.require(proposalId);
      const treasury = this.store.treasuries.require(proposal.treasuryId);
      return copyProposal(this.proposals.sign(proposal, treasury, ctx));
    });
  }

  executeProposal(proposalId: string, ctx: CallContext): Proposal {
    return this.guard("executeProposal", ctx, () => {
      const proposal = this.store.proposals.require(proposalId);
      const treasury = this.store.treasuries.require(proposal.treasuryId);
      const action = proposal.action;
      const policy = this.store.findPolicyByTreasury(treasury.id);

      // Policy is judged only once every other gate passes, and only as a
      // preview: a rejected call leaves the config and event history as
      // they were. The window is rolled by recordSpending after success.
      if (
        action.category === "withdrawal" &&
        policy &&
        this.config.policyEnforcement &&
        this.proposals.isReady(proposal, treasury, ctx.now).ready
      ) {
        const total = totalAmount(action);
        if (total > treasury.getBalance()) {
          throw new GovernanceError(
            "InsufficientBalance",
            `Batch total ${total} exceeds balance ${treasury.getBalance()}`,
            { total: total.toString(), balance: treasury.getBalance().toString() }
          );
        }

        const evaluation = this.policies.previewBatch(
          policy,
          action.transactions,
          action.category,
          treasury.countValidSignatures(proposal.signatures),
          ctx.now
        );
        if (!evaluation.allowed) {
          throw new GovernanceError("PolicyViolation", evaluation.reason ?? "Policy rejected the withdrawal", {
            proposalId,
            failedPolicy: evaluation.failedPolicy,
          });
        }
      }

      const wasPending = proposal.status === "pending";
      try {
        this.proposals.execute(proposal, treasury, ctx, this.payouts);
      } finally {
        // A payout sink failure still leaves the batch debited
        if (action.category === "withdrawal" && policy && wasPending && proposal.status === "executed") {
          this.policies.recordSpending(policy, totalAmount(action), ctx);
        }
      }

      return copyProposal(proposal);
    });
  }

  cancelProposal(proposalId: string, ctx: CallContext): Proposal {
    return this.guard("cancelProposal", ctx, () => {
      const proposal = this.store.proposals.require(proposalId);
      const treasury = this.store.treasuries.require(proposal.treasuryId);
      return copyProposal(this.proposals.cancel(proposal, treasury, ctx));
    });
  }

  getProposalReadiness(proposalId: string, now: number): ReadinessResult {
    const proposal = this.store.proposals.require(proposalId);
    const treasury = this.store.treasuries.require(proposal.treasuryId);
    return this.proposals.isReady(proposal, treasury, now);
  }

  getProposal(proposalId: string): Proposal {
    return copyProposal(this.store.proposals.require(proposalId));
  }

  listProposals(query: ProposalQuery = {}): Proposal[] {
    return this.store.proposals
      .list(
        (proposal) =>
          (query.treasuryId === undefined || proposal.treasuryId === query.treasuryId) &&
          (query.status === undefined || proposal.status === query.status) &&
          (query.creator === undefined || proposal.creator === query.creator)
      )
      .sort((a, b) => a.createdAt - b.createdAt)
      .map(copyProposal);
  }

  /**
   * Remove a settled proposal. Pending proposals must be executed or
   * cancelled first.
   */
  destroyProposal(proposalId: string, ctx: CallContext): void {
    this.guard("destroyProposal", ctx, () => {
      const proposal = this.store.proposals.require(proposalId);
      const treasury = this.store.treasuries.require(proposal.treasuryId);
      this.requireSigner(treasury, ctx);
      if (proposal.status === "pending") {
        throw new GovernanceError("ProposalStillPending", `Proposal ${proposalId} is still pending`);
      }
      this.store.proposals.delete(proposalId);
    });
  }

  // ============================================
  // POLICIES
  // ============================================

  createPolicyConfig(treasuryId: string, ctx: CallContext): PolicyConfig {
    return this.guard("createPolicyConfig", ctx, () => {
      const treasury = this.store.treasuries.require(treasuryId);
      this.requireSigner(treasury, ctx);
      if (this.store.findPolicyByTreasury(treasuryId)) {
        throw new GovernanceError("ConfigAlreadyExists", `Treasury ${treasuryId} already has a policy config`);
      }
      return clonePolicyConfig(this.store.policies.insert(this.policies.createConfig(treasuryId, ctx)));
    });
  }

  /**
   * Resolve the treasury's policy config for a signer and apply a change
   */
  private configurePolicy(
    operation: string,
    treasuryId: string,
    ctx: CallContext,
    change: (config: PolicyConfig) => void
  ): void {
    this.guard(operation, ctx, () => {
      this.requireSigner(this.store.treasuries.require(treasuryId), ctx);
      change(this.requirePolicy(treasuryId));
    });
  }

  setSpendingLimit(treasuryId: string, period: SpendingPeriod, limit: bigint, ctx: CallContext): void {
    this.configurePolicy("setSpendingLimit", treasuryId, ctx, (config) =>
      this.policies.setSpendingLimit(config, period, limit, ctx)
    );
  }

  disableSpendingLimit(treasuryId: string, ctx: CallContext): void {
    this.configurePolicy("disableSpendingLimit", treasuryId, ctx, (config) =>
      this.policies.disableSpendingLimit(config, ctx)
    );
  }

  addToWhitelist(
    treasuryId: string,
    account: AccountId,
    expiresAt: number,
    description: string,
    ctx: CallContext
  ): void {
    this.configurePolicy("addToWhitelist", treasuryId, ctx, (config) =>
      this.policies.addToWhitelist(config, account, expiresAt, description, ctx)
    );
  }

  removeFromWhitelist(treasuryId: string, account: AccountId, ctx: CallContext): void {
    this.configurePolicy("removeFromWhitelist", treasuryId, ctx, (config) =>
      this.policies.removeFromWhitelist(config, account, ctx)
    );
  }

  setWhitelistEnabled(treasuryId: string, enabled: boolean, ctx: CallContext): void {
    this.configurePolicy("setWhitelistEnabled", treasuryId, ctx, (config) =>
      this.policies.setWhitelistEnabled(config, enabled, ctx)
    );
  }

  setAllowedCategories(treasuryId: string, categories: readonly ProposalCategory[], ctx: CallContext): void {
    this.configurePolicy("setAllowedCategories", treasuryId, ctx, (config) =>
      this.policies.setAllowedCategories(config, categories, ctx)
    );
  }

  disableCategoryGate(treasuryId: string, ctx: CallContext): void {
    this.configurePolicy("disableCategoryGate", treasuryId, ctx, (config) =>
      this.policies.disableCategoryGate(config, ctx)
    );
  }

  setAmountTiers(treasuryId: string, tiers: readonly AmountTier[], ctx: CallContext): void {
    this.configurePolicy("setAmountTiers", treasuryId, ctx, (config) =>
      this.policies.setAmountTiers(config, tiers, ctx)
    );
  }

  disableAmountTiers(treasuryId: string, ctx: CallContext): void {
    this.configurePolicy("disableAmountTiers", treasuryId, ctx, (config) =>
      this.policies.disableAmountTiers(config, ctx)
    );
  }

  setTimeLockFormula(treasuryId: string, baseMs: number, amountDivisor: bigint, ctx: CallContext): void {
    this.configurePolicy("setTimeLockFormula", treasuryId, ctx, (config) =>
      this.policies.setTimeLockFormula(config, baseMs, amountDivisor, ctx)
    );
  }

  disableTimeLockFormula(treasuryId: string, ctx: CallContext): void {
    this.configurePolicy("disableTimeLockFormula", treasuryId, ctx, (config) =>
      this.policies.disableTimeLockFormula(config, ctx)
    );
  }

  /**
   * Dry-run a transfer against the treasury's policy without touching the
   * config; passes when the treasury has no policy config
   */
  evaluateTransfer(treasuryId: string, input: PolicyCheckInput, ctx: CallContext): PolicyEvaluation {
    return this.guard("evaluateTransfer", ctx, () => {
      this.store.treasuries.require(treasuryId);
      const policy = this.store.findPolicyByTreasury(treasuryId);
      if (!policy) return { allowed: true };
      return this.policies.previewBatch(
        policy,
        [{ recipient: input.recipient, amount: input.amount }],
        input.category,
        input.signatureCount,
        ctx.now
      );
    });
  }

  getPolicyConfig(treasuryId: string): PolicyConfig | undefined {
    const config = this.store.findPolicyByTreasury(treasuryId);
    return config && clonePolicyConfig(config);
  }

  destroyPolicyConfig(treasuryId: string, ctx: CallContext): void {
    this.guard("destroyPolicyConfig", ctx, () => {
      this.requireSigner(this.store.treasuries.require(treasuryId), ctx);
      const config = this.requirePolicy(treasuryId);
      this.store.policies.delete(config.id);
      serviceLogger.info({ treasuryId, policyId: config.id, actor: ctx.caller }, "Policy config destroyed");
    });
  }

  // ============================================
  // EMERGENCY
  // ============================================

  createEmergencyConfig(
    treasuryId: string,
    signers: readonly AccountId[],
    threshold: number,
    ctx: CallContext,
    cooldownMs?: number
  ): EmergencyConfig {
    return this.guard("createEmergencyConfig", ctx, () => {
      const treasury = this.store.treasuries.require(treasuryId);
      this.requireSigner(treasury, ctx);
      if (this.store.findEmergencyByTreasury(treasuryId)) {
        throw new GovernanceError("ConfigAlreadyExists", `Treasury ${treasuryId} already has an emergency config`);
      }
      return cloneEmergencyConfig(
        this.store.emergencies.insert(this.emergencies.create(treasuryId, signers, threshold, ctx, cooldownMs))
      );
    });
  }

  emergencyFreeze(treasuryId: string, reason: string, signatures: readonly AccountId[], ctx: CallContext): void {
    this.guard("emergencyFreeze", ctx, () => {
      const treasury = this.store.treasuries.require(treasuryId);
      this.emergencies.freeze(this.requireEmergency(treasuryId), treasury, reason, signatures, ctx);
    });
  }

  triggerEmergency(treasuryId: string, reason: string, signatures: readonly AccountId[], ctx: CallContext): void {
    this.guard("triggerEmergency", ctx, () => {
      const treasury = this.store.treasuries.require(treasuryId);
      this.emergencies.triggerEmergency(this.requireEmergency(treasuryId), treasury, reason, signatures, ctx);
    });
  }

  emergencyUnfreeze(treasuryId: string, signatures: readonly AccountId[], ctx: CallContext): void {
    this.guard("emergencyUnfreeze", ctx, () => {
      const treasury = this.store.treasuries.require(treasuryId);
      this.emergencies.unfreeze(this.requireEmergency(treasuryId), treasury, signatures, ctx);
    });
  }

  addEmergencySigner(treasuryId: string, signer: AccountId, signatures: readonly AccountId[], ctx: CallContext): void {
    this.guard("addEmergencySigner", ctx, () => {
      this.emergencies.addSigner(this.requireEmergency(treasuryId), signer, signatures, ctx);
    });
  }

  removeEmergencySigner(treasuryId: string, signer: AccountId, signatures: readonly AccountId[], ctx: CallContext): void {
    this.guard("removeEmergencySigner", ctx, () => {
      this.emergencies.removeSigner(this.requireEmergency(treasuryId), signer, signatures, ctx);
    });
  }

  updateEmergencyThreshold(
    treasuryId: string,
    threshold: number,
    signatures: readonly AccountId[],
    ctx: CallContext
  ): void {
    this.guard("updateEmergencyThreshold", ctx, () => {
      this.emergencies.updateThreshold(this.requireEmergency(treasuryId), threshold, signatures, ctx);
    });
  }

  getEmergencyConfig(treasuryId: string): EmergencyConfig | undefined {
    const config = this.store.findEmergencyByTreasury(treasuryId);
    return config && cloneEmergencyConfig(config);
  }

  getEmergencyCooldownRemaining(treasuryId: string, now: number): number {
    return this.emergencies.cooldownRemaining(this.requireEmergency(treasuryId), now);
  }

  getEmergencyAuditLog(treasuryId: string): readonly EmergencyAuditEntry[] {
    return this.emergencies.getAuditLog(this.requireEmergency(treasuryId));
  }

  destroyEmergencyConfig(treasuryId: string, ctx: CallContext): void {
    this.guard("destroyEmergencyConfig", ctx, () => {
      this.requireSigner(this.store.treasuries.require(treasuryId), ctx);
      const config = this.requireEmergency(treasuryId);
      this.store.emergencies.delete(config.id);
      serviceLogger.info({ treasuryId, configId: config.id, actor: ctx.caller }, "Emergency config destroyed");
    });
  }

  // ============================================
  // EVENTS
  // ============================================

  getEventHistory(filter?: { type?: GovernanceEventType; entityId?: string }): GovernanceEvent[] {
    return this.events.getHistory(filter);
  }
}

export function createGovernanceService(options?: GovernanceServiceOptions): GovernanceService {
  return new GovernanceService(options);
}
