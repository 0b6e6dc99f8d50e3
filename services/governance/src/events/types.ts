/**
 * Governance Event Types
 *
 * One record per successful state transition. Records are the only
 * externally observable audit trail of the engines.
 */

import type { AccountId, ProposalCategory, SpendingPeriod } from "@quorum/shared";

// ============================================
// BASE RECORD
// ============================================

interface EventBase<T extends string> {
  type: T;
  /** Id of the entity whose state changed */
  entityId: string;
  actor: AccountId;
  timestamp: number;
}

// ============================================
// TREASURY EVENTS
// ============================================

export interface TreasuryCreatedEvent extends EventBase<"treasury_created"> {
  signers: AccountId[];
  threshold: number;
}

export interface DepositEvent extends EventBase<"deposit"> {
  amount: bigint;
  balance: bigint;
}

export interface WithdrawalEvent extends EventBase<"withdrawal"> {
  recipient: AccountId;
  amount: bigint;
  balance: bigint;
}

export interface TreasuryFrozenEvent extends EventBase<"treasury_frozen"> {
  reason?: string;
}

export type TreasuryUnfrozenEvent = EventBase<"treasury_unfrozen">;

export interface SignerAddedEvent extends EventBase<"signer_added"> {
  signer: AccountId;
  signerCount: number;
}

export interface SignerRemovedEvent extends EventBase<"signer_removed"> {
  signer: AccountId;
  signerCount: number;
  threshold: number;
  thresholdAdjusted: boolean;
}

export interface ThresholdUpdatedEvent extends EventBase<"threshold_updated"> {
  previousThreshold: number;
  threshold: number;
}

export interface EmergencyNoticeEvent extends EventBase<"emergency_notice"> {
  reason: string;
}

// ============================================
// PROPOSAL EVENTS
// ============================================

export interface ProposalCreatedEvent extends EventBase<"proposal_created"> {
  treasuryId: string;
  category: ProposalCategory;
  title: string;
  timeLockUntil: number;
}

export interface ProposalSignedEvent extends EventBase<"proposal_signed"> {
  treasuryId: string;
  signatureCount: number;
  threshold: number;
}

export interface ProposalExecutedEvent extends EventBase<"proposal_executed"> {
  treasuryId: string;
  category: ProposalCategory;
  totalAmount: bigint;
}

export interface ProposalCancelledEvent extends EventBase<"proposal_cancelled"> {
  treasuryId: string;
  signatureCount: number;
}

// ============================================
// POLICY EVENTS
// ============================================

export type PolicyName =
  | "spending_limit"
  | "whitelist"
  | "category_gate"
  | "amount_tiers"
  | "time_lock_formula";

export interface PolicyCreatedEvent extends EventBase<"policy_created"> {
  treasuryId: string;
}

export interface PolicyUpdatedEvent extends EventBase<"policy_updated"> {
  treasuryId: string;
  policy: PolicyName;
  enabled: boolean;
}

export interface SpendingLimitExceededEvent extends EventBase<"spending_limit_exceeded"> {
  treasuryId: string;
  attempted: bigint;
  spent: bigint;
  limit: bigint;
}

export interface WhitelistViolationEvent extends EventBase<"whitelist_violation"> {
  treasuryId: string;
  recipient: AccountId;
}

export interface SpendingResetEvent extends EventBase<"spending_reset"> {
  treasuryId: string;
  period: SpendingPeriod;
  previousSpent: bigint;
}

export interface SpendingRecordedEvent extends EventBase<"spending_recorded"> {
  treasuryId: string;
  amount: bigint;
  spent: bigint;
}

// ============================================
// EMERGENCY EVENTS
// ============================================

export interface EmergencyConfigCreatedEvent extends EventBase<"emergency_config_created"> {
  treasuryId: string;
  signers: AccountId[];
  threshold: number;
}

export interface EmergencyTriggeredEvent extends EventBase<"emergency_triggered"> {
  treasuryId: string;
  reason: string;
  signatures: AccountId[];
}

export interface EmergencyFrozenEvent extends EventBase<"emergency_frozen"> {
  treasuryId: string;
  reason: string;
  signatures: AccountId[];
}

export interface EmergencyUnfrozenEvent extends EventBase<"emergency_unfrozen"> {
  treasuryId: string;
  signatures: AccountId[];
}

export interface EmergencySignerChangedEvent extends EventBase<"emergency_signer_changed"> {
  treasuryId: string;
  change: "added" | "removed";
  signer: AccountId;
  signerCount: number;
  threshold: number;
}

export interface EmergencyThresholdUpdatedEvent extends EventBase<"emergency_threshold_updated"> {
  treasuryId: string;
  previousThreshold: number;
  threshold: number;
}

// ============================================
// UNION
// ============================================

export type GovernanceEvent =
  | TreasuryCreatedEvent
  | DepositEvent
  | WithdrawalEvent
  | TreasuryFrozenEvent
  | TreasuryUnfrozenEvent
  | SignerAddedEvent
  | SignerRemovedEvent
  | ThresholdUpdatedEvent
  | EmergencyNoticeEvent
  | ProposalCreatedEvent
  | ProposalSignedEvent
  | ProposalExecutedEvent
  | ProposalCancelledEvent
  | PolicyCreatedEvent
  | PolicyUpdatedEvent
  | SpendingLimitExceededEvent
  | WhitelistViolationEvent
  | SpendingResetEvent
  | SpendingRecordedEvent
  | EmergencyConfigCreatedEvent
  | EmergencyTriggeredEvent
  | EmergencyFrozenEvent
  | EmergencyUnfrozenEvent
  | EmergencySignerChangedEvent
  | EmergencyThresholdUpdatedEvent;

export type GovernanceEventType = GovernanceEvent["type"];

export type GovernanceEventOf<K extends GovernanceEventType> = Extract<GovernanceEvent, { type: K }>;

/**
 * Anything that accepts event records. Engines publish through this so
 * they can be driven without a bus in isolation.
 */
export interface EventSink {
  publish(event: GovernanceEvent): void;
}
