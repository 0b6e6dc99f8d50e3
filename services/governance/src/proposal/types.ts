/**
 * Proposal Types
 *
 * The category-specific payload is a union discriminated by category, so a
 * proposal can only carry the payload its category needs.
 */

import type { AccountId, ProposalStatus } from "@quorum/shared";

// ============================================
// TRANSACTIONS
// ============================================

export interface TransactionItem {
  readonly recipient: AccountId;
  readonly amount: bigint;
  readonly description: string;
}

// ============================================
// ACTIONS
// ============================================

export interface WithdrawalAction {
  readonly category: "withdrawal";
  readonly transactions: readonly TransactionItem[];
}

export interface AddSignerAction {
  readonly category: "add_signer";
  readonly signer: AccountId;
}

export interface RemoveSignerAction {
  readonly category: "remove_signer";
  readonly signer: AccountId;
}

export interface UpdateThresholdAction {
  readonly category: "update_threshold";
  readonly threshold: number;
}

export interface UpdatePolicyAction {
  readonly category: "update_policy";
}

export interface EmergencyAction {
  readonly category: "emergency";
}

export interface OtherAction {
  readonly category: "other";
}

export type ProposalAction =
  | WithdrawalAction
  | AddSignerAction
  | RemoveSignerAction
  | UpdateThresholdAction
  | UpdatePolicyAction
  | EmergencyAction
  | OtherAction;

// ============================================
// PROPOSAL
// ============================================

/**
 * A proposal is immutable after creation except for its signature set,
 * status and the stamps written by execute/cancel.
 */
export interface Proposal {
  readonly id: string;
  readonly treasuryId: string;
  readonly creator: AccountId;
  readonly title: string;
  readonly description: string;
  readonly action: ProposalAction;
  readonly createdAt: number;
  readonly timeLockUntil: number;

  signatures: AccountId[];
  status: ProposalStatus;

  executedAt?: number;
  executedBy?: AccountId;
  cancelledAt?: number;
  cancelledBy?: AccountId;
}

export interface ProposalDraft {
  title: string;
  description: string;
  /** Delay between creation and the earliest execution time */
  timeLockMs: number;
}

export interface ReadinessResult {
  ready: boolean;
  reason?: string;
}
