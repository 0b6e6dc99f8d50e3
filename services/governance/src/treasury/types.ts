/**
 * Treasury Core Types
 */

import type { AccountId } from "@quorum/shared";

// ============================================
// TREASURY STATE
// ============================================

export interface EmergencyNotice {
  reason: string;
  at: number;
}

/**
 * Immutable view of a treasury at one point in time
 */
export interface TreasurySnapshot {
  readonly id: string;
  readonly signers: readonly AccountId[];
  readonly threshold: number;
  readonly balance: bigint;
  readonly frozen: boolean;
  readonly totalDeposited: bigint;
  readonly totalWithdrawn: bigint;
  readonly createdAt: number;
  readonly emergencyNotice?: EmergencyNotice;
}

// ============================================
// VALUE OUT
// ============================================

/**
 * Value debited from a treasury and owed to a recipient. Produced once per
 * successful withdrawal and handed to a PayoutSink.
 */
export interface Disbursement {
  readonly treasuryId: string;
  readonly recipient: AccountId;
  readonly amount: bigint;
  readonly at: number;
}
