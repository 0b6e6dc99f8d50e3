/**
 * Emergency Types
 */

import type { AccountId } from "@quorum/shared";

export type EmergencyAuditAction =
  | "trigger"
  | "freeze"
  | "unfreeze"
  | "add_signer"
  | "remove_signer"
  | "update_threshold";

export interface EmergencyAuditEntry {
  readonly action: EmergencyAuditAction;
  readonly actor: AccountId;
  readonly at: number;
  readonly reason: string;
  readonly signatures: readonly AccountId[];
}

/**
 * Emergency signer set for one treasury. Independent from the treasury's
 * own signers; the threshold never drops below the super-majority floor.
 */
export interface EmergencyConfig {
  readonly id: string;
  readonly treasuryId: string;
  readonly createdAt: number;
  readonly cooldownMs: number;

  signers: AccountId[];
  threshold: number;
  inEmergency: boolean;
  triggeredAt?: number;

  /** Append-only */
  readonly auditLog: EmergencyAuditEntry[];
}
