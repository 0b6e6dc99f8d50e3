/**
 * Payout Port
 *
 * Where withdrawn value goes. The hosting ledger supplies the real
 * implementation; the in-memory ledger serves development and tests.
 */

import type { AccountId } from "@quorum/shared";
import type { Disbursement } from "./types.js";

// ============================================
// PAYOUT SINK INTERFACE
// ============================================

export interface PayoutSink {
  /**
   * Credit a recipient with value debited from a treasury
   */
  credit(disbursement: Disbursement): void;
}

// ============================================
// IN-MEMORY LEDGER
// ============================================

export class InMemoryPayoutLedger implements PayoutSink {
  private readonly credited: Map<AccountId, bigint> = new Map();
  private readonly disbursements: Disbursement[] = [];

  credit(disbursement: Disbursement): void {
    this.disbursements.push(disbursement);
    const previous = this.credited.get(disbursement.recipient) ?? 0n;
    this.credited.set(disbursement.recipient, previous + disbursement.amount);
  }

  getCredited(recipient: AccountId): bigint {
    return this.credited.get(recipient) ?? 0n;
  }

  getDisbursements(): Disbursement[] {
    return [...this.disbursements];
  }

  getTotalPaid(): bigint {
    let total = 0n;
    for (const disbursement of this.disbursements) {
      total += disbursement.amount;
    }
    return total;
  }
}

export function createInMemoryPayoutLedger(): InMemoryPayoutLedger {
  return new InMemoryPayoutLedger();
}
