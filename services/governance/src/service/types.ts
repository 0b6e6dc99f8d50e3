/**
 * Governance Service Types
 */

import type { AccountId, ProposalStatus } from "@quorum/shared";
import type { PayoutSink } from "../treasury/payout.js";
import type { GovernanceConfig } from "../config.js";
import type { GovernanceEventBus } from "../events/event-bus.js";
import type { GovernanceStore } from "../store/governance-store.js";

export interface GovernanceServiceOptions {
  /** Overrides applied on top of the environment */
  config?: Partial<GovernanceConfig>;
  env?: NodeJS.ProcessEnv;
  payouts?: PayoutSink;
  store?: GovernanceStore;
  events?: GovernanceEventBus;
}

export interface ProposalRequest {
  title: string;
  description?: string;
  /** Falls back to the configured default time-lock */
  timeLockMs?: number;
}

export interface ProposalQuery {
  treasuryId?: string;
  status?: ProposalStatus;
  creator?: AccountId;
}
