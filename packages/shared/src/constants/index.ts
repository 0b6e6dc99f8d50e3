/**
 * Quorum Constants
 */

// ============================================
// TIME
// ============================================
export const TIME = {
  secondMs: 1_000,
  minuteMs: 60_000,
  hourMs: 3_600_000,
  dayMs: 86_400_000,
} as const;

// ============================================
// PROPOSAL CATEGORIES
// ============================================
export const PROPOSAL_CATEGORIES = [
  "withdrawal",
  "add_signer",
  "remove_signer",
  "update_threshold",
  "update_policy",
  "emergency",
  "other",
] as const;

export type ProposalCategory = (typeof PROPOSAL_CATEGORIES)[number];

export const PROPOSAL_STATUSES = ["pending", "executed", "cancelled"] as const;

export type ProposalStatus = (typeof PROPOSAL_STATUSES)[number];

// ============================================
// PROPOSAL LIMITS
// ============================================
export const PROPOSAL_LIMITS = {
  // Caps the cost of executing one withdrawal batch
  maxTransactions: 50,
  maxTitleLength: 256,
  maxDescriptionLength: 4_096,
} as const;

// ============================================
// SPENDING PERIODS
// ============================================
export const SPENDING_PERIODS = ["daily", "weekly", "monthly"] as const;

export type SpendingPeriod = (typeof SPENDING_PERIODS)[number];

// Monthly is a fixed 30 days, not a calendar month
export const SPENDING_PERIOD_MS: Record<SpendingPeriod, number> = {
  daily: TIME.dayMs,
  weekly: 7 * TIME.dayMs,
  monthly: 30 * TIME.dayMs,
};

// ============================================
// EMERGENCY DEFAULTS
// ============================================
export const EMERGENCY_DEFAULTS = {
  supermajorityPercent: 66,
  cooldownMs: TIME.dayMs,
} as const;

// ============================================
// EVENT BUS
// ============================================
export const EVENT_HISTORY_LIMIT = 10_000;
