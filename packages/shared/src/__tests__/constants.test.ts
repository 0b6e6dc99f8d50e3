import { describe, it, expect } from "vitest";
import {
  EMERGENCY_DEFAULTS,
  PROPOSAL_CATEGORIES,
  PROPOSAL_LIMITS,
  SPENDING_PERIOD_MS,
  TIME,
} from "../constants/index.js";

describe("Constants", () => {
  describe("SPENDING_PERIOD_MS", () => {
    it("should use fixed-length periods", () => {
      expect(SPENDING_PERIOD_MS.daily).toBe(86_400_000);
      expect(SPENDING_PERIOD_MS.weekly).toBe(604_800_000);
      expect(SPENDING_PERIOD_MS.monthly).toBe(2_592_000_000);
    });
  });

  describe("EMERGENCY_DEFAULTS", () => {
    it("should default to a 66% super-majority and a one day cooldown", () => {
      expect(EMERGENCY_DEFAULTS.supermajorityPercent).toBe(66);
      expect(EMERGENCY_DEFAULTS.cooldownMs).toBe(TIME.dayMs);
    });
  });

  describe("PROPOSAL_LIMITS", () => {
    it("should cap withdrawal batches at 50 transactions", () => {
      expect(PROPOSAL_LIMITS.maxTransactions).toBe(50);
    });
  });

  describe("PROPOSAL_CATEGORIES", () => {
    it("should list every proposal category", () => {
      expect(PROPOSAL_CATEGORIES).toEqual([
        "withdrawal",
        "add_signer",
        "remove_signer",
        "update_threshold",
        "update_policy",
        "emergency",
        "other",
      ]);
    });
  });
});
