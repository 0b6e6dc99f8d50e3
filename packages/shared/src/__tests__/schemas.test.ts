import { describe, it, expect } from "vitest";
import {
  accountIdSchema,
  amountSchema,
  amountTierListSchema,
  envSchema,
  spendingPeriodSchema,
  timeLockFormulaInputSchema,
  transactionItemSchema,
} from "../schemas/index.js";

describe("Schema Validation", () => {
  describe("accountIdSchema", () => {
    it("should accept any non-blank identifier unchanged", () => {
      expect(accountIdSchema.parse("Alice")).toBe("Alice");
    });

    it("should reject empty and blank identifiers", () => {
      expect(() => accountIdSchema.parse("")).toThrow();
      expect(() => accountIdSchema.parse("   ")).toThrow();
    });
  });

  describe("amountSchema", () => {
    it("should accept positive bigints only", () => {
      expect(amountSchema.parse(1n)).toBe(1n);
      expect(() => amountSchema.parse(0n)).toThrow();
      expect(() => amountSchema.parse(5)).toThrow();
    });
  });

  describe("transactionItemSchema", () => {
    it("should accept a valid transaction", () => {
      const item = { recipient: "rita", amount: 10n, description: "invoice 7" };
      expect(transactionItemSchema.parse(item)).toEqual(item);
    });

    it("should reject a zero amount", () => {
      expect(transactionItemSchema.safeParse({ recipient: "rita", amount: 0n, description: "" }).success).toBe(false);
    });
  });

  describe("spendingPeriodSchema", () => {
    it("should only accept known periods", () => {
      expect(spendingPeriodSchema.parse("weekly")).toBe("weekly");
      expect(spendingPeriodSchema.safeParse("yearly").success).toBe(false);
    });
  });

  describe("amountTierListSchema", () => {
    it("should reject duplicated minimum amounts", () => {
      const result = amountTierListSchema.safeParse([
        { minAmount: 100n, requiredSignatures: 1 },
        { minAmount: 100n, requiredSignatures: 2 },
      ]);
      expect(result.success).toBe(false);
    });
  });

  describe("timeLockFormulaInputSchema", () => {
    it("should require a positive divisor", () => {
      expect(timeLockFormulaInputSchema.safeParse({ baseMs: 0, amountDivisor: 0n }).success).toBe(false);
      expect(timeLockFormulaInputSchema.parse({ baseMs: 0, amountDivisor: 1n })).toEqual({ baseMs: 0, amountDivisor: 1n });
    });
  });

  describe("envSchema", () => {
    it("should parse numeric and boolean settings", () => {
      const env = envSchema.parse({ EMERGENCY_COOLDOWN_MS: "1000", POLICY_ENFORCEMENT: "false" });
      expect(env.EMERGENCY_COOLDOWN_MS).toBe(1_000);
      expect(env.POLICY_ENFORCEMENT).toBe(false);
      expect(env.LOG_LEVEL).toBe("info");
    });
  });
});
