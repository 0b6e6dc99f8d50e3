/**
 * Error Tests
 */

import { describe, it, expect } from "vitest";
import { accountIdSchema } from "@quorum/shared";
import { createCallContext, GovernanceError, isGovernanceError, parseInput } from "../index.js";
import { expectCode } from "./helpers.js";

describe("GovernanceError", () => {
  it("should derive the kind from the code", () => {
    expect(new GovernanceError("InvalidAmount", "bad").kind).toBe("validation");
    expect(new GovernanceError("NotEmergencySigner", "no").kind).toBe("authorization");
    expect(new GovernanceError("CooldownNotExpired", "wait").kind).toBe("state");
    expect(new GovernanceError("InsufficientBalance", "short").kind).toBe("resource");
  });

  it("should match by code", () => {
    const error = new GovernanceError("AlreadySigned", "twice");
    expect(isGovernanceError(error)).toBe(true);
    expect(isGovernanceError(error, "AlreadySigned")).toBe(true);
    expect(isGovernanceError(error, "AlreadyExecuted")).toBe(false);
    expect(isGovernanceError(new Error("plain"))).toBe(false);
  });

  it("should rethrow schema failures with the requested code", () => {
    expectCode(() => parseInput(accountIdSchema, "", "InvalidTransaction", "recipient"), "InvalidTransaction");
    expect(parseInput(accountIdSchema, "rita", "InvalidInput", "recipient")).toBe("rita");
  });

  it("should validate call contexts", () => {
    expect(createCallContext("alice", 5)).toEqual({ caller: "alice", now: 5 });
    expectCode(() => createCallContext("alice", -1), "InvalidInput");
  });
});
