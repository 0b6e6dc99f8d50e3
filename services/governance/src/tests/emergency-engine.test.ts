/**
 * Emergency Engine Tests
 *
 * - Super-majority floor
 * - Signature validation
 * - Freeze / trigger / unfreeze with cooldown
 * - Emergency signer management and audit trail
 */

import { describe, it, expect, beforeEach } from "vitest";
import { TIME } from "@quorum/shared";
import {
  createEmergencyEngine,
  createEventBus,
  createTreasury,
  EmergencyEngine,
  GovernanceEventBus,
  minimumThreshold,
  Treasury,
  type EmergencyConfig,
} from "../index.js";
import { ctx, expectCode } from "./helpers.js";

const T0 = 5_000_000;
const GUARDIANS = ["gina", "hank", "ivan"];

describe("minimumThreshold", () => {
  it("should be the ceiling of two thirds rounded up to 66 percent", () => {
    expect(minimumThreshold(1)).toBe(1);
    expect(minimumThreshold(2)).toBe(2);
    expect(minimumThreshold(3)).toBe(2);
    expect(minimumThreshold(4)).toBe(3);
    expect(minimumThreshold(10)).toBe(7);
    expect(minimumThreshold(50)).toBe(33);
  });
});

describe("EmergencyEngine", () => {
  let bus: GovernanceEventBus;
  let engine: EmergencyEngine;
  let treasury: Treasury;

  beforeEach(() => {
    bus = createEventBus();
    engine = createEmergencyEngine(bus);
    treasury = createTreasury(["alice", "bob"], 1, ctx("alice", T0), bus);
  });

  // ============================================
  // CREATION
  // ============================================

  describe("create", () => {
    it("should reject a threshold below the super-majority floor", () => {
      expectCode(() => engine.create(treasury.id, GUARDIANS, 1, ctx("alice", T0)), "InvalidEmergencyThreshold");
    });

    it("should reject a threshold above the signer count", () => {
      expectCode(() => engine.create(treasury.id, GUARDIANS, 4, ctx("alice", T0)), "InvalidThreshold");
    });

    it("should reject empty and duplicated signer sets", () => {
      expectCode(() => engine.create(treasury.id, [], 1, ctx("alice", T0)), "InvalidSignerCount");
      expectCode(() => engine.create(treasury.id, ["gina", "gina"], 2, ctx("alice", T0)), "DuplicateSigner");
    });

    it("should default the cooldown to one day", () => {
      const config = engine.create(treasury.id, GUARDIANS, 2, ctx("alice", T0));

      expect(config.cooldownMs).toBe(TIME.dayMs);
      expect(config.inEmergency).toBe(false);
      expect(config.auditLog).toEqual([]);
      expect(bus.getEventsOfType("emergency_config_created")[0].threshold).toBe(2);
    });
  });

  // ============================================
  // FREEZE / UNFREEZE
  // ============================================

  describe("freeze and unfreeze", () => {
    let config: EmergencyConfig;

    beforeEach(() => {
      config = engine.create(treasury.id, GUARDIANS, 2, ctx("alice", T0));
    });

    it("should freeze with enough signatures and unfreeze after the cooldown", () => {
      engine.freeze(config, treasury, "suspicious outflow", ["gina", "hank"], ctx("gina", T0));

      expect(treasury.isFrozen()).toBe(true);
      expect(config.inEmergency).toBe(true);
      expect(config.triggeredAt).toBe(T0);

      expectCode(
        () => engine.unfreeze(config, treasury, ["gina", "hank"], ctx("gina", T0 + TIME.dayMs - 1)),
        "CooldownNotExpired"
      );
      expect(treasury.isFrozen()).toBe(true);

      engine.unfreeze(config, treasury, ["gina", "hank"], ctx("gina", T0 + TIME.dayMs));
      expect(treasury.isFrozen()).toBe(false);
      expect(config.inEmergency).toBe(false);
    });

    it("should report the remaining cooldown", () => {
      expect(engine.cooldownRemaining(config, T0)).toBe(0);
      engine.freeze(config, treasury, "incident", ["gina", "hank"], ctx("gina", T0));
      expect(engine.cooldownRemaining(config, T0 + 1_000)).toBe(TIME.dayMs - 1_000);
    });

    it("should restart the cooldown when frozen again", () => {
      engine.freeze(config, treasury, "first", ["gina", "hank"], ctx("gina", T0));
      engine.freeze(config, treasury, "second", ["hank", "ivan"], ctx("hank", T0 + 500));

      expect(config.triggeredAt).toBe(T0 + 500);
    });

    it("should reject signatures from outside the emergency set", () => {
      expectCode(
        () => engine.freeze(config, treasury, "x", ["gina", "alice"], ctx("gina", T0)),
        "NotEmergencySigner"
      );
      expect(treasury.isFrozen()).toBe(false);
    });

    it("should reject repeated signatures", () => {
      expectCode(
        () => engine.freeze(config, treasury, "x", ["gina", "gina"], ctx("gina", T0)),
        "DuplicateSignature"
      );
    });

    it("should reject too few signatures", () => {
      expectCode(
        () => engine.freeze(config, treasury, "x", ["gina"], ctx("gina", T0)),
        "EmergencyThresholdNotMet"
      );
    });

    it("should reject another treasury", () => {
      const other = createTreasury(["alice"], 1, ctx("alice", T0), bus);
      expectCode(
        () => engine.freeze(config, other, "x", ["gina", "hank"], ctx("gina", T0)),
        "TreasuryMismatch"
      );
    });

    it("should reject unfreeze outside an emergency", () => {
      expectCode(() => engine.unfreeze(config, treasury, ["gina", "hank"], ctx("gina", T0)), "NotInEmergency");
    });

    it("should append audit entries in order", () => {
      engine.freeze(config, treasury, "incident", ["gina", "hank"], ctx("gina", T0));
      engine.unfreeze(config, treasury, ["hank", "ivan"], ctx("ivan", T0 + TIME.dayMs));

      expect(engine.getAuditLog(config)).toEqual([
        { action: "freeze", actor: "gina", at: T0, reason: "incident", signatures: ["gina", "hank"] },
        {
          action: "unfreeze",
          actor: "ivan",
          at: T0 + TIME.dayMs,
          reason: "Emergency cleared",
          signatures: ["hank", "ivan"],
        },
      ]);
    });
  });

  // ============================================
  // TRIGGER
  // ============================================

  describe("triggerEmergency", () => {
    let config: EmergencyConfig;

    beforeEach(() => {
      config = engine.create(treasury.id, GUARDIANS, 2, ctx("alice", T0), 1_000);
    });

    it("should flag the emergency without freezing", () => {
      engine.triggerEmergency(config, treasury, "key leak", ["gina", "ivan"], ctx("gina", T0));

      expect(config.inEmergency).toBe(true);
      expect(treasury.isFrozen()).toBe(false);
      expect(treasury.snapshot().emergencyNotice).toEqual({ reason: "key leak", at: T0 });
      expect(bus.getEventsOfType("emergency_triggered")).toHaveLength(1);
    });

    it("should reject a second trigger", () => {
      engine.triggerEmergency(config, treasury, "key leak", ["gina", "ivan"], ctx("gina", T0));
      expectCode(
        () => engine.triggerEmergency(config, treasury, "again", ["gina", "ivan"], ctx("gina", T0)),
        "AlreadyInEmergency"
      );
    });

    it("should use the configured cooldown", () => {
      engine.triggerEmergency(config, treasury, "key leak", ["gina", "ivan"], ctx("gina", T0));
      engine.unfreeze(config, treasury, ["gina", "ivan"], ctx("gina", T0 + 1_000));
      expect(config.inEmergency).toBe(false);
    });

    it("should clear a triggered emergency without reporting an unfreeze of the treasury", () => {
      engine.triggerEmergency(config, treasury, "key leak", ["gina", "ivan"], ctx("gina", T0));
      engine.unfreeze(config, treasury, ["gina", "ivan"], ctx("gina", T0 + 1_000));

      expect(treasury.isFrozen()).toBe(false);
      expect(bus.getEventsOfType("emergency_unfrozen")).toHaveLength(1);
      expect(bus.getEventsOfType("treasury_unfrozen")).toHaveLength(0);
    });
  });

  // ============================================
  // SIGNER MANAGEMENT
  // ============================================

  describe("signer management", () => {
    let config: EmergencyConfig;

    beforeEach(() => {
      config = engine.create(treasury.id, GUARDIANS, 2, ctx("alice", T0));
    });

    it("should raise the threshold to the new floor when adding signers", () => {
      engine.addSigner(config, "jill", ["gina", "hank"], ctx("gina", T0));

      expect(config.signers).toEqual(["gina", "hank", "ivan", "jill"]);
      expect(config.threshold).toBe(3);
      expect(bus.getEventsOfType("emergency_signer_changed")[0].threshold).toBe(3);
    });

    it("should lower the threshold when removal leaves too few signers", () => {
      engine.updateThreshold(config, 3, ["gina", "hank"], ctx("gina", T0));
      engine.removeSigner(config, "ivan", ["gina", "hank", "ivan"], ctx("gina", T0));

      expect(config.signers).toEqual(["gina", "hank"]);
      expect(config.threshold).toBe(2);
    });

    it("should refuse to remove the last emergency signer", () => {
      const solo = engine.create(treasury.id, ["gina"], 1, ctx("alice", T0));
      expectCode(() => engine.removeSigner(solo, "gina", ["gina"], ctx("gina", T0)), "CannotRemoveLastSigner");
    });

    it("should keep the threshold above the floor on update", () => {
      expectCode(
        () => engine.updateThreshold(config, 1, ["gina", "hank"], ctx("gina", T0)),
        "InvalidEmergencyThreshold"
      );
      expect(config.threshold).toBe(2);
    });

    it("should reject adding an existing signer", () => {
      expectCode(
        () => engine.addSigner(config, "ivan", ["gina", "hank"], ctx("gina", T0)),
        "SignerAlreadyExists"
      );
    });

    it("should audit signer changes", () => {
      engine.addSigner(config, "jill", ["gina", "hank"], ctx("gina", T0));
      expect(engine.getAuditLog(config).map((entry) => entry.action)).toEqual(["add_signer"]);
    });
  });
});
