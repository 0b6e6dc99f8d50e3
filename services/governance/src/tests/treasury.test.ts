/**
 * Treasury Core Tests
 *
 * - Creation validation
 * - Deposit / withdraw accounting
 * - Threshold authorization
 * - Signer management with threshold auto-adjustment
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  createEventBus,
  createTreasury,
  GovernanceEventBus,
  Treasury,
} from "../index.js";
import { ctx, expectCode } from "./helpers.js";

// ============================================
// CREATION
// ============================================

describe("Treasury.create", () => {
  let bus: GovernanceEventBus;

  beforeEach(() => {
    bus = createEventBus();
  });

  it("should create a treasury with signers and threshold", () => {
    const treasury = createTreasury(["alice", "bob", "carol"], 2, ctx("alice"), bus);

    const snapshot = treasury.snapshot();
    expect(snapshot.signers).toEqual(["alice", "bob", "carol"]);
    expect(snapshot.threshold).toBe(2);
    expect(snapshot.balance).toBe(0n);
    expect(snapshot.frozen).toBe(false);
    expect(snapshot.createdAt).toBe(1_000);
  });

  it("should publish treasury_created", () => {
    const treasury = createTreasury(["alice"], 1, ctx("alice"), bus);

    const events = bus.getEventsOfType("treasury_created");
    expect(events).toHaveLength(1);
    expect(events[0].entityId).toBe(treasury.id);
    expect(events[0].signers).toEqual(["alice"]);
  });

  it("should reject an empty signer list", () => {
    expectCode(() => createTreasury([], 1, ctx("alice"), bus), "InvalidSignerCount");
  });

  it("should reject a threshold of zero or above the signer count", () => {
    expectCode(() => createTreasury(["alice", "bob"], 0, ctx("alice"), bus), "InvalidThreshold");
    expectCode(() => createTreasury(["alice", "bob"], 3, ctx("alice"), bus), "InvalidThreshold");
    expectCode(() => createTreasury(["alice", "bob"], 1.5, ctx("alice"), bus), "InvalidThreshold");
  });

  it("should reject duplicated signers", () => {
    expectCode(() => createTreasury(["alice", "bob", "alice"], 2, ctx("alice"), bus), "DuplicateSigner");
  });

  it("should reject a blank account identifier", () => {
    expectCode(() => createTreasury(["alice", "  "], 1, ctx("alice"), bus), "InvalidInput");
  });

  it("should publish nothing when creation fails", () => {
    expectCode(() => createTreasury(["alice"], 2, ctx("alice"), bus), "InvalidThreshold");
    expect(bus.getHistory()).toHaveLength(0);
  });
});

// ============================================
// FUNDS
// ============================================

describe("Treasury funds", () => {
  let bus: GovernanceEventBus;
  let treasury: Treasury;

  beforeEach(() => {
    bus = createEventBus();
    treasury = createTreasury(["alice", "bob", "carol"], 2, ctx("alice"), bus);
  });

  it("should restore the balance after deposit then withdraw of the same amount", () => {
    treasury.deposit(500n, ctx("dave"));
    const before = treasury.getBalance();

    treasury.deposit(250n, ctx("dave"));
    treasury.withdraw(250n, "erin", ctx("alice"));

    const snapshot = treasury.snapshot();
    expect(snapshot.balance).toBe(before);
    expect(snapshot.totalDeposited).toBe(750n);
    expect(snapshot.totalWithdrawn).toBe(250n);
  });

  it("should reject non-positive deposits", () => {
    expectCode(() => treasury.deposit(0n, ctx("dave")), "InvalidAmount");
    expectCode(() => treasury.deposit(-5n, ctx("dave")), "InvalidAmount");
  });

  it("should accept deposits while frozen", () => {
    treasury.freeze(ctx("alice"), "incident");
    expect(treasury.deposit(100n, ctx("dave"))).toBe(100n);
  });

  it("should return a disbursement for the recipient", () => {
    treasury.deposit(1_000n, ctx("dave", 10));
    const disbursement = treasury.withdraw(400n, "erin", ctx("alice", 20));

    expect(disbursement).toEqual({ treasuryId: treasury.id, recipient: "erin", amount: 400n, at: 20 });
    expect(treasury.getBalance()).toBe(600n);
  });

  it("should reject withdrawals while frozen", () => {
    treasury.deposit(1_000n, ctx("dave"));
    treasury.freeze(ctx("alice"));
    expectCode(() => treasury.withdraw(1n, "erin", ctx("alice")), "TreasuryFrozen");
  });

  it("should reject withdrawals above the balance", () => {
    treasury.deposit(100n, ctx("dave"));
    expectCode(() => treasury.withdraw(101n, "erin", ctx("alice")), "InsufficientBalance");
    expect(treasury.getBalance()).toBe(100n);
  });

  it("should publish deposit and withdrawal events with the resulting balance", () => {
    treasury.deposit(300n, ctx("dave"));
    treasury.withdraw(100n, "erin", ctx("alice"));

    expect(bus.getEventsOfType("deposit")[0].balance).toBe(300n);
    expect(bus.getEventsOfType("withdrawal")[0].balance).toBe(200n);
  });
});

// ============================================
// AUTHORIZATION
// ============================================

describe("Treasury.canExecute", () => {
  let treasury: Treasury;

  beforeEach(() => {
    treasury = createTreasury(["alice", "bob", "carol"], 2, ctx("alice"), createEventBus());
  });

  it("should authorize when distinct signer signatures reach the threshold", () => {
    expect(treasury.canExecute(["alice", "bob"])).toBe(true);
  });

  it("should count repeated signatures once", () => {
    expect(treasury.canExecute(["alice", "alice"])).toBe(false);
  });

  it("should ignore non-signers", () => {
    expect(treasury.canExecute(["alice", "mallory"])).toBe(false);
    expect(treasury.canExecute(["alice", "mallory", "bob"])).toBe(true);
  });

  it("should refuse while frozen", () => {
    treasury.freeze(ctx("alice"));
    expect(treasury.canExecute(["alice", "bob", "carol"])).toBe(false);
    treasury.unfreeze(ctx("alice"));
    expect(treasury.canExecute(["alice", "bob", "carol"])).toBe(true);
  });
});

// ============================================
// SIGNERS & THRESHOLD
// ============================================

describe("Treasury signer management", () => {
  let bus: GovernanceEventBus;
  let treasury: Treasury;

  beforeEach(() => {
    bus = createEventBus();
    treasury = createTreasury(["alice", "bob", "carol"], 2, ctx("alice"), bus);
  });

  it("should add a signer", () => {
    treasury.addSigner("dave", ctx("alice"));
    expect(treasury.getSigners()).toEqual(["alice", "bob", "carol", "dave"]);
  });

  it("should reject adding an existing signer", () => {
    expectCode(() => treasury.addSigner("bob", ctx("alice")), "SignerAlreadyExists");
  });

  it("should lower the threshold when removals leave too few signers", () => {
    treasury.removeSigner("carol", ctx("alice"));
    expect(treasury.getThreshold()).toBe(2);

    treasury.removeSigner("bob", ctx("alice"));
    expect(treasury.getSigners()).toEqual(["alice"]);
    expect(treasury.getThreshold()).toBe(1);

    const removed = bus.getEventsOfType("signer_removed");
    expect(removed[1].threshold).toBe(1);
    expect(removed[1].thresholdAdjusted).toBe(true);
  });

  it("should refuse to remove the last signer", () => {
    treasury.removeSigner("carol", ctx("alice"));
    treasury.removeSigner("bob", ctx("alice"));
    expectCode(() => treasury.removeSigner("alice", ctx("alice")), "CannotRemoveLastSigner");
  });

  it("should reject removing an unknown signer", () => {
    expectCode(() => treasury.removeSigner("mallory", ctx("alice")), "SignerNotFound");
  });

  it("should keep the threshold within bounds on update", () => {
    treasury.updateThreshold(3, ctx("alice"));
    expect(treasury.getThreshold()).toBe(3);

    expectCode(() => treasury.updateThreshold(4, ctx("alice")), "InvalidThreshold");
    expectCode(() => treasury.updateThreshold(0, ctx("alice")), "InvalidThreshold");
    expect(treasury.getThreshold()).toBe(3);
  });

  it("should record an emergency notice", () => {
    treasury.noteEmergency("key compromise", ctx("bob", 42));
    expect(treasury.snapshot().emergencyNotice).toEqual({ reason: "key compromise", at: 42 });
  });
});
