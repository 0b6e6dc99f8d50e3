/**
 * Event Bus and Store Tests
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  createEventBus,
  createGovernanceStore,
  createTreasury,
  GovernanceEventBus,
  type DepositEvent,
} from "../index.js";
import { ctx, expectCode } from "./helpers.js";

const deposit = (entityId: string, amount: bigint): DepositEvent => ({
  type: "deposit",
  entityId,
  actor: "dave",
  timestamp: 1,
  amount,
  balance: amount,
});

// ============================================
// EVENT BUS
// ============================================

describe("GovernanceEventBus", () => {
  let bus: GovernanceEventBus;

  beforeEach(() => {
    bus = createEventBus(3);
  });

  it("should deliver events to typed subscribers", () => {
    const listener = vi.fn();
    bus.subscribe("deposit", listener);

    bus.publish(deposit("t1", 5n));
    bus.publish({ type: "treasury_unfrozen", entityId: "t1", actor: "alice", timestamp: 2 });

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(deposit("t1", 5n));
  });

  it("should stop delivering after unsubscribe", () => {
    const listener = vi.fn();
    const unsubscribe = bus.subscribe("deposit", listener);
    unsubscribe();

    bus.publish(deposit("t1", 5n));
    expect(listener).not.toHaveBeenCalled();
  });

  it("should keep a bounded history", () => {
    for (let i = 1; i <= 5; i++) {
      bus.publish(deposit(`t${i}`, BigInt(i)));
    }

    expect(bus.getHistory().map((event) => event.entityId)).toEqual(["t3", "t4", "t5"]);
  });

  it("should filter history by type and entity", () => {
    bus.publish(deposit("t1", 1n));
    bus.publish(deposit("t2", 2n));
    bus.publish({ type: "treasury_unfrozen", entityId: "t1", actor: "alice", timestamp: 2 });

    expect(bus.getHistory({ entityId: "t1" })).toHaveLength(2);
    expect(bus.getHistory({ type: "deposit", entityId: "t1" })).toEqual([deposit("t1", 1n)]);

    bus.clearHistory();
    expect(bus.getHistory()).toEqual([]);
  });
});

// ============================================
// STORE
// ============================================

describe("GovernanceStore", () => {
  it("should insert, look up and delete entities", () => {
    const store = createGovernanceStore();
    const treasury = createTreasury(["alice"], 1, ctx("alice"), createEventBus());

    store.treasuries.insert(treasury);
    expect(store.treasuries.get(treasury.id)).toBe(treasury);
    expect(store.treasuries.require(treasury.id)).toBe(treasury);
    expect(store.treasuries.size()).toBe(1);

    expect(store.treasuries.delete(treasury.id)).toBe(true);
    expect(store.treasuries.get(treasury.id)).toBeUndefined();
    expectCode(() => store.treasuries.require(treasury.id), "EntityNotFound");
  });

  it("should find configs by treasury", () => {
    const store = createGovernanceStore();
    store.policies.insert({ id: "p1", treasuryId: "t1", createdAt: 0, updatedAt: 0 });
    store.policies.insert({ id: "p2", treasuryId: "t2", createdAt: 0, updatedAt: 0 });

    expect(store.findPolicyByTreasury("t2")?.id).toBe("p2");
    expect(store.findPolicyByTreasury("t3")).toBeUndefined();
    expect(store.findEmergencyByTreasury("t1")).toBeUndefined();
  });
});
