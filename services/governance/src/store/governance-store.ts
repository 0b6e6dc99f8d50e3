/**
 * Governance Store
 *
 * In-process arena of treasuries, proposals and configs keyed by id.
 * Cross-entity links are ids only; nothing here enforces referential
 * integrity, the service facade does.
 */

import type { EmergencyConfig } from "../emergency/types.js";
import { GovernanceError } from "../errors.js";
import type { PolicyConfig } from "../policy/types.js";
import type { Proposal } from "../proposal/types.js";
import type { Treasury } from "../treasury/treasury.js";

// ============================================
// ENTITY COLLECTION
// ============================================

export class EntityCollection<T extends { readonly id: string }> {
  private readonly entities: Map<string, T> = new Map();

  constructor(private readonly kind: string) {}

  insert(entity: T): T {
    this.entities.set(entity.id, entity);
    return entity;
  }

  get(id: string): T | undefined {
    return this.entities.get(id);
  }

  require(id: string): T {
    const entity = this.entities.get(id);
    if (!entity) {
      throw new GovernanceError("EntityNotFound", `${this.kind} not found: ${id}`, {
        kind: this.kind,
        id,
      });
    }
    return entity;
  }

  has(id: string): boolean {
    return this.entities.has(id);
  }

  delete(id: string): boolean {
    return this.entities.delete(id);
  }

  list(filter?: (entity: T) => boolean): T[] {
    const all = Array.from(this.entities.values());
    return filter ? all.filter(filter) : all;
  }

  size(): number {
    return this.entities.size;
  }
}

// ============================================
// GOVERNANCE STORE
// ============================================

export class GovernanceStore {
  readonly treasuries = new EntityCollection<Treasury>("Treasury");
  readonly proposals = new EntityCollection<Proposal>("Proposal");
  readonly policies = new EntityCollection<PolicyConfig>("PolicyConfig");
  readonly emergencies = new EntityCollection<EmergencyConfig>("EmergencyConfig");

  findPolicyByTreasury(treasuryId: string): PolicyConfig | undefined {
    return this.policies.list((config) => config.treasuryId === treasuryId)[0];
  }

  findEmergencyByTreasury(treasuryId: string): EmergencyConfig | undefined {
    return this.emergencies.list((config) => config.treasuryId === treasuryId)[0];
  }

  proposalsForTreasury(treasuryId: string): Proposal[] {
    return this.proposals.list((proposal) => proposal.treasuryId === treasuryId);
  }
}

export function createGovernanceStore(): GovernanceStore {
  return new GovernanceStore();
}
