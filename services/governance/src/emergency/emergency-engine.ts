/**
 * Emergency Engine
 *
 * Super-majority override that freezes a treasury outside the proposal
 * flow. Every gated action needs distinct emergency-signer signatures at
 * or above the config threshold, and is appended to the config's audit log.
 *
 * Unfreezing is only possible once the cooldown measured from the last
 * trigger or freeze has elapsed.
 */

import * as crypto from "crypto";
import {
  accountIdSchema,
  audit,
  durationMsSchema,
  EMERGENCY_DEFAULTS,
  governanceLogger,
  logSecurityEvent,
  signerListSchema,
} from "@quorum/shared";
import type { AccountId } from "@quorum/shared";
import type { CallContext } from "../context.js";
import { GovernanceError, parseInput } from "../errors.js";
import type { EventSink } from "../events/types.js";
import { findDuplicate, type Treasury } from "../treasury/treasury.js";
import type { EmergencyAuditAction, EmergencyAuditEntry, EmergencyConfig } from "./types.js";

const emergencyLogger = governanceLogger.child({ component: "emergency-engine" });

// ============================================
// THRESHOLD FLOOR
// ============================================

/**
 * Smallest allowed emergency threshold for a signer count:
 * max(1, ceil(66% of count)), computed in integers.
 */
export function minimumThreshold(signerCount: number): number {
  const percent = EMERGENCY_DEFAULTS.supermajorityPercent;
  return Math.max(1, Math.floor((percent * signerCount + 99) / 100));
}

function assertThreshold(threshold: number, signerCount: number): void {
  if (!Number.isInteger(threshold) || threshold < 1 || threshold > signerCount) {
    throw new GovernanceError(
      "InvalidThreshold",
      `Threshold must be an integer between 1 and ${signerCount}, got ${threshold}`,
      { threshold, signerCount }
    );
  }
  const floor = minimumThreshold(signerCount);
  if (threshold < floor) {
    throw new GovernanceError(
      "InvalidEmergencyThreshold",
      `Emergency threshold ${threshold} is below the super-majority floor ${floor}`,
      { threshold, minimum: floor }
    );
  }
}

export function cloneEmergencyConfig(config: EmergencyConfig): EmergencyConfig {
  return {
    ...config,
    signers: [...config.signers],
    auditLog: config.auditLog.map((entry) => ({ ...entry, signatures: [...entry.signatures] })),
  };
}

// ============================================
// EMERGENCY ENGINE
// ============================================

export class EmergencyEngine {
  constructor(
    private readonly events: EventSink,
    private readonly defaultCooldownMs: number = EMERGENCY_DEFAULTS.cooldownMs
  ) {}

  create(
    treasuryId: string,
    signers: readonly AccountId[],
    threshold: number,
    ctx: CallContext,
    cooldownMs: number = this.defaultCooldownMs
  ): EmergencyConfig {
    const parsedSigners = parseInput(signerListSchema, signers, "InvalidInput", "emergency signer list");
    const cooldown = parseInput(durationMsSchema, cooldownMs, "InvalidInput", "cooldown");

    if (parsedSigners.length === 0) {
      throw new GovernanceError("InvalidSignerCount", "Emergency config needs at least one signer");
    }
    const duplicate = findDuplicate(parsedSigners);
    if (duplicate !== undefined) {
      throw new GovernanceError("DuplicateSigner", `Emergency signer listed twice: ${duplicate}`, {
        signer: duplicate,
      });
    }
    assertThreshold(threshold, parsedSigners.length);

    const config: EmergencyConfig = {
      id: crypto.randomUUID(),
      treasuryId,
      createdAt: ctx.now,
      cooldownMs: cooldown,
      signers: [...parsedSigners],
      threshold,
      inEmergency: false,
      auditLog: [],
    };

    emergencyLogger.info({
      configId: config.id,
      treasuryId,
      signerCount: parsedSigners.length,
      threshold,
      cooldownMs: cooldown,
    }, "Emergency config created");

    this.events.publish({
      type: "emergency_config_created",
      entityId: config.id,
      actor: ctx.caller,
      timestamp: ctx.now,
      treasuryId,
      signers: [...parsedSigners],
      threshold,
    });

    return config;
  }

  // ============================================
  // SIGNATURE GATE
  // ============================================

  private assertSignatures(
    config: EmergencyConfig,
    signatures: readonly AccountId[],
    treasury?: Treasury
  ): void {
    if (treasury && treasury.id !== config.treasuryId) {
      throw new GovernanceError(
        "TreasuryMismatch",
        `Emergency config ${config.id} belongs to treasury ${config.treasuryId}, not ${treasury.id}`,
        { configId: config.id, treasuryId: treasury.id }
      );
    }

    const seen = new Set<AccountId>();
    for (const signature of signatures) {
      if (!config.signers.includes(signature)) {
        logSecurityEvent("warn", "emergency_signature_rejected", {
          configId: config.id,
          signature,
        }, "Signature from a non-emergency signer");
        throw new GovernanceError("NotEmergencySigner", `${signature} is not an emergency signer`, {
          signer: signature,
        });
      }
      if (seen.has(signature)) {
        throw new GovernanceError("DuplicateSignature", `Signature repeated: ${signature}`, {
          signer: signature,
        });
      }
      seen.add(signature);
    }

    if (signatures.length < config.threshold) {
      throw new GovernanceError(
        "EmergencyThresholdNotMet",
        `Emergency action needs ${config.threshold} signatures, got ${signatures.length}`,
        { signatureCount: signatures.length, threshold: config.threshold }
      );
    }
  }

  private record(
    config: EmergencyConfig,
    action: EmergencyAuditAction,
    reason: string,
    signatures: readonly AccountId[],
    ctx: CallContext
  ): void {
    const entry: EmergencyAuditEntry = {
      action,
      actor: ctx.caller,
      at: ctx.now,
      reason,
      signatures: [...signatures],
    };
    config.auditLog.push(entry);

    audit({
      action: `emergency.${action}`,
      entityType: "emergency",
      entityId: config.id,
      actor: ctx.caller,
      timestamp: ctx.now,
      details: { treasuryId: config.treasuryId, reason, signatures: entry.signatures },
    });
  }

  // ============================================
  // FREEZE / TRIGGER / UNFREEZE
  // ============================================

  /**
   * Freeze the treasury. Re-freezing an already frozen treasury restarts
   * the cooldown.
   */
  freeze(
    config: EmergencyConfig,
    treasury: Treasury,
    reason: string,
    signatures: readonly AccountId[],
    ctx: CallContext
  ): void {
    this.assertSignatures(config, signatures, treasury);

    treasury.freeze(ctx, reason);
    config.inEmergency = true;
    config.triggeredAt = ctx.now;
    this.record(config, "freeze", reason, signatures, ctx);

    logSecurityEvent("warn", "emergency_freeze", {
      configId: config.id,
      treasuryId: treasury.id,
      reason,
      signatureCount: signatures.length,
    }, "Treasury frozen by emergency signers");

    this.events.publish({
      type: "emergency_frozen",
      entityId: config.id,
      actor: ctx.caller,
      timestamp: ctx.now,
      treasuryId: treasury.id,
      reason,
      signatures: [...signatures],
    });
  }

  /**
   * Declare an emergency without freezing. The treasury keeps operating
   * but carries the notice.
   */
  triggerEmergency(
    config: EmergencyConfig,
    treasury: Treasury,
    reason: string,
    signatures: readonly AccountId[],
    ctx: CallContext
  ): void {
    if (config.inEmergency) {
      throw new GovernanceError("AlreadyInEmergency", `Treasury ${config.treasuryId} is already in emergency`);
    }
    this.assertSignatures(config, signatures, treasury);

    config.inEmergency = true;
    config.triggeredAt = ctx.now;
    treasury.noteEmergency(reason, ctx);
    this.record(config, "trigger", reason, signatures, ctx);

    logSecurityEvent("warn", "emergency_triggered", {
      configId: config.id,
      treasuryId: treasury.id,
      reason,
    }, "Emergency triggered");

    this.events.publish({
      type: "emergency_triggered",
      entityId: config.id,
      actor: ctx.caller,
      timestamp: ctx.now,
      treasuryId: treasury.id,
      reason,
      signatures: [...signatures],
    });
  }

  unfreeze(
    config: EmergencyConfig,
    treasury: Treasury,
    signatures: readonly AccountId[],
    ctx: CallContext
  ): void {
    if (!config.inEmergency) {
      throw new GovernanceError("NotInEmergency", `Treasury ${config.treasuryId} is not in emergency`);
    }
    const remaining = this.cooldownRemaining(config, ctx.now);
    if (remaining > 0) {
      throw new GovernanceError(
        "CooldownNotExpired",
        `Emergency cooldown has ${Math.ceil(remaining / 1000)}s remaining`,
        { remainingMs: remaining }
      );
    }
    this.assertSignatures(config, signatures, treasury);

    // A trigger-only emergency never froze the treasury
    if (treasury.isFrozen()) {
      treasury.unfreeze(ctx);
    }
    config.inEmergency = false;
    this.record(config, "unfreeze", "Emergency cleared", signatures, ctx);

    logSecurityEvent("info", "emergency_unfrozen", {
      configId: config.id,
      treasuryId: treasury.id,
    }, "Treasury unfrozen by emergency signers");

    this.events.publish({
      type: "emergency_unfrozen",
      entityId: config.id,
      actor: ctx.caller,
      timestamp: ctx.now,
      treasuryId: treasury.id,
      signatures: [...signatures],
    });
  }

  // ============================================
  // SIGNER MANAGEMENT
  // ============================================

  /**
   * Add an emergency signer. The threshold rises to the new floor when the
   * larger set would put it below.
   */
  addSigner(
    config: EmergencyConfig,
    signer: AccountId,
    signatures: readonly AccountId[],
    ctx: CallContext
  ): void {
    const parsed = parseInput(accountIdSchema, signer, "InvalidInput", "emergency signer");
    this.assertSignatures(config, signatures);
    if (config.signers.includes(parsed)) {
      throw new GovernanceError("SignerAlreadyExists", `Already an emergency signer: ${parsed}`, {
        signer: parsed,
      });
    }

    config.signers.push(parsed);
    config.threshold = Math.max(config.threshold, minimumThreshold(config.signers.length));
    this.record(config, "add_signer", `Added ${parsed}`, signatures, ctx);
    this.publishSignerChange(config, "added", parsed, ctx);
  }

  /**
   * Remove an emergency signer, lowering the threshold to the remaining
   * count when needed
   */
  removeSigner(
    config: EmergencyConfig,
    signer: AccountId,
    signatures: readonly AccountId[],
    ctx: CallContext
  ): void {
    this.assertSignatures(config, signatures);
    if (config.signers.length <= 1) {
      throw new GovernanceError("CannotRemoveLastSigner", "Cannot remove the last emergency signer");
    }
    const index = config.signers.indexOf(signer);
    if (index < 0) {
      throw new GovernanceError("SignerNotFound", `Not an emergency signer: ${signer}`, { signer });
    }

    config.signers.splice(index, 1);
    if (config.threshold > config.signers.length) {
      config.threshold = config.signers.length;
    }
    this.record(config, "remove_signer", `Removed ${signer}`, signatures, ctx);
    this.publishSignerChange(config, "removed", signer, ctx);
  }

  updateThreshold(
    config: EmergencyConfig,
    threshold: number,
    signatures: readonly AccountId[],
    ctx: CallContext
  ): void {
    this.assertSignatures(config, signatures);
    assertThreshold(threshold, config.signers.length);

    const previousThreshold = config.threshold;
    config.threshold = threshold;
    this.record(config, "update_threshold", `Threshold ${previousThreshold} -> ${threshold}`, signatures, ctx);

    emergencyLogger.info({ configId: config.id, previousThreshold, threshold }, "Emergency threshold updated");

    this.events.publish({
      type: "emergency_threshold_updated",
      entityId: config.id,
      actor: ctx.caller,
      timestamp: ctx.now,
      treasuryId: config.treasuryId,
      previousThreshold,
      threshold,
    });
  }

  private publishSignerChange(
    config: EmergencyConfig,
    change: "added" | "removed",
    signer: AccountId,
    ctx: CallContext
  ): void {
    emergencyLogger.info({
      configId: config.id,
      change,
      signer,
      signerCount: config.signers.length,
      threshold: config.threshold,
    }, "Emergency signer set changed");

    this.events.publish({
      type: "emergency_signer_changed",
      entityId: config.id,
      actor: ctx.caller,
      timestamp: ctx.now,
      treasuryId: config.treasuryId,
      change,
      signer,
      signerCount: config.signers.length,
      threshold: config.threshold,
    });
  }

  // ============================================
  // QUERIES
  // ============================================

  minimumThreshold(signerCount: number): number {
    return minimumThreshold(signerCount);
  }

  /**
   * Milliseconds until unfreeze becomes possible; 0 outside an emergency
   */
  cooldownRemaining(config: EmergencyConfig, now: number): number {
    if (!config.inEmergency || config.triggeredAt === undefined) return 0;
    return Math.max(0, config.triggeredAt + config.cooldownMs - now);
  }

  getAuditLog(config: EmergencyConfig): readonly EmergencyAuditEntry[] {
    return [...config.auditLog];
  }
}

export function createEmergencyEngine(events: EventSink, defaultCooldownMs?: number): EmergencyEngine {
  return new EmergencyEngine(events, defaultCooldownMs);
}
