/**
 * Governance Errors
 *
 * Every rejection is a synchronous, named failure of the current call.
 * The entity the call targeted is left unchanged.
 */

import type { z } from "zod";

// ============================================
// ERROR CODES
// ============================================

export type ValidationErrorCode =
  | "InvalidSignerCount"
  | "InvalidThreshold"
  | "DuplicateSigner"
  | "DuplicateSignature"
  | "InvalidAmount"
  | "InvalidTimeLock"
  | "InvalidTransaction"
  | "EmptyTransactions"
  | "TooManyTransactions"
  | "InvalidPeriod"
  | "InvalidPolicyConfig"
  | "InvalidEmergencyThreshold"
  | "TreasuryMismatch"
  | "InvalidInput";

export type AuthorizationErrorCode =
  | "NotAuthorizedSigner"
  | "NotProposalCreator"
  | "NotEmergencySigner";

export type StateErrorCode =
  | "TreasuryFrozen"
  | "AlreadyInEmergency"
  | "NotInEmergency"
  | "CooldownNotExpired"
  | "TimeLockNotExpired"
  | "AlreadyExecuted"
  | "AlreadyCancelled"
  | "AlreadySigned"
  | "ThresholdNotMet"
  | "InvalidProposal"
  | "EmergencyThresholdNotMet"
  | "SignerAlreadyExists"
  | "SignerNotFound"
  | "CannotRemoveLastSigner"
  | "WhitelistEntryNotFound"
  | "PolicyViolation"
  | "ConfigAlreadyExists"
  | "ProposalStillPending"
  | "PendingProposalsExist"
  | "TreasuryNotEmpty"
  | "EntityNotFound";

export type ResourceErrorCode = "InsufficientBalance";

export type GovernanceErrorCode =
  | ValidationErrorCode
  | AuthorizationErrorCode
  | StateErrorCode
  | ResourceErrorCode;

export type GovernanceErrorKind = "validation" | "authorization" | "state" | "resource";

const ERROR_KINDS: Record<GovernanceErrorCode, GovernanceErrorKind> = {
  InvalidSignerCount: "validation",
  InvalidThreshold: "validation",
  DuplicateSigner: "validation",
  DuplicateSignature: "validation",
  InvalidAmount: "validation",
  InvalidTimeLock: "validation",
  InvalidTransaction: "validation",
  EmptyTransactions: "validation",
  TooManyTransactions: "validation",
  InvalidPeriod: "validation",
  InvalidPolicyConfig: "validation",
  InvalidEmergencyThreshold: "validation",
  TreasuryMismatch: "validation",
  InvalidInput: "validation",
  NotAuthorizedSigner: "authorization",
  NotProposalCreator: "authorization",
  NotEmergencySigner: "authorization",
  TreasuryFrozen: "state",
  AlreadyInEmergency: "state",
  NotInEmergency: "state",
  CooldownNotExpired: "state",
  TimeLockNotExpired: "state",
  AlreadyExecuted: "state",
  AlreadyCancelled: "state",
  AlreadySigned: "state",
  ThresholdNotMet: "state",
  InvalidProposal: "state",
  EmergencyThresholdNotMet: "state",
  SignerAlreadyExists: "state",
  SignerNotFound: "state",
  CannotRemoveLastSigner: "state",
  WhitelistEntryNotFound: "state",
  PolicyViolation: "state",
  ConfigAlreadyExists: "state",
  ProposalStillPending: "state",
  PendingProposalsExist: "state",
  TreasuryNotEmpty: "state",
  EntityNotFound: "state",
  InsufficientBalance: "resource",
};

// ============================================
// ERROR CLASS
// ============================================

export class GovernanceError extends Error {
  readonly kind: GovernanceErrorKind;

  constructor(
    public readonly code: GovernanceErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "GovernanceError";
    this.kind = ERROR_KINDS[code];
  }
}

export function isGovernanceError(
  error: unknown,
  code?: GovernanceErrorCode
): error is GovernanceError {
  return error instanceof GovernanceError && (code === undefined || error.code === code);
}

// ============================================
// INPUT VALIDATION
// ============================================

/**
 * Parses a boundary input, rethrowing zod failures as a GovernanceError
 * with the given code.
 */
export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  code: ValidationErrorCode,
  label: string
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    throw new GovernanceError(
      code,
      `Invalid ${label}: ${issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join("; ")}`,
      { issues }
    );
  }
  return result.data;
}
