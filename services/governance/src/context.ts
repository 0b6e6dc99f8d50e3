/**
 * Per-call context: who is calling and when.
 *
 * The hosting ledger guarantees the caller is authentic and that `now`
 * never decreases between calls.
 */

import { callContextSchema } from "@quorum/shared";
import type { AccountId } from "@quorum/shared";
import { parseInput } from "./errors.js";

export interface CallContext {
  readonly caller: AccountId;
  /** Millisecond timestamp */
  readonly now: number;
}

export function createCallContext(caller: AccountId, now: number): CallContext {
  return parseInput(callContextSchema, { caller, now }, "InvalidInput", "call context");
}
