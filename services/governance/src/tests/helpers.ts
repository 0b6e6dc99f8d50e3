/**
 * Shared test helpers
 */

import { expect } from "vitest";
import { isGovernanceError, type CallContext, type GovernanceErrorCode } from "../index.js";

export const ctx = (caller: string, now = 1_000): CallContext => ({ caller, now });

/**
 * Assert that fn throws a GovernanceError with the given code
 */
export function expectCode(fn: () => unknown, code: GovernanceErrorCode): void {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  expect(isGovernanceError(caught) ? caught.code : caught).toBe(code);
}
