/**
 * Shared fixtures for launchpad tests.
 *
 * Addresses are digit-only so their checksummed form equals the literal.
 */

import type { Identity, PendingCreationRequest, RequestId, TokenSpec } from "@mintgate/types";
import { LaunchpadError } from "../src/errors.js";

export const ADMIN: Identity = "0x1000000000000000000000000000000000000001";
export const FACTORY: Identity = "0x2000000000000000000000000000000000000002";
export const COORDINATOR: Identity = "0x3000000000000000000000000000000000000003";
export const HOOK: Identity = "0x4000000000000000000000000000000000000004";
export const REQUESTER: Identity = "0x5555555555555555555555555555555555555555";

export const A: Identity = "0x1111111111111111111111111111111111111111";
export const B: Identity = "0x2222222222222222222222222222222222222222";
export const C: Identity = "0x3333333333333333333333333333333333333333";
export const D: Identity = "0x4444444444444444444444444444444444444444";

export const PEPE: TokenSpec = {
  name: "Pepe Classic",
  symbol: "PEPEC",
  totalSupply: 1_000_000n,
  maxSupply: 10_000_000n,
  mintable: true,
  burnable: false,
  supplyCapped: true,
};

export function pendingRequest(
  id: RequestId,
  signers: readonly Identity[],
): PendingCreationRequest {
  return {
    id,
    requester: REQUESTER,
    signers,
    status: "pending",
    tokenSpec: PEPE,
    submittedAt: "2026-01-01T00:00:00.000Z",
  };
}

/**
 * Run `fn` and return the thrown launchpad error.
 */
export function catchLaunchpadError(fn: () => unknown): LaunchpadError {
  try {
    fn();
  } catch (err) {
    if (err instanceof LaunchpadError) return err;
    throw err;
  }
  throw new Error("expected a LaunchpadError");
}
