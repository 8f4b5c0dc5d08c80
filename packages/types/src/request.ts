/**
 * Creation Request Types
 *
 * A creation request is a queued intent to create a token. It waits for
 * approvals from a fixed signer set, then executes exactly once.
 *
 * Lifecycle: pending → executed (terminal).
 */

import type { Hex } from "viem";
import type { Identity } from "./identity.js";
import type { TokenSpec } from "./token.js";

/**
 * Sequential request identifier. Starts at 1; 0 is never a valid id.
 */
export type RequestId = number;

/**
 * Lifecycle states of a creation request.
 */
export type RequestStatus = "pending" | "executed";

/**
 * The factory's durable record of a creation request.
 */
export interface PendingCreationRequest {
  readonly id: RequestId;

  /** Who submitted the request */
  readonly requester: Identity;

  /** Identities entitled to approve, in submission order (immutable) */
  readonly signers: readonly Identity[];

  readonly status: RequestStatus;
  readonly tokenSpec: TokenSpec;

  /** ISO 8601 timestamp of submission */
  readonly submittedAt: string;

  /** Address of the deployed token (set exactly once, on execution) */
  readonly createdTokenAddress?: Identity;

  /** Pool the token was paired into (set with the token address) */
  readonly poolId?: Hex;

  /** Approvals that triggered execution, including the final one */
  readonly approvals?: readonly Identity[];

  /** ISO 8601 timestamp of execution */
  readonly executedAt?: string;
}
