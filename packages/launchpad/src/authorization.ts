/**
 * Authorization policy.
 *
 * Each component checks its caller against an injected policy before
 * every privileged mutation. The default policy compares identities:
 * a caller is allowed when it is one of the permitted principals, or
 * when it is the administrator and the action admits an override.
 */

import { getAddress } from "viem";
import type { Identity } from "@mintgate/types";
import { AuthorizationError } from "./errors.js";
import { toIdentity } from "./identity.js";

export type ProtectedAction =
  | "open_signature_set"
  | "close_signature_set"
  | "execute_creation"
  | "set_coordinator"
  | "set_liquidity_bootstrap";

export interface AuthorizationPolicy {
  /** @throws AuthorizationError UNAUTHORIZED */
  assertAuthorized(
    caller: string,
    action: ProtectedAction,
    permitted: readonly Identity[],
  ): void;
}

/** Actions the administrator may perform on anyone's behalf. */
const ADMIN_OVERRIDABLE: ReadonlySet<ProtectedAction> = new Set([
  "execute_creation",
  "set_coordinator",
  "set_liquidity_bootstrap",
]);

export class CallerIdentityPolicy implements AuthorizationPolicy {
  readonly administrator: Identity;

  constructor(administrator: Identity) {
    this.administrator = getAddress(administrator);
  }

  assertAuthorized(
    caller: string,
    action: ProtectedAction,
    permitted: readonly Identity[],
  ): void {
    const identity = toIdentity(caller);
    if (identity !== undefined) {
      if (permitted.includes(identity)) return;
      if (identity === this.administrator && ADMIN_OVERRIDABLE.has(action)) return;
    }
    throw new AuthorizationError(
      "UNAUTHORIZED",
      `${caller} is not authorized to ${action.replaceAll("_", " ")}`,
    );
  }
}
