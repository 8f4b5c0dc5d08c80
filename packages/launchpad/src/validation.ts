/**
 * Creation request validation, in the order failures are reported.
 */

import type { Identity, TokenSpec } from "@mintgate/types";
import { ValidationError } from "./errors.js";
import { toIdentity } from "./identity.js";

export const MIN_SIGNERS = 2;

export interface ValidatedSubmission {
  readonly requester: Identity;
  readonly signers: readonly Identity[];
  readonly tokenSpec: TokenSpec;
}

export function validateSubmission(
  signers: readonly string[],
  requester: string,
  tokenSpec: TokenSpec,
): ValidatedSubmission {
  if (signers.length < MIN_SIGNERS) {
    throw new ValidationError(
      "INVALID_SIGNER_COUNT",
      `At least ${MIN_SIGNERS} signers are required, got ${signers.length}`,
    );
  }

  const normalizedRequester = requireIdentity(requester, "requester");
  const normalizedSigners = signers.map((s) => requireIdentity(s, "signer"));

  const seen = new Set<Identity>();
  for (const signer of normalizedSigners) {
    if (seen.has(signer)) {
      throw new ValidationError("DUPLICATE_SIGNER", `Signer ${signer} is listed twice`);
    }
    seen.add(signer);
  }

  return {
    requester: normalizedRequester,
    signers: normalizedSigners,
    tokenSpec: validateTokenSpec(tokenSpec),
  };
}

/**
 * Check a token spec and return it with name and symbol trimmed.
 */
export function validateTokenSpec(spec: TokenSpec): TokenSpec {
  const name = spec.name.trim();
  const symbol = spec.symbol.trim();

  if (name.length === 0) {
    throw new ValidationError("EMPTY_NAME", "Token name must not be empty");
  }
  if (symbol.length === 0) {
    throw new ValidationError("EMPTY_SYMBOL", "Token symbol must not be empty");
  }
  if (spec.totalSupply <= 0n) {
    throw new ValidationError(
      "INVALID_SUPPLY",
      `Total supply must be positive, got ${spec.totalSupply}`,
    );
  }
  if (spec.supplyCapped && spec.maxSupply < spec.totalSupply) {
    throw new ValidationError(
      "INVALID_SUPPLY",
      `Max supply ${spec.maxSupply} is below total supply ${spec.totalSupply}`,
    );
  }

  return { ...spec, name, symbol };
}

function requireIdentity(value: string, role: string): Identity {
  const identity = toIdentity(value);
  if (identity === undefined) {
    throw new ValidationError("INVALID_IDENTITY", `Invalid ${role} address '${value}'`);
  }
  return identity;
}
