/**
 * Attestation Types
 *
 * An attestation is an external, notarized record that an identity
 * performed a sign action on a creation request. The launchpad depends
 * only on recording and revoking them; how a notary encodes or anchors
 * them is its own concern.
 */

import type { Identity, RequestId } from "@mintgate/types";

export type AttestationId = string;

/**
 * A notarized sign action.
 */
export interface Attestation {
  readonly id: AttestationId;
  readonly requestId: RequestId;
  readonly signer: Identity;

  /** ISO 8601 timestamp */
  readonly attestedAt: string;

  readonly revoked: boolean;
  readonly revokedAt?: string;
  readonly revocationReason?: string;
}

/**
 * The notary interface the signer coordinator calls into.
 */
export interface AttestationNotifier {
  /** Record that `signer` signed request `requestId`. */
  recordSignature(requestId: RequestId, signer: Identity): AttestationId;

  /** Revoke a previously recorded attestation. */
  revokeSignature(attestationId: AttestationId, reason: string): void;
}

export type AttestationErrorCode =
  | "ATTESTATION_NOT_FOUND"
  | "ALREADY_REVOKED";

export class AttestationError extends Error {
  public readonly code: AttestationErrorCode;
  constructor(code: AttestationErrorCode, message: string) {
    super(message);
    this.name = "AttestationError";
    this.code = code;
  }
}
