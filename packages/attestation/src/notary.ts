/**
 * In-memory notary.
 *
 * Attestation ids are content-addressed: SHA-256 over the RFC 8785
 * canonical form of (schema, request, signer, sequence), truncated to
 * 32 hex chars. The sequence number keeps re-signs distinct.
 *
 * Keeps the latest attestation per signer, which is overwritten on
 * every new sign action and left in place on revocation.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { Identity, RequestId } from "@mintgate/types";
import { AttestationError } from "./types.js";
import type { Attestation, AttestationId, AttestationNotifier } from "./types.js";

const SCHEMA = "mintgate.signature.v1";

export class InMemoryNotary implements AttestationNotifier {
  private readonly attestations = new Map<AttestationId, Attestation>();
  private readonly latestBySigner = new Map<Identity, AttestationId>();
  private sequence = 0;

  recordSignature(requestId: RequestId, signer: Identity): AttestationId {
    this.sequence++;
    const id = createHash("sha256")
      .update(
        canonicalize({
          schema: SCHEMA,
          requestId,
          signer,
          sequence: this.sequence,
        }),
      )
      .digest("hex")
      .slice(0, 32);

    this.attestations.set(id, {
      id,
      requestId,
      signer,
      attestedAt: new Date().toISOString(),
      revoked: false,
    });
    this.latestBySigner.set(signer, id);
    return id;
  }

  revokeSignature(attestationId: AttestationId, reason: string): void {
    const attestation = this.attestations.get(attestationId);
    if (attestation === undefined) {
      throw new AttestationError(
        "ATTESTATION_NOT_FOUND",
        `Attestation '${attestationId}' not found`,
      );
    }
    if (attestation.revoked) {
      throw new AttestationError(
        "ALREADY_REVOKED",
        `Attestation '${attestationId}' is already revoked`,
      );
    }

    this.attestations.set(attestationId, {
      ...attestation,
      revoked: true,
      revokedAt: new Date().toISOString(),
      revocationReason: reason,
    });
  }

  getAttestation(id: AttestationId): Attestation | undefined {
    return this.attestations.get(id);
  }

  /**
   * The attestation issued for `signer`'s most recent sign action.
   */
  latestForSigner(signer: Identity): Attestation | undefined {
    const id = this.latestBySigner.get(signer);
    return id === undefined ? undefined : this.attestations.get(id);
  }

  listForRequest(requestId: RequestId): readonly Attestation[] {
    return [...this.attestations.values()].filter(
      (a) => a.requestId === requestId,
    );
  }

  get count(): number {
    return this.attestations.size;
  }
}
