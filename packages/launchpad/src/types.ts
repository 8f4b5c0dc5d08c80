/**
 * Launchpad Types
 *
 * The signature set kept by the coordinator, and the narrow interfaces
 * the factory and coordinator see of each other.
 */

import type { AttestationId } from "@mintgate/attestation";
import type {
  Identity,
  PendingCreationRequest,
  RequestId,
} from "@mintgate/types";

// =============================================================================
// Signature sets
// =============================================================================

export type SignatureSetStatus = "open" | "closed";

/**
 * Approvals collected for one creation request.
 *
 * Collected signatures are always a subset of the eligible signers and
 * stay below the quorum threshold while the set is open. The set is
 * wiped and closed the moment quorum executes the request.
 */
export interface SignatureSet {
  readonly requestId: RequestId;
  readonly requester: Identity;
  readonly eligibleSigners: readonly Identity[];

  /** In signing order, no duplicates */
  readonly collectedSignatures: readonly Identity[];

  readonly status: SignatureSetStatus;

  /** Quorum threshold for this set */
  readonly requiredApprovals: number;

  readonly openedAt: string;
  readonly closedAt?: string;
}

export interface SignResult {
  readonly requestId: RequestId;
  readonly signer: Identity;

  /** Whether this signature reached quorum and executed the request */
  readonly executed: boolean;

  /** The request after the signature */
  readonly request: PendingCreationRequest;

  /** Signatures collected after this call (empty once executed) */
  readonly collectedSignatures: readonly Identity[];

  /** Absent when the notary could not record the signature */
  readonly attestationId?: AttestationId;
}

export interface UnsignResult {
  readonly requestId: RequestId;
  readonly signer: Identity;
  readonly collectedSignatures: readonly Identity[];
  readonly revokedAttestationId?: AttestationId;
}

// =============================================================================
// Component seams
// =============================================================================

/**
 * What the coordinator needs from the factory.
 */
export interface CreationExecutor {
  readonly identity: Identity;

  executeCreation(
    caller: string,
    requestId: RequestId,
    approvals?: readonly Identity[],
  ): PendingCreationRequest;

  getRequest(requestId: RequestId): PendingCreationRequest;
}

/**
 * What the factory needs from the coordinator.
 */
export interface SignatureSetOpener {
  readonly identity: Identity;

  openSignatureSet(
    caller: string,
    requestId: RequestId,
    requester: Identity,
    signers: readonly Identity[],
  ): SignatureSet;

  /** Wipe and close the set once the factory has executed the request. */
  closeSignatureSet(caller: string, requestId: RequestId): void;
}
