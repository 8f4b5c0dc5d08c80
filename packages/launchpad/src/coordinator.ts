/**
 * Signer Coordinator
 *
 * Collects approvals for queued creation requests. When a signature
 * brings a set to its quorum threshold, the coordinator asks the factory
 * to execute the request, and only after the factory commits does it
 * wipe and close the set.
 *
 * Rules:
 * - Only the factory opens sets
 * - Collected signatures are a duplicate-free subset of the eligible signers
 * - A failed execution leaves the set untouched; the signer may retry
 * - Every sign is notarized; notary failures are logged, never fatal
 */

import pino from "pino";
import type { Logger } from "pino";
import type { Identity, RequestId } from "@mintgate/types";
import type { AttestationId, AttestationNotifier } from "@mintgate/attestation";
import type { EventStore, LaunchEventType, SignaturePayload } from "@mintgate/event-store";
import {
  createLaunchEvent,
  LAUNCH_EVENTS,
  requestStreamId,
} from "@mintgate/event-store";
import type { AuthorizationPolicy } from "./authorization.js";
import { AuthorizationError, StateConflictError } from "./errors.js";
import { toIdentity } from "./identity.js";
import { DEFAULT_QUORUM_MODE, requiredApprovals } from "./quorum.js";
import type { QuorumMode } from "./quorum.js";
import { RequestGuard } from "./request-guard.js";
import type {
  CreationExecutor,
  SignatureSet,
  SignatureSetOpener,
  SignResult,
  UnsignResult,
} from "./types.js";

export interface SignerCoordinatorConfig {
  /** The coordinator's own principal, as seen by the factory */
  readonly identity: Identity;
  readonly factory: CreationExecutor;
  readonly authorization: AuthorizationPolicy;
  readonly quorum?: QuorumMode;
  readonly attestation?: AttestationNotifier;
  readonly events?: EventStore;
  readonly logger?: Logger;
}

interface SetRecord {
  readonly requestId: RequestId;
  readonly requester: Identity;
  readonly eligibleSigners: readonly Identity[];
  readonly requiredApprovals: number;
  readonly openedAt: string;
  collected: Identity[];
  status: "open" | "closed";
  closedAt?: string;

  /** Attestation issued for each signer's current signature */
  attestations: Map<Identity, AttestationId>;
}

export class SignerCoordinator implements SignatureSetOpener {
  readonly identity: Identity;
  readonly quorum: QuorumMode;

  private readonly factory: CreationExecutor;
  private readonly authorization: AuthorizationPolicy;
  private readonly attestation: AttestationNotifier | undefined;
  private readonly events: EventStore | undefined;
  private readonly logger: Logger;
  private readonly guard = new RequestGuard("coordinator");
  private readonly sets = new Map<RequestId, SetRecord>();

  constructor(config: SignerCoordinatorConfig) {
    this.identity = config.identity;
    this.factory = config.factory;
    this.authorization = config.authorization;
    this.quorum = config.quorum ?? DEFAULT_QUORUM_MODE;
    this.attestation = config.attestation;
    this.events = config.events;
    this.logger = config.logger ?? pino({ level: "silent" });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Sets
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Start collecting approvals for a request. Replaces any earlier set
   * stored under the same id.
   */
  openSignatureSet(
    caller: string,
    requestId: RequestId,
    requester: Identity,
    signers: readonly Identity[],
  ): SignatureSet {
    this.authorization.assertAuthorized(caller, "open_signature_set", [this.factory.identity]);

    return this.guard.run(requestId, () => {
      const record: SetRecord = {
        requestId,
        requester,
        eligibleSigners: [...signers],
        requiredApprovals: requiredApprovals(this.quorum, signers.length),
        openedAt: new Date().toISOString(),
        collected: [],
        status: "open",
        attestations: new Map(),
      };
      this.sets.set(requestId, record);
      return toSnapshot(record);
    });
  }

  /**
   * Close a set after the factory executed its request, whoever triggered
   * the execution. Closing twice is a no-op.
   *
   * Takes no request lock: on the quorum path the factory calls back here
   * while `sign` still holds it.
   */
  closeSignatureSet(caller: string, requestId: RequestId): void {
    this.authorization.assertAuthorized(caller, "close_signature_set", [this.factory.identity]);
    const record = this.requireSet(requestId);
    if (record.status === "closed") return;
    close(record);
    this.logger.info({ requestId }, "signature set closed");
  }

  getSignatureSet(requestId: RequestId): SignatureSet {
    return toSnapshot(this.requireSet(requestId));
  }

  requiredApprovals(requestId: RequestId): number {
    return this.requireSet(requestId).requiredApprovals;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Signing
  // ───────────────────────────────────────────────────────────────────────

  sign(requestId: RequestId, signer: string): SignResult {
    const outcome = this.guard.run(requestId, () => {
      const record = this.requireSet(requestId);
      const identity = this.requireEligible(record, signer);
      this.assertOpen(record);

      if (record.collected.includes(identity)) {
        throw new StateConflictError(
          "ALREADY_SIGNED",
          `${identity} has already signed request ${requestId}`,
        );
      }

      const approvals = [...record.collected, identity];
      if (approvals.length < record.requiredApprovals) {
        record.collected = approvals;
        return {
          record,
          identity,
          executed: false,
          request: this.factory.getRequest(requestId),
        };
      }

      // Throws on failure, leaving the set as it was.
      const request = this.factory.executeCreation(this.identity, requestId, approvals);

      if (record.status === "open") close(record);
      return { record, identity, executed: true, request };
    });

    const { record, identity, executed, request } = outcome;
    const attestationId = this.attest(record, identity);

    this.emit(requestId, LAUNCH_EVENTS.SIGNATURE_ADDED, identity, {
      requestId,
      signer: identity,
      collected: executed ? record.requiredApprovals : record.collected.length,
      required: record.requiredApprovals,
    } satisfies SignaturePayload);
    if (executed) {
      this.emit(requestId, LAUNCH_EVENTS.QUORUM_REACHED, this.identity, {
        requestId,
        signer: identity,
        collected: record.requiredApprovals,
        required: record.requiredApprovals,
      } satisfies SignaturePayload);
      this.logger.info({ requestId, signer: identity }, "quorum reached, request executed");
    } else {
      this.logger.info(
        { requestId, signer: identity, collected: record.collected.length, required: record.requiredApprovals },
        "signature collected",
      );
    }

    const base = {
      requestId,
      signer: identity,
      executed,
      request,
      collectedSignatures: [...record.collected],
    };
    return attestationId !== undefined ? { ...base, attestationId } : base;
  }

  /**
   * Withdraw a signature from an open set. Remaining signatures keep
   * their order.
   */
  unsign(requestId: RequestId, signer: string): UnsignResult {
    const { record, identity } = this.guard.run(requestId, () => {
      const record = this.requireSet(requestId);
      const identity = this.requireEligible(record, signer);
      this.assertOpen(record);

      if (!record.collected.includes(identity)) {
        throw new StateConflictError(
          "NOT_SIGNED",
          `${identity} has not signed request ${requestId}`,
        );
      }
      record.collected = record.collected.filter((s) => s !== identity);
      return { record, identity };
    });

    const revokedAttestationId = this.revoke(record, identity);

    this.emit(requestId, LAUNCH_EVENTS.SIGNATURE_REMOVED, identity, {
      requestId,
      signer: identity,
      collected: record.collected.length,
      required: record.requiredApprovals,
    } satisfies SignaturePayload);
    this.logger.info({ requestId, signer: identity }, "signature withdrawn");

    const base = {
      requestId,
      signer: identity,
      collectedSignatures: [...record.collected],
    };
    return revokedAttestationId !== undefined ? { ...base, revokedAttestationId } : base;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private requireSet(requestId: RequestId): SetRecord {
    const record = this.sets.get(requestId);
    if (record === undefined) {
      throw new StateConflictError("NOT_FOUND", `No signature set for request ${requestId}`);
    }
    return record;
  }

  private requireEligible(record: SetRecord, signer: string): Identity {
    const identity = toIdentity(signer);
    if (identity === undefined || !record.eligibleSigners.includes(identity)) {
      throw new AuthorizationError(
        "NOT_A_SIGNER",
        `${signer} is not a signer of request ${record.requestId}`,
      );
    }
    return identity;
  }

  private assertOpen(record: SetRecord): void {
    if (
      record.status === "closed" ||
      this.factory.getRequest(record.requestId).status === "executed"
    ) {
      throw new StateConflictError(
        "TRANSACTION_ALREADY_EXECUTED",
        `Request ${record.requestId} has already been executed`,
      );
    }
  }

  private attest(record: SetRecord, signer: Identity): AttestationId | undefined {
    if (this.attestation === undefined) return undefined;
    try {
      const id = this.attestation.recordSignature(record.requestId, signer);
      record.attestations.set(signer, id);
      return id;
    } catch (err) {
      this.logger.warn(
        { err, requestId: record.requestId, signer },
        "attestation failed, signature kept",
      );
      return undefined;
    }
  }

  private revoke(record: SetRecord, signer: Identity): AttestationId | undefined {
    const id = record.attestations.get(signer);
    if (id === undefined || this.attestation === undefined) return undefined;
    record.attestations.delete(signer);
    try {
      this.attestation.revokeSignature(id, "signature withdrawn");
      return id;
    } catch (err) {
      this.logger.warn(
        { err, requestId: record.requestId, signer, attestationId: id },
        "attestation revocation failed",
      );
      return undefined;
    }
  }

  private emit(
    requestId: RequestId,
    type: LaunchEventType,
    actor: Identity,
    payload: Readonly<Record<string, unknown>>,
  ): void {
    if (this.events === undefined) return;
    this.events.append(requestStreamId(requestId), [
      createLaunchEvent(type, payload, {
        actor,
        source: "coordinator",
        correlationId: requestStreamId(requestId),
      }),
    ]);
  }
}

function close(record: SetRecord): void {
  record.collected = [];
  record.status = "closed";
  record.closedAt = new Date().toISOString();
}

function toSnapshot(record: SetRecord): SignatureSet {
  const base = {
    requestId: record.requestId,
    requester: record.requester,
    eligibleSigners: [...record.eligibleSigners],
    collectedSignatures: [...record.collected],
    status: record.status,
    requiredApprovals: record.requiredApprovals,
    openedAt: record.openedAt,
  };
  return record.closedAt !== undefined ? { ...base, closedAt: record.closedAt } : base;
}
