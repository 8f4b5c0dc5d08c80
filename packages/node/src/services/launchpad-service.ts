/**
 * LaunchpadService — the node's handle on the domain.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly.
 */

import type { Logger } from "pino";
import type { Hex } from "viem";
import type {
  Identity,
  PendingCreationRequest,
  RequestId,
  RequestStatus,
  TokenSpec,
} from "@mintgate/types";
import { Launchpad } from "@mintgate/launchpad";
import type {
  QuorumMode,
  SignatureSet,
  SignResult,
  UnsignResult,
} from "@mintgate/launchpad";
import { InMemoryEventStore } from "@mintgate/event-store";
import type {
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "@mintgate/event-store";
import { LiquidityError } from "@mintgate/liquidity";
import type { PoolState } from "@mintgate/liquidity";
import { AttestationError } from "@mintgate/attestation";
import type { Attestation } from "@mintgate/attestation";

// =============================================================================
// Configuration
// =============================================================================

export interface LaunchpadServiceConfig {
  readonly administrator: Identity;
  readonly factoryAddress: Identity;
  readonly coordinatorAddress: Identity;
  readonly hookAddress: Identity;
  readonly quorum: QuorumMode;
  readonly liquidityThreshold: bigint;
  readonly logger?: Logger;
}

// =============================================================================
// Service
// =============================================================================

export class LaunchpadService {
  readonly launchpad: Launchpad;
  readonly eventStore: InMemoryEventStore;

  private _ready = false;

  constructor(config: LaunchpadServiceConfig) {
    this.eventStore = new InMemoryEventStore();
    const base = {
      administrator: config.administrator,
      factoryAddress: config.factoryAddress,
      coordinatorAddress: config.coordinatorAddress,
      hookAddress: config.hookAddress,
      quorum: config.quorum,
      liquidityThreshold: config.liquidityThreshold,
      events: this.eventStore,
    };
    this.launchpad = new Launchpad(
      config.logger !== undefined ? { ...base, logger: config.logger } : base,
    );
    this._ready = true;
  }

  // ─── Creation Requests ─────────────────────────────────────────────

  submitRequest(requester: Identity, signers: readonly string[], tokenSpec: TokenSpec): PendingCreationRequest {
    const id = this.launchpad.submitCreationRequest(signers, requester, tokenSpec);
    return this.launchpad.getRequest(id);
  }

  getRequest(id: RequestId): PendingCreationRequest {
    return this.launchpad.getRequest(id);
  }

  listRequests(status?: RequestStatus): readonly PendingCreationRequest[] {
    return this.launchpad.listRequests(status);
  }

  executeRequest(caller: Identity, id: RequestId): PendingCreationRequest {
    return this.launchpad.executeCreation(caller, id);
  }

  // ─── Signatures ────────────────────────────────────────────────────

  getSignatureSet(id: RequestId): SignatureSet {
    return this.launchpad.getSignatureSet(id);
  }

  sign(id: RequestId, signer: Identity): SignResult {
    return this.launchpad.sign(id, signer);
  }

  unsign(id: RequestId, signer: Identity): UnsignResult {
    return this.launchpad.unsign(id, signer);
  }

  /**
   * @throws AttestationError ATTESTATION_NOT_FOUND
   */
  getAttestation(id: string): Attestation {
    const attestation = this.launchpad.getAttestation(id);
    if (attestation === undefined) {
      throw new AttestationError("ATTESTATION_NOT_FOUND", `Attestation '${id}' not found`);
    }
    return attestation;
  }

  // ─── Liquidity ─────────────────────────────────────────────────────

  /**
   * @throws LiquidityError POOL_NOT_INITIALIZED
   */
  getPool(poolId: Hex): PoolState {
    const pool = this.launchpad.getPool(poolId);
    if (pool === undefined) {
      throw new LiquidityError("POOL_NOT_INITIALIZED", `Pool ${poolId} is not initialized`);
    }
    return pool;
  }

  addLiquidity(poolId: Hex, provider: Identity, amount: bigint): PoolState {
    return this.launchpad.addLiquidity(poolId, provider, amount);
  }

  removeLiquidity(poolId: Hex, provider: Identity, amount: bigint): PoolState {
    return this.launchpad.removeLiquidity(poolId, provider, amount);
  }

  // ─── Events ────────────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.eventStore.readAll(options);
  }

  readStreamEvents(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    return this.eventStore.read(streamId, options);
  }

  // ─── Health ────────────────────────────────────────────────────────

  verifyEventLog(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  isReady(): boolean {
    return this._ready;
  }

  stop(): void {
    this._ready = false;
  }
}
