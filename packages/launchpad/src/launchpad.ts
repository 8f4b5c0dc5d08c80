/**
 * Launchpad — top-level composition root.
 *
 * Composes:
 * - TokenFactory (request table, execution)
 * - SignerCoordinator (approval collection)
 * - LiquidityBootstrap (pools, threshold, vesting handoff)
 * - InMemoryNotary (signature attestations)
 * - A token deployer and an event store
 *
 * The coordinator gets the factory at construction; the factory gets the
 * coordinator and the bootstrap through the administrator's rebinding.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { Hex } from "viem";
import type {
  Identity,
  PendingCreationRequest,
  RequestId,
  RequestStatus,
  TokenSpec,
} from "@mintgate/types";
import { InMemoryEventStore } from "@mintgate/event-store";
import type { EventStore } from "@mintgate/event-store";
import { InMemoryNotary } from "@mintgate/attestation";
import type { Attestation, AttestationId } from "@mintgate/attestation";
import {
  InMemoryPoolManager,
  InMemoryVestingRegistry,
  LiquidityBootstrap,
} from "@mintgate/liquidity";
import type { PoolManager, PoolState, VestingSink } from "@mintgate/liquidity";
import { CallerIdentityPolicy } from "./authorization.js";
import type { AuthorizationPolicy } from "./authorization.js";
import { DEFAULT_LIQUIDITY_THRESHOLD } from "./constants.js";
import { SignerCoordinator } from "./coordinator.js";
import { TokenFactory } from "./factory.js";
import type { QuorumMode } from "./quorum.js";
import { InMemoryTokenDeployer } from "./token-deployer.js";
import type { TokenDeployer } from "./token-deployer.js";
import type { SignatureSet, SignResult, UnsignResult } from "./types.js";

export interface LaunchpadConfig {
  readonly administrator: Identity;
  readonly factoryAddress: Identity;
  readonly coordinatorAddress: Identity;

  /** Hook address pools are keyed under */
  readonly hookAddress: Identity;

  readonly quorum?: QuorumMode;
  readonly liquidityThreshold?: bigint;

  readonly authorization?: AuthorizationPolicy;
  readonly deployer?: TokenDeployer;
  readonly poolManager?: PoolManager;
  readonly vesting?: VestingSink;
  readonly notary?: InMemoryNotary;
  readonly events?: EventStore;
  readonly logger?: Logger;
}

export class Launchpad {
  readonly config: LaunchpadConfig;
  readonly events: EventStore;
  readonly notary: InMemoryNotary;
  readonly factory: TokenFactory;
  readonly coordinator: SignerCoordinator;
  readonly liquidity: LiquidityBootstrap;

  constructor(config: LaunchpadConfig) {
    this.config = config;
    const logger = config.logger ?? pino({ level: "silent" });
    const authorization = config.authorization ?? new CallerIdentityPolicy(config.administrator);

    this.events = config.events ?? new InMemoryEventStore();
    this.notary = config.notary ?? new InMemoryNotary();

    this.liquidity = new LiquidityBootstrap({
      hookAddress: config.hookAddress,
      poolManager: config.poolManager ?? new InMemoryPoolManager(),
      vesting: config.vesting ?? new InMemoryVestingRegistry(),
      liquidityThreshold: config.liquidityThreshold ?? DEFAULT_LIQUIDITY_THRESHOLD,
      events: this.events,
      logger: logger.child({ component: "liquidity" }),
    });

    this.factory = new TokenFactory({
      identity: config.factoryAddress,
      authorization,
      deployer: config.deployer ?? new InMemoryTokenDeployer(config.factoryAddress),
      events: this.events,
      logger: logger.child({ component: "factory" }),
    });

    const coordinatorBase = {
      identity: config.coordinatorAddress,
      factory: this.factory,
      authorization,
      attestation: this.notary,
      events: this.events,
      logger: logger.child({ component: "coordinator" }),
    };
    this.coordinator = new SignerCoordinator(
      config.quorum !== undefined ? { ...coordinatorBase, quorum: config.quorum } : coordinatorBase,
    );

    this.factory.setCoordinator(config.administrator, this.coordinator);
    this.factory.setLiquidityBootstrap(config.administrator, this.liquidity);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Requests
  // ───────────────────────────────────────────────────────────────────────

  submitCreationRequest(
    signers: readonly string[],
    requester: string,
    tokenSpec: TokenSpec,
  ): RequestId {
    return this.factory.submitCreationRequest(signers, requester, tokenSpec);
  }

  getRequest(requestId: RequestId): PendingCreationRequest {
    return this.factory.getRequest(requestId);
  }

  listRequests(status?: RequestStatus): readonly PendingCreationRequest[] {
    return this.factory.listRequests(status);
  }

  /**
   * Administrator recovery: execute a request without waiting for the
   * coordinator.
   */
  executeCreation(caller: string, requestId: RequestId): PendingCreationRequest {
    return this.factory.executeCreation(caller, requestId);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Signatures
  // ───────────────────────────────────────────────────────────────────────

  sign(requestId: RequestId, signer: string): SignResult {
    return this.coordinator.sign(requestId, signer);
  }

  unsign(requestId: RequestId, signer: string): UnsignResult {
    return this.coordinator.unsign(requestId, signer);
  }

  getSignatureSet(requestId: RequestId): SignatureSet {
    return this.coordinator.getSignatureSet(requestId);
  }

  getAttestation(id: AttestationId): Attestation | undefined {
    return this.notary.getAttestation(id);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Liquidity
  // ───────────────────────────────────────────────────────────────────────

  getPool(poolId: Hex): PoolState | undefined {
    return this.liquidity.getPool(poolId);
  }

  addLiquidity(poolId: Hex, provider: Identity, amount: bigint): PoolState {
    return this.liquidity.addLiquidity(poolId, provider, amount);
  }

  removeLiquidity(poolId: Hex, provider: Identity, amount: bigint): PoolState {
    return this.liquidity.removeLiquidity(poolId, provider, amount);
  }
}
