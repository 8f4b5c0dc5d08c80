/**
 * Token Factory
 *
 * Owns the table of creation requests. A request is queued with a fixed
 * signer set, waits while the coordinator collects approvals, and is
 * executed exactly once: the token is deployed and paired into a fresh
 * pool, or nothing changes at all.
 *
 * Rules:
 * - Request ids run from 1 and are never reused
 * - Signers are fixed at submission
 * - pending → executed is the only transition, and it is terminal
 * - Execution commits only after deployment and pool initialization
 *   both succeed; a failed pool initialization reverts the deployment
 * - The coordinator's signature set is closed after every commit
 */

import pino from "pino";
import type { Logger } from "pino";
import type {
  Identity,
  PendingCreationRequest,
  RequestId,
  RequestStatus,
  TokenSpec,
} from "@mintgate/types";
import type { AppendOptions, EventStore } from "@mintgate/event-store";
import {
  createLaunchEvent,
  LAUNCH_EVENTS,
  requestStreamId,
} from "@mintgate/event-store";
import type {
  MemecoinCreatedPayload,
  RequestQueuedPayload,
} from "@mintgate/event-store";
import { LiquidityError } from "@mintgate/liquidity";
import type { PoolInitializer, PoolState } from "@mintgate/liquidity";
import type { AuthorizationPolicy } from "./authorization.js";
import {
  POOL_FEE_TIER,
  POOL_TICK_SPACING,
  REFERENCE_CURRENCY,
  STARTING_SQRT_PRICE_X96,
} from "./constants.js";
import { IntegrationFailure, StateConflictError } from "./errors.js";
import { RequestGuard } from "./request-guard.js";
import type { DeployedToken, TokenDeployer } from "./token-deployer.js";
import type { CreationExecutor, SignatureSetOpener } from "./types.js";
import { validateSubmission } from "./validation.js";

export interface TokenFactoryConfig {
  /** The factory's own principal, as seen by the coordinator */
  readonly identity: Identity;
  readonly authorization: AuthorizationPolicy;
  readonly deployer: TokenDeployer;
  readonly events?: EventStore;
  readonly logger?: Logger;
}

export class TokenFactory implements CreationExecutor {
  readonly identity: Identity;

  private readonly authorization: AuthorizationPolicy;
  private readonly deployer: TokenDeployer;
  private readonly events: EventStore | undefined;
  private readonly logger: Logger;
  private readonly guard = new RequestGuard("factory");
  private readonly requests = new Map<RequestId, PendingCreationRequest>();
  private nextId: RequestId = 1;

  private coordinator: SignatureSetOpener | undefined;
  private liquidity: PoolInitializer | undefined;

  constructor(config: TokenFactoryConfig) {
    this.identity = config.identity;
    this.authorization = config.authorization;
    this.deployer = config.deployer;
    this.events = config.events;
    this.logger = config.logger ?? pino({ level: "silent" });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Wiring
  // ───────────────────────────────────────────────────────────────────────

  setCoordinator(caller: string, coordinator: SignatureSetOpener): void {
    this.authorization.assertAuthorized(caller, "set_coordinator", []);
    this.coordinator = coordinator;
    this.logger.info({ coordinator: coordinator.identity }, "coordinator bound");
  }

  setLiquidityBootstrap(caller: string, bootstrap: PoolInitializer): void {
    this.authorization.assertAuthorized(caller, "set_liquidity_bootstrap", []);
    this.liquidity = bootstrap;
    this.logger.info("liquidity bootstrap bound");
  }

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Queue a creation request and open its signature set.
   *
   * Validation runs before anything is stored. If the coordinator cannot
   * open the set, the record is dropped and its id handed out again.
   */
  submitCreationRequest(
    signers: readonly string[],
    requester: string,
    tokenSpec: TokenSpec,
  ): RequestId {
    const submission = validateSubmission(signers, requester, tokenSpec);

    const coordinator = this.coordinator;
    if (coordinator === undefined) {
      throw new StateConflictError("COORDINATOR_NOT_SET", "No signer coordinator is bound");
    }

    const id = this.nextId;
    const record: PendingCreationRequest = {
      id,
      requester: submission.requester,
      signers: submission.signers,
      status: "pending",
      tokenSpec: submission.tokenSpec,
      submittedAt: new Date().toISOString(),
    };

    this.guard.run(id, () => {
      this.requests.set(id, record);
      this.nextId = id + 1;
      try {
        coordinator.openSignatureSet(this.identity, id, record.requester, record.signers);
        this.emit(id, LAUNCH_EVENTS.REQUEST_QUEUED, record.requester, {
          requestId: id,
          requester: record.requester,
          signers: record.signers,
          name: record.tokenSpec.name,
          symbol: record.tokenSpec.symbol,
          totalSupply: record.tokenSpec.totalSupply.toString(),
        } satisfies RequestQueuedPayload);
      } catch (err) {
        this.requests.delete(id);
        this.nextId = id;
        throw err;
      }
    });

    this.logger.info(
      { requestId: id, requester: record.requester, signers: record.signers.length },
      "creation request queued",
    );
    return id;
  }

  /**
   * Deploy the token and bootstrap its pool.
   *
   * Only the bound coordinator may call this, or the administrator as a
   * recovery path. `approvals` is stored on the record as-is.
   */
  executeCreation(
    caller: string,
    requestId: RequestId,
    approvals: readonly Identity[] = [],
  ): PendingCreationRequest {
    this.authorization.assertAuthorized(
      caller,
      "execute_creation",
      this.coordinator === undefined ? [] : [this.coordinator.identity],
    );

    const { updated, token, pool } = this.guard.run(requestId, () => {
      const record = this.getRequest(requestId);
      if (record.status === "executed") {
        throw new StateConflictError(
          "TRANSACTION_ALREADY_EXECUTED",
          `Request ${requestId} has already been executed`,
        );
      }
      const liquidity = this.liquidity;
      if (liquidity === undefined) {
        throw new StateConflictError(
          "LIQUIDITY_BOOTSTRAP_NOT_SET",
          "No liquidity bootstrap is bound",
        );
      }

      const token = this.deploy(record);
      const pool = this.initializePool(liquidity, token);

      const updated: PendingCreationRequest = {
        ...record,
        status: "executed",
        createdTokenAddress: token.address,
        poolId: pool.id,
        approvals: [...approvals],
        executedAt: new Date().toISOString(),
      };
      this.requests.set(requestId, updated);
      return { updated, token, pool };
    });

    this.closeSignatureSet(requestId);

    this.emit(requestId, LAUNCH_EVENTS.MEMECOIN_CREATED, this.identity, {
      requestId,
      tokenAddress: token.address,
      poolId: pool.id,
      approvals: [...approvals],
    } satisfies MemecoinCreatedPayload);

    this.logger.info(
      { requestId, token: token.address, poolId: pool.id },
      "memecoin created",
    );
    return updated;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getRequest(requestId: RequestId): PendingCreationRequest {
    const record = this.requests.get(requestId);
    if (record === undefined) {
      throw new StateConflictError("NOT_FOUND", `Request ${requestId} not found`);
    }
    return record;
  }

  listRequests(status?: RequestStatus): readonly PendingCreationRequest[] {
    const all = [...this.requests.values()];
    return status === undefined ? all : all.filter((r) => r.status === status);
  }

  get requestCount(): number {
    return this.requests.size;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private closeSignatureSet(requestId: RequestId): void {
    const coordinator = this.coordinator;
    if (coordinator === undefined) return;
    try {
      coordinator.closeSignatureSet(this.identity, requestId);
    } catch (err) {
      // The request is already committed as executed.
      this.logger.warn({ err, requestId }, "signature set could not be closed");
    }
  }

  private deploy(record: PendingCreationRequest): DeployedToken {
    try {
      return this.deployer.deploy(record.tokenSpec, record.id);
    } catch (err) {
      throw new IntegrationFailure(
        "DEPLOYMENT_FAILED",
        `Token deployment for request ${record.id} failed`,
        err,
      );
    }
  }

  private initializePool(liquidity: PoolInitializer, token: DeployedToken): PoolState {
    try {
      return liquidity.initializePool(
        REFERENCE_CURRENCY,
        token.address,
        POOL_FEE_TIER,
        POOL_TICK_SPACING,
        STARTING_SQRT_PRICE_X96,
      );
    } catch (err) {
      this.deployer.revert(token.address);
      this.logger.warn(
        { err, requestId: token.requestId, token: token.address },
        "pool initialization failed, deployment reverted",
      );
      if (
        err instanceof LiquidityError &&
        (err.code === "POOL_ALREADY_INITIALIZED" || err.code === "POOL_NOT_INITIALIZED")
      ) {
        throw new IntegrationFailure(err.code, err.message, err);
      }
      throw new IntegrationFailure(
        "POOL_INITIALIZATION_FAILED",
        `Pool initialization for ${token.address} failed`,
        err,
      );
    }
  }

  private emit(
    requestId: RequestId,
    type: (typeof LAUNCH_EVENTS)["REQUEST_QUEUED" | "MEMECOIN_CREATED"],
    actor: Identity,
    payload: Readonly<Record<string, unknown>>,
  ): void {
    if (this.events === undefined) return;
    // Ids are never reused, so a queued request always opens a new stream.
    const options: AppendOptions | undefined =
      type === LAUNCH_EVENTS.REQUEST_QUEUED ? { expectedVersion: "no_stream" } : undefined;
    this.events.append(
      requestStreamId(requestId),
      [
        createLaunchEvent(type, payload, {
          actor,
          source: "factory",
          correlationId: requestStreamId(requestId),
        }),
      ],
      options,
    );
  }
}
