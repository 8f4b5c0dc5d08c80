/**
 * Liquidity Bootstrap
 *
 * Initializes pools for new tokens and watches their liquidity. The first
 * time a pool's total liquidity reaches the configured threshold, the
 * positions contributed up to that point are handed to the VestingSink.
 *
 * Rules:
 * - A pool key is initialized at most once
 * - The vesting handoff fires at most once per pool
 * - A failed handoff rolls the triggering deposit back
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import type { Hex } from "viem";
import type { Identity } from "@mintgate/types";
import type { AppendOptions, EventStore } from "@mintgate/event-store";
import {
  createLaunchEvent,
  LAUNCH_EVENTS,
  poolStreamId,
} from "@mintgate/event-store";
import type {
  LaunchEventType,
  LiquidityChangedPayload,
  PoolInitializedPayload,
  VestingTriggeredPayload,
} from "@mintgate/event-store";
import { assertSqrtPrice, buildPoolKey, computePoolId } from "./pool-key.js";
import { LiquidityError } from "./types.js";
import type {
  LiquidityPosition,
  PoolInitializer,
  PoolKey,
  PoolManager,
  PoolState,
  VestingHandoff,
  VestingSink,
} from "./types.js";

export interface LiquidityBootstrapConfig {
  /** Address the bootstrap is registered under as the pools' hook */
  readonly hookAddress: Identity;
  readonly poolManager: PoolManager;
  readonly vesting: VestingSink;

  /** Total liquidity at which early providers are handed off */
  readonly liquidityThreshold: bigint;

  readonly events?: EventStore;
  readonly logger?: Logger;
}

interface PoolRecord {
  readonly id: Hex;
  readonly key: PoolKey;
  readonly sqrtPriceX96: bigint;
  readonly initializedAt: string;
  readonly correlationId: string;
  liquidity: bigint;
  positions: Map<Identity, bigint>;
  early: Map<Identity, bigint>;
  vestingTriggered: boolean;
}

export class LiquidityBootstrap implements PoolInitializer {
  readonly hookAddress: Identity;
  readonly liquidityThreshold: bigint;

  private readonly poolManager: PoolManager;
  private readonly vesting: VestingSink;
  private readonly events: EventStore | undefined;
  private readonly logger: Logger;
  private readonly pools = new Map<Hex, PoolRecord>();

  constructor(config: LiquidityBootstrapConfig) {
    if (config.liquidityThreshold <= 0n) {
      throw new LiquidityError(
        "INVALID_POOL_PARAMETERS",
        "Liquidity threshold must be positive",
      );
    }
    this.hookAddress = config.hookAddress;
    this.liquidityThreshold = config.liquidityThreshold;
    this.poolManager = config.poolManager;
    this.vesting = config.vesting;
    this.events = config.events;
    this.logger = config.logger ?? pino({ level: "silent" });
  }

  // ─── Pools ──────────────────────────────────────────────────────────

  initializePool(
    tokenA: Identity,
    tokenB: Identity,
    feeTier: number,
    tickSpacing: number,
    startingPrice: bigint,
  ): PoolState {
    const key = buildPoolKey(tokenA, tokenB, feeTier, tickSpacing, this.hookAddress);
    assertSqrtPrice(startingPrice);
    const id = computePoolId(key);

    if (this.pools.has(id) || this.events?.streamExists(poolStreamId(id)) === true) {
      throw new LiquidityError(
        "POOL_ALREADY_INITIALIZED",
        `Pool ${id} is already initialized`,
      );
    }

    this.poolManager.initialize(key, startingPrice);

    const record: PoolRecord = {
      id,
      key,
      sqrtPriceX96: startingPrice,
      initializedAt: new Date().toISOString(),
      correlationId: randomUUID(),
      liquidity: 0n,
      positions: new Map(),
      early: new Map(),
      vestingTriggered: false,
    };
    this.pools.set(id, record);

    this.emit(record, LAUNCH_EVENTS.POOL_INITIALIZED, this.hookAddress, {
      poolId: id,
      currency0: key.currency0,
      currency1: key.currency1,
      fee: key.fee,
      tickSpacing: key.tickSpacing,
      sqrtPriceX96: startingPrice.toString(),
    } satisfies PoolInitializedPayload);

    this.logger.info({ poolId: id, currency0: key.currency0, currency1: key.currency1 }, "pool initialized");
    return this.toState(record);
  }

  getPool(poolId: Hex): PoolState | undefined {
    const record = this.pools.get(poolId);
    return record === undefined ? undefined : this.toState(record);
  }

  listPools(): readonly PoolState[] {
    return [...this.pools.values()].map((r) => this.toState(r));
  }

  /**
   * Pool id the given parameters map to, whether or not it exists.
   */
  poolIdFor(tokenA: Identity, tokenB: Identity, feeTier: number, tickSpacing: number): Hex {
    return computePoolId(buildPoolKey(tokenA, tokenB, feeTier, tickSpacing, this.hookAddress));
  }

  // ─── Liquidity ──────────────────────────────────────────────────────

  addLiquidity(poolId: Hex, provider: Identity, amount: bigint): PoolState {
    const record = this.requirePool(poolId);
    if (amount <= 0n) {
      throw new LiquidityError(
        "INVALID_LIQUIDITY_AMOUNT",
        `Liquidity amount must be positive, got ${amount}`,
      );
    }

    const total = this.poolManager.modifyLiquidity(poolId, amount);
    const crossing = !record.vestingTriggered && total >= this.liquidityThreshold;

    const positions = new Map(record.positions);
    positions.set(provider, (positions.get(provider) ?? 0n) + amount);
    const early = new Map(record.early);
    if (!record.vestingTriggered) {
      early.set(provider, (early.get(provider) ?? 0n) + amount);
    }

    let handoff: VestingHandoff | undefined;
    if (crossing) {
      handoff = {
        poolId,
        key: record.key,
        threshold: this.liquidityThreshold,
        totalLiquidity: total,
        beneficiaries: [...early].map(([p, liquidity]) => ({ provider: p, liquidity })),
        triggeredAt: new Date().toISOString(),
      };
      try {
        this.vesting.beginVesting(handoff);
      } catch (err) {
        this.poolManager.modifyLiquidity(poolId, -amount);
        this.logger.error({ err, poolId }, "vesting handoff failed, deposit rolled back");
        throw err;
      }
    }

    record.liquidity = total;
    record.positions = positions;
    record.early = early;
    if (crossing) record.vestingTriggered = true;

    this.emit(record, LAUNCH_EVENTS.LIQUIDITY_ADDED, provider, {
      poolId,
      provider,
      amount: amount.toString(),
      totalLiquidity: total.toString(),
    } satisfies LiquidityChangedPayload);

    if (handoff !== undefined) {
      this.emit(record, LAUNCH_EVENTS.VESTING_TRIGGERED, this.hookAddress, {
        poolId,
        threshold: this.liquidityThreshold.toString(),
        beneficiaries: handoff.beneficiaries.map((b) => b.provider),
      } satisfies VestingTriggeredPayload);
      this.logger.info(
        { poolId, beneficiaries: handoff.beneficiaries.length },
        "liquidity threshold reached, vesting started",
      );
    }

    return this.toState(record);
  }

  removeLiquidity(poolId: Hex, provider: Identity, amount: bigint): PoolState {
    const record = this.requirePool(poolId);
    if (amount <= 0n) {
      throw new LiquidityError(
        "INVALID_LIQUIDITY_AMOUNT",
        `Liquidity amount must be positive, got ${amount}`,
      );
    }
    const held = record.positions.get(provider) ?? 0n;
    if (held < amount) {
      throw new LiquidityError(
        "INSUFFICIENT_LIQUIDITY",
        `${provider} holds ${held} in pool ${poolId}, cannot remove ${amount}`,
      );
    }

    const total = this.poolManager.modifyLiquidity(poolId, -amount);

    const remaining = held - amount;
    if (remaining === 0n) {
      record.positions.delete(provider);
    } else {
      record.positions.set(provider, remaining);
    }

    // Before the handoff, withdrawals shrink the early position too.
    if (!record.vestingTriggered) {
      const early = (record.early.get(provider) ?? 0n) - amount;
      if (early > 0n) {
        record.early.set(provider, early);
      } else {
        record.early.delete(provider);
      }
    }
    record.liquidity = total;

    this.emit(record, LAUNCH_EVENTS.LIQUIDITY_REMOVED, provider, {
      poolId,
      provider,
      amount: amount.toString(),
      totalLiquidity: total.toString(),
    } satisfies LiquidityChangedPayload);

    return this.toState(record);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private requirePool(poolId: Hex): PoolRecord {
    const record = this.pools.get(poolId);
    if (record === undefined) {
      throw new LiquidityError(
        "POOL_NOT_INITIALIZED",
        `Pool ${poolId} is not initialized`,
      );
    }
    return record;
  }

  private toState(record: PoolRecord): PoolState {
    const positions: LiquidityPosition[] = [...record.positions].map(
      ([provider, liquidity]) => ({ provider, liquidity }),
    );
    return {
      id: record.id,
      key: record.key,
      sqrtPriceX96: record.sqrtPriceX96,
      liquidity: record.liquidity,
      positions,
      vestingTriggered: record.vestingTriggered,
      initializedAt: record.initializedAt,
    };
  }

  private emit(
    record: PoolRecord,
    type: LaunchEventType,
    actor: Identity,
    payload: Readonly<Record<string, unknown>>,
  ): void {
    if (this.events === undefined) return;
    const options: AppendOptions | undefined =
      type === LAUNCH_EVENTS.POOL_INITIALIZED ? { expectedVersion: "no_stream" } : undefined;
    this.events.append(
      poolStreamId(record.id),
      [
        createLaunchEvent(type, payload, {
          actor,
          source: "liquidity",
          correlationId: record.correlationId,
        }),
      ],
      options,
    );
  }
}
