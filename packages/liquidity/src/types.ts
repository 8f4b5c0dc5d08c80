/**
 * Liquidity Types
 *
 * The liquidity bootstrap pairs a freshly created token with a reference
 * currency in a concentrated-liquidity pool, tracks liquidity until the
 * pool crosses its threshold, then hands early providers off to vesting.
 *
 * AMM math belongs to the PoolManager and vesting arithmetic to the
 * VestingSink; both are external collaborators.
 */

import type { Hex } from "viem";
import type { Identity } from "@mintgate/types";

// =============================================================================
// Pools
// =============================================================================

/**
 * Identifies a pool. `currency0` always sorts below `currency1`.
 */
export interface PoolKey {
  readonly currency0: Identity;
  readonly currency1: Identity;

  /** Fee in hundredths of a bip */
  readonly fee: number;

  readonly tickSpacing: number;

  /** Hook contract observing the pool (the bootstrap itself) */
  readonly hooks: Identity;
}

export interface LiquidityPosition {
  readonly provider: Identity;
  readonly liquidity: bigint;
}

/**
 * Snapshot of a bootstrapped pool.
 */
export interface PoolState {
  /** keccak256 of the ABI-encoded key */
  readonly id: Hex;
  readonly key: PoolKey;
  readonly sqrtPriceX96: bigint;

  /** Total liquidity across all positions */
  readonly liquidity: bigint;

  /** Current positions, in order of first contribution */
  readonly positions: readonly LiquidityPosition[];

  /** Whether the threshold was crossed and early providers handed off */
  readonly vestingTriggered: boolean;

  readonly initializedAt: string;
}

// =============================================================================
// Vesting handoff
// =============================================================================

export interface VestingHandoff {
  readonly poolId: Hex;
  readonly key: PoolKey;
  readonly threshold: bigint;

  /** Pool liquidity at the moment the threshold was crossed */
  readonly totalLiquidity: bigint;

  /** Positions contributed before (and including) the crossing one */
  readonly beneficiaries: readonly LiquidityPosition[];

  readonly triggeredAt: string;
}

// =============================================================================
// Collaborators
// =============================================================================

/**
 * The AMM that owns pool math.
 */
export interface PoolManager {
  /** @throws LiquidityError POOL_ALREADY_INITIALIZED */
  initialize(key: PoolKey, sqrtPriceX96: bigint): void;

  /**
   * Apply a signed liquidity delta and return the pool's new liquidity.
   *
   * @throws LiquidityError POOL_NOT_INITIALIZED | INSUFFICIENT_LIQUIDITY
   */
  modifyLiquidity(poolId: Hex, delta: bigint): bigint;
}

/**
 * Receives early providers once a pool crosses its threshold.
 */
export interface VestingSink {
  beginVesting(handoff: VestingHandoff): void;
}

/**
 * The slice of the bootstrap the token factory depends on.
 */
export interface PoolInitializer {
  initializePool(
    tokenA: Identity,
    tokenB: Identity,
    feeTier: number,
    tickSpacing: number,
    startingPrice: bigint,
  ): PoolState;
}

// =============================================================================
// Errors
// =============================================================================

export type LiquidityErrorCode =
  | "POOL_ALREADY_INITIALIZED"
  | "POOL_NOT_INITIALIZED"
  | "IDENTICAL_CURRENCIES"
  | "INVALID_POOL_PARAMETERS"
  | "INVALID_LIQUIDITY_AMOUNT"
  | "INSUFFICIENT_LIQUIDITY"
  | "VESTING_ALREADY_STARTED";

export class LiquidityError extends Error {
  public readonly code: LiquidityErrorCode;
  constructor(code: LiquidityErrorCode, message: string) {
    super(message);
    this.name = "LiquidityError";
    this.code = code;
  }
}
