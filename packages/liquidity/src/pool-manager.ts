/**
 * In-memory PoolManager.
 *
 * Stand-in for the AMM: tracks initialization, price and aggregate
 * liquidity per pool. No swap or tick math.
 */

import type { Hex } from "viem";
import { assertSqrtPrice, computePoolId } from "./pool-key.js";
import { LiquidityError } from "./types.js";
import type { PoolKey, PoolManager } from "./types.js";

interface PoolSlot {
  readonly key: PoolKey;
  readonly sqrtPriceX96: bigint;
  liquidity: bigint;
}

export class InMemoryPoolManager implements PoolManager {
  private readonly pools = new Map<Hex, PoolSlot>();

  initialize(key: PoolKey, sqrtPriceX96: bigint): void {
    assertSqrtPrice(sqrtPriceX96);
    const id = computePoolId(key);
    if (this.pools.has(id)) {
      throw new LiquidityError(
        "POOL_ALREADY_INITIALIZED",
        `Pool ${id} is already initialized`,
      );
    }
    this.pools.set(id, { key, sqrtPriceX96, liquidity: 0n });
  }

  modifyLiquidity(poolId: Hex, delta: bigint): bigint {
    const slot = this.pools.get(poolId);
    if (slot === undefined) {
      throw new LiquidityError(
        "POOL_NOT_INITIALIZED",
        `Pool ${poolId} is not initialized`,
      );
    }
    const next = slot.liquidity + delta;
    if (next < 0n) {
      throw new LiquidityError(
        "INSUFFICIENT_LIQUIDITY",
        `Pool ${poolId} holds ${slot.liquidity}, cannot remove ${-delta}`,
      );
    }
    slot.liquidity = next;
    return next;
  }

  isInitialized(poolId: Hex): boolean {
    return this.pools.has(poolId);
  }

  getLiquidity(poolId: Hex): bigint | undefined {
    return this.pools.get(poolId)?.liquidity;
  }

  getSqrtPrice(poolId: Hex): bigint | undefined {
    return this.pools.get(poolId)?.sqrtPriceX96;
  }
}
