/**
 * Pool key construction and pool id derivation.
 */

import { encodeAbiParameters, getAddress, isAddress, keccak256 } from "viem";
import type { Hex } from "viem";
import type { Identity } from "@mintgate/types";
import {
  MAX_LP_FEE,
  MAX_SQRT_PRICE,
  MAX_TICK_SPACING,
  MIN_SQRT_PRICE,
  MIN_TICK_SPACING,
} from "./constants.js";
import { LiquidityError } from "./types.js";
import type { PoolKey } from "./types.js";

const POOL_KEY_ABI = [
  { type: "address" },
  { type: "address" },
  { type: "uint24" },
  { type: "int24" },
  { type: "address" },
] as const;

function normalizeCurrency(value: string): Identity {
  if (!isAddress(value)) {
    throw new LiquidityError(
      "INVALID_POOL_PARAMETERS",
      `'${value}' is not a valid currency address`,
    );
  }
  return getAddress(value);
}

/**
 * Build a validated pool key, sorting the pair so currency0 < currency1.
 */
export function buildPoolKey(
  tokenA: string,
  tokenB: string,
  fee: number,
  tickSpacing: number,
  hooks: Identity,
): PoolKey {
  const a = normalizeCurrency(tokenA);
  const b = normalizeCurrency(tokenB);
  if (a === b) {
    throw new LiquidityError(
      "IDENTICAL_CURRENCIES",
      `Cannot pair ${a} with itself`,
    );
  }
  if (!Number.isInteger(fee) || fee < 0 || fee > MAX_LP_FEE) {
    throw new LiquidityError(
      "INVALID_POOL_PARAMETERS",
      `Fee must be an integer in [0, ${MAX_LP_FEE}], got ${fee}`,
    );
  }
  if (
    !Number.isInteger(tickSpacing) ||
    tickSpacing < MIN_TICK_SPACING ||
    tickSpacing > MAX_TICK_SPACING
  ) {
    throw new LiquidityError(
      "INVALID_POOL_PARAMETERS",
      `Tick spacing must be an integer in [${MIN_TICK_SPACING}, ${MAX_TICK_SPACING}], got ${tickSpacing}`,
    );
  }

  const [currency0, currency1] = BigInt(a) < BigInt(b) ? [a, b] : [b, a];
  return { currency0, currency1, fee, tickSpacing, hooks };
}

export function computePoolId(key: PoolKey): Hex {
  return keccak256(
    encodeAbiParameters(POOL_KEY_ABI, [
      key.currency0,
      key.currency1,
      key.fee,
      key.tickSpacing,
      key.hooks,
    ]),
  );
}

export function assertSqrtPrice(sqrtPriceX96: bigint): void {
  if (sqrtPriceX96 < MIN_SQRT_PRICE || sqrtPriceX96 >= MAX_SQRT_PRICE) {
    throw new LiquidityError(
      "INVALID_POOL_PARAMETERS",
      `sqrtPriceX96 ${sqrtPriceX96} is outside [${MIN_SQRT_PRICE}, ${MAX_SQRT_PRICE})`,
    );
  }
}
