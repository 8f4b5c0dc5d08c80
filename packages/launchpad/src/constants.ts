/**
 * Protocol-wide parameters of every bootstrapped pool.
 */

import { zeroAddress } from "viem";
import type { Identity } from "@mintgate/types";

/** New tokens are paired with the chain's native currency. */
export const REFERENCE_CURRENCY: Identity = zeroAddress;

/** 0.03%, in hundredths of a bip */
export const POOL_FEE_TIER = 300;

export const POOL_TICK_SPACING = 60;

/** 1:1 starting price, as sqrt(price) in Q64.96 */
export const STARTING_SQRT_PRICE_X96 = 79228162514264337593543950336n;

/** Liquidity at which early providers are handed to vesting (1e18) */
export const DEFAULT_LIQUIDITY_THRESHOLD = 1_000_000_000_000_000_000n;
