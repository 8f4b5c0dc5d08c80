/**
 * @mintgate/liquidity — Pool bootstrap, threshold tracking and vesting handoff.
 */

export type {
  PoolKey,
  PoolState,
  LiquidityPosition,
  VestingHandoff,
  PoolManager,
  VestingSink,
  PoolInitializer,
  LiquidityErrorCode,
} from "./types.js";
export { LiquidityError } from "./types.js";

export {
  MIN_SQRT_PRICE,
  MAX_SQRT_PRICE,
  MAX_LP_FEE,
  MIN_TICK_SPACING,
  MAX_TICK_SPACING,
  SQRT_PRICE_1_1,
} from "./constants.js";

export { buildPoolKey, computePoolId, assertSqrtPrice } from "./pool-key.js";
export { InMemoryPoolManager } from "./pool-manager.js";
export { InMemoryVestingRegistry } from "./vesting.js";
export { LiquidityBootstrap } from "./bootstrap.js";
export type { LiquidityBootstrapConfig } from "./bootstrap.js";
