/**
 * Pool parameter bounds enforced by the AMM.
 */

/** Lowest sqrt price representable (at the minimum tick) */
export const MIN_SQRT_PRICE = 4295128739n;

/** Highest sqrt price representable (at the maximum tick) */
export const MAX_SQRT_PRICE = 1461446703485210103287273052203988822378723970342n;

/** 100% in hundredths of a bip */
export const MAX_LP_FEE = 1_000_000;

export const MIN_TICK_SPACING = 1;
export const MAX_TICK_SPACING = 32_767;

/** sqrt(1) in Q64.96 */
export const SQRT_PRICE_1_1 = 79228162514264337593543950336n;
