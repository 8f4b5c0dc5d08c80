/**
 * Token Types
 *
 * The user-supplied description of a memecoin to create.
 * Supply amounts are bigints in the token's smallest unit.
 */

/**
 * Parameters of a token to deploy once its creation request executes.
 */
export interface TokenSpec {
  readonly name: string;
  readonly symbol: string;

  /** Supply minted at deployment */
  readonly totalSupply: bigint;

  /** Hard cap; only enforced when `supplyCapped` is true */
  readonly maxSupply: bigint;

  readonly mintable: boolean;
  readonly burnable: boolean;
  readonly supplyCapped: boolean;
}
