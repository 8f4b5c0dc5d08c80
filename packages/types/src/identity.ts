/**
 * Identity Types
 *
 * Every actor in Mintgate (requester, signer, factory, coordinator,
 * administrator, liquidity provider) is an EVM account address.
 *
 * Identities are compared by string equality, so every identity that
 * enters the system is normalized to its EIP-55 checksummed form first.
 */

import type { Address } from "viem";

/** A checksummed EVM address acting as a principal. */
export type Identity = Address;
