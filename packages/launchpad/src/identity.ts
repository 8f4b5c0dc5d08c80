import { getAddress, isAddress } from "viem";
import type { Identity } from "@mintgate/types";

/**
 * Checksum an address, or return undefined when it is not one.
 */
export function toIdentity(value: string): Identity | undefined {
  return isAddress(value, { strict: false }) ? getAddress(value) : undefined;
}
