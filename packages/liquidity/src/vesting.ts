/**
 * In-memory VestingSink: records each handoff and refuses a second one
 * for the same pool.
 */

import type { Hex } from "viem";
import { LiquidityError } from "./types.js";
import type { VestingHandoff, VestingSink } from "./types.js";

export class InMemoryVestingRegistry implements VestingSink {
  private readonly handoffs = new Map<Hex, VestingHandoff>();

  beginVesting(handoff: VestingHandoff): void {
    if (this.handoffs.has(handoff.poolId)) {
      throw new LiquidityError(
        "VESTING_ALREADY_STARTED",
        `Vesting already started for pool ${handoff.poolId}`,
      );
    }
    this.handoffs.set(handoff.poolId, handoff);
  }

  getHandoff(poolId: Hex): VestingHandoff | undefined {
    return this.handoffs.get(poolId);
  }

  listHandoffs(): readonly VestingHandoff[] {
    return [...this.handoffs.values()];
  }
}
