/**
 * Tests for LiquidityBootstrap: initialization, threshold tracking and
 * the one-shot vesting handoff.
 */

import { describe, it, expect, beforeEach } from "vitest";
import fc from "fast-check";
import { zeroAddress } from "viem";
import type { Hex } from "viem";
import { InMemoryEventStore, LAUNCH_EVENTS, poolStreamId } from "@mintgate/event-store";
import { LiquidityBootstrap } from "../src/bootstrap.js";
import { InMemoryPoolManager } from "../src/pool-manager.js";
import { InMemoryVestingRegistry } from "../src/vesting.js";
import { SQRT_PRICE_1_1 } from "../src/constants.js";
import { LiquidityError } from "../src/types.js";
import type { VestingHandoff, VestingSink } from "../src/types.js";

const TOKEN = "0x1111111111111111111111111111111111111111";
const HOOK = "0x9999999999999999999999999999999999999999";
const ALICE = "0xa000000000000000000000000000000000000001";
const BOB = "0xb000000000000000000000000000000000000002";
const CAROL = "0xc000000000000000000000000000000000000003";

const THRESHOLD = 1_000n;

// =============================================================================
// Helpers
// =============================================================================

function catchCode(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (err instanceof LiquidityError) return err.code;
    throw err;
  }
  throw new Error("expected a LiquidityError");
}

class FailingVesting implements VestingSink {
  beginVesting(_handoff: VestingHandoff): void {
    throw new Error("vesting contract unavailable");
  }
}

// =============================================================================
// Tests
// =============================================================================

describe("LiquidityBootstrap", () => {
  let poolManager: InMemoryPoolManager;
  let vesting: InMemoryVestingRegistry;
  let events: InMemoryEventStore;
  let bootstrap: LiquidityBootstrap;

  beforeEach(() => {
    poolManager = new InMemoryPoolManager();
    vesting = new InMemoryVestingRegistry();
    events = new InMemoryEventStore();
    bootstrap = new LiquidityBootstrap({
      hookAddress: HOOK,
      poolManager,
      vesting,
      liquidityThreshold: THRESHOLD,
      events,
    });
  });

  function initPool(): Hex {
    return bootstrap.initializePool(zeroAddress, TOKEN, 300, 60, SQRT_PRICE_1_1).id;
  }

  it("rejects a non-positive threshold", () => {
    expect(() =>
      new LiquidityBootstrap({ hookAddress: HOOK, poolManager, vesting, liquidityThreshold: 0n }),
    ).toThrow(LiquidityError);
  });

  // ─── initializePool ─────────────────────────────────────────────────

  describe("initializePool", () => {
    it("creates an empty pool keyed on the sorted pair", () => {
      const pool = bootstrap.initializePool(TOKEN, zeroAddress, 300, 60, SQRT_PRICE_1_1);

      expect(pool.key.currency0).toBe(zeroAddress);
      expect(pool.key.currency1).toBe(TOKEN);
      expect(pool.key.hooks).toBe(HOOK);
      expect(pool.sqrtPriceX96).toBe(SQRT_PRICE_1_1);
      expect(pool.liquidity).toBe(0n);
      expect(pool.positions).toEqual([]);
      expect(pool.vestingTriggered).toBe(false);
      expect(poolManager.isInitialized(pool.id)).toBe(true);
    });

    it("matches poolIdFor", () => {
      const id = initPool();
      expect(bootstrap.poolIdFor(TOKEN, zeroAddress, 300, 60)).toBe(id);
    });

    it("fails with POOL_ALREADY_INITIALIZED for a known key in either order", () => {
      initPool();
      expect(
        catchCode(() => bootstrap.initializePool(TOKEN, zeroAddress, 300, 60, SQRT_PRICE_1_1)),
      ).toBe("POOL_ALREADY_INITIALIZED");
    });

    it("fails with POOL_ALREADY_INITIALIZED when the AMM already knows the pool", () => {
      const other = new LiquidityBootstrap({
        hookAddress: HOOK,
        poolManager,
        vesting,
        liquidityThreshold: THRESHOLD,
      });
      other.initializePool(zeroAddress, TOKEN, 300, 60, SQRT_PRICE_1_1);

      expect(catchCode(() => initPool())).toBe("POOL_ALREADY_INITIALIZED");
      expect(bootstrap.listPools()).toHaveLength(0);
    });

    it("fails with POOL_ALREADY_INITIALIZED when the event log already has the pool", () => {
      const other = new LiquidityBootstrap({
        hookAddress: HOOK,
        poolManager: new InMemoryPoolManager(),
        vesting,
        liquidityThreshold: THRESHOLD,
        events,
      });
      const id = other.initializePool(zeroAddress, TOKEN, 300, 60, SQRT_PRICE_1_1).id;

      expect(catchCode(() => initPool())).toBe("POOL_ALREADY_INITIALIZED");
      expect(poolManager.isInitialized(id)).toBe(false);
      expect(events.read(poolStreamId(id))).toHaveLength(1);
    });

    it("rejects a starting price outside the AMM bounds", () => {
      expect(
        catchCode(() => bootstrap.initializePool(zeroAddress, TOKEN, 300, 60, 1n)),
      ).toBe("INVALID_POOL_PARAMETERS");
    });

    it("appends pool.initialized to the pool stream", () => {
      const id = initPool();
      const stream = events.read(poolStreamId(id));
      expect(stream.map((e) => e.event.type)).toEqual([LAUNCH_EVENTS.POOL_INITIALIZED]);
      expect(stream[0]?.event.metadata.source).toBe("liquidity");
    });
  });

  // ─── addLiquidity ───────────────────────────────────────────────────

  describe("addLiquidity", () => {
    it("fails for unknown pools", () => {
      const id = bootstrap.poolIdFor(zeroAddress, TOKEN, 300, 60);
      expect(catchCode(() => bootstrap.addLiquidity(id, ALICE, 10n))).toBe(
        "POOL_NOT_INITIALIZED",
      );
    });

    it("rejects non-positive amounts", () => {
      const id = initPool();
      expect(catchCode(() => bootstrap.addLiquidity(id, ALICE, 0n))).toBe(
        "INVALID_LIQUIDITY_AMOUNT",
      );
      expect(catchCode(() => bootstrap.addLiquidity(id, ALICE, -5n))).toBe(
        "INVALID_LIQUIDITY_AMOUNT",
      );
    });

    it("accumulates positions per provider", () => {
      const id = initPool();
      bootstrap.addLiquidity(id, ALICE, 100n);
      bootstrap.addLiquidity(id, BOB, 50n);
      const pool = bootstrap.addLiquidity(id, ALICE, 25n);

      expect(pool.liquidity).toBe(175n);
      expect(pool.positions).toEqual([
        { provider: ALICE, liquidity: 125n },
        { provider: BOB, liquidity: 50n },
      ]);
      expect(poolManager.getLiquidity(id)).toBe(175n);
    });

    it("does not hand off below the threshold", () => {
      const id = initPool();
      bootstrap.addLiquidity(id, ALICE, THRESHOLD - 1n);
      expect(vesting.getHandoff(id)).toBeUndefined();
      expect(bootstrap.getPool(id)?.vestingTriggered).toBe(false);
    });

    it("hands early positions, including the crossing one, to vesting", () => {
      const id = initPool();
      bootstrap.addLiquidity(id, ALICE, 400n);
      const pool = bootstrap.addLiquidity(id, BOB, 600n);

      expect(pool.vestingTriggered).toBe(true);
      const handoff = vesting.getHandoff(id);
      expect(handoff?.threshold).toBe(THRESHOLD);
      expect(handoff?.totalLiquidity).toBe(1_000n);
      expect(handoff?.beneficiaries).toEqual([
        { provider: ALICE, liquidity: 400n },
        { provider: BOB, liquidity: 600n },
      ]);
    });

    it("hands off exactly once", () => {
      const id = initPool();
      bootstrap.addLiquidity(id, ALICE, 1_000n);
      bootstrap.addLiquidity(id, CAROL, 500n);
      bootstrap.addLiquidity(id, ALICE, 2_000n);

      expect(vesting.listHandoffs()).toHaveLength(1);
      expect(vesting.getHandoff(id)?.beneficiaries).toEqual([
        { provider: ALICE, liquidity: 1_000n },
      ]);
    });

    it("counts withdrawals made before the handoff against early positions", () => {
      const id = initPool();
      bootstrap.addLiquidity(id, ALICE, 400n);
      bootstrap.removeLiquidity(id, ALICE, 100n);
      bootstrap.addLiquidity(id, CAROL, 200n);
      bootstrap.removeLiquidity(id, CAROL, 200n);
      bootstrap.addLiquidity(id, BOB, 700n);

      expect(vesting.getHandoff(id)?.beneficiaries).toEqual([
        { provider: ALICE, liquidity: 300n },
        { provider: BOB, liquidity: 700n },
      ]);
    });

    it("rolls the deposit back when the handoff fails", () => {
      const failing = new LiquidityBootstrap({
        hookAddress: HOOK,
        poolManager,
        vesting: new FailingVesting(),
        liquidityThreshold: THRESHOLD,
      });
      const id = failing.initializePool(zeroAddress, TOKEN, 300, 60, SQRT_PRICE_1_1).id;
      failing.addLiquidity(id, ALICE, 100n);

      expect(() => failing.addLiquidity(id, BOB, 900n)).toThrow("vesting contract unavailable");

      const pool = failing.getPool(id);
      expect(pool?.liquidity).toBe(100n);
      expect(pool?.positions).toEqual([{ provider: ALICE, liquidity: 100n }]);
      expect(pool?.vestingTriggered).toBe(false);
      expect(poolManager.getLiquidity(id)).toBe(100n);
    });

    it("records the crossing in the pool stream", () => {
      const id = initPool();
      bootstrap.addLiquidity(id, ALICE, 1_000n);

      expect(events.read(poolStreamId(id)).map((e) => e.event.type)).toEqual([
        LAUNCH_EVENTS.POOL_INITIALIZED,
        LAUNCH_EVENTS.LIQUIDITY_ADDED,
        LAUNCH_EVENTS.VESTING_TRIGGERED,
      ]);
      expect(events.verifyIntegrity().valid).toBe(true);
    });
  });

  // ─── removeLiquidity ────────────────────────────────────────────────

  describe("removeLiquidity", () => {
    it("fails when the provider's position is smaller", () => {
      const id = initPool();
      bootstrap.addLiquidity(id, ALICE, 100n);
      expect(catchCode(() => bootstrap.removeLiquidity(id, ALICE, 101n))).toBe(
        "INSUFFICIENT_LIQUIDITY",
      );
      expect(catchCode(() => bootstrap.removeLiquidity(id, BOB, 1n))).toBe(
        "INSUFFICIENT_LIQUIDITY",
      );
    });

    it("drops an emptied position", () => {
      const id = initPool();
      bootstrap.addLiquidity(id, ALICE, 100n);
      bootstrap.addLiquidity(id, BOB, 100n);
      const pool = bootstrap.removeLiquidity(id, ALICE, 100n);

      expect(pool.liquidity).toBe(100n);
      expect(pool.positions).toEqual([{ provider: BOB, liquidity: 100n }]);
    });

    it("leaves the handoff untouched after vesting started", () => {
      const id = initPool();
      bootstrap.addLiquidity(id, ALICE, 1_200n);
      bootstrap.removeLiquidity(id, ALICE, 1_200n);

      expect(vesting.getHandoff(id)?.beneficiaries).toEqual([
        { provider: ALICE, liquidity: 1_200n },
      ]);
      expect(bootstrap.getPool(id)?.vestingTriggered).toBe(true);
    });
  });

  // ─── Properties ─────────────────────────────────────────────────────

  describe("properties", () => {
    const arbDeposit = fc.record({
      provider: fc.constantFrom<Hex>(ALICE, BOB, CAROL),
      amount: fc.bigInt({ min: 1n, max: 500n }),
    });

    it("hands off at most once, exactly when the threshold is reached", () => {
      fc.assert(
        fc.property(fc.array(arbDeposit, { maxLength: 12 }), (deposits) => {
          const registry = new InMemoryVestingRegistry();
          const subject = new LiquidityBootstrap({
            hookAddress: HOOK,
            poolManager: new InMemoryPoolManager(),
            vesting: registry,
            liquidityThreshold: THRESHOLD,
          });
          const id = subject.initializePool(zeroAddress, TOKEN, 300, 60, SQRT_PRICE_1_1).id;

          for (const { provider, amount } of deposits) {
            subject.addLiquidity(id, provider, amount);
          }

          const total = deposits.reduce((sum, d) => sum + d.amount, 0n);
          const handoffs = registry.listHandoffs();
          expect(handoffs).toHaveLength(total >= THRESHOLD ? 1 : 0);

          const handoff = handoffs[0];
          if (handoff !== undefined) {
            const vested = handoff.beneficiaries.reduce((sum, b) => sum + b.liquidity, 0n);
            expect(vested).toBe(handoff.totalLiquidity);
            expect(handoff.totalLiquidity >= THRESHOLD).toBe(true);
          }
        }),
      );
    });
  });
});
