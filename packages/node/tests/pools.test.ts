/**
 * Tests for pool routes: state lookup, deposits, withdrawals and the
 * vesting threshold (1000 units in the test app).
 */

import { describe, it, expect } from "vitest";
import { zeroAddress } from "viem";
import type { PoolView, RequestView } from "../src/types/dto.js";
import type { AppInstance } from "../src/app.js";
import { A, ADMIN, B, HOOK, as, createTestApp, jsonRequest, submitPepe } from "./setup.js";

interface ErrorBody {
  error: { code: string; message: string };
}

async function launchedPool(app: AppInstance["app"]): Promise<RequestView> {
  await submitPepe(app);
  const res = await app.request(
    jsonRequest("/api/v1/requests/1/execute", "POST", undefined, as(ADMIN)),
  );
  const body = (await res.json()) as { data: RequestView };
  return body.data;
}

function deposit(app: AppInstance["app"], poolId: string, provider: string, amount: string) {
  return app.request(
    jsonRequest(`/api/v1/pools/${poolId}/liquidity`, "POST", { amount }, as(provider)),
  );
}

function withdraw(app: AppInstance["app"], poolId: string, provider: string, amount: string) {
  return app.request(
    jsonRequest(`/api/v1/pools/${poolId}/liquidity/remove`, "POST", { amount }, as(provider)),
  );
}

describe("GET /api/v1/pools/:poolId", () => {
  it("returns the pool bootstrapped for a created token", async () => {
    const { app } = createTestApp();
    const request = await launchedPool(app);

    const res = await app.request(`/api/v1/pools/${request.poolId ?? ""}`);

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: PoolView };
    expect(body.data).toEqual({
      id: request.poolId,
      key: {
        currency0: zeroAddress,
        currency1: request.createdTokenAddress,
        fee: 300,
        tickSpacing: 60,
        hooks: HOOK,
      },
      sqrtPriceX96: "79228162514264337593543950336",
      liquidity: "0",
      positions: [],
      vestingTriggered: false,
      initializedAt: body.data.initializedAt,
    });
  });

  it("returns 404 for an unknown pool", async () => {
    const { app } = createTestApp();
    const res = await app.request(`/api/v1/pools/0x${"0".repeat(64)}`);

    expect(res.status).toBe(404);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("POOL_NOT_INITIALIZED");
  });

  it("returns 400 for a malformed pool id", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/pools/0x12");

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });
});

describe("POST /api/v1/pools/:poolId/liquidity", () => {
  it("records a deposit below the threshold", async () => {
    const { app } = createTestApp();
    const { poolId } = await launchedPool(app);

    const res = await deposit(app, poolId ?? "", A, "600");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: PoolView };
    expect(body.data.liquidity).toBe("600");
    expect(body.data.positions).toEqual([{ provider: A, liquidity: "600" }]);
    expect(body.data.vestingTriggered).toBe(false);
  });

  it("starts vesting when the threshold is reached", async () => {
    const { app } = createTestApp();
    const { poolId } = await launchedPool(app);
    await deposit(app, poolId ?? "", A, "600");

    const res = await deposit(app, poolId ?? "", B, "400");

    const body = (await res.json()) as { data: PoolView };
    expect(body.data.liquidity).toBe("1000");
    expect(body.data.vestingTriggered).toBe(true);
    expect(body.data.positions).toEqual([
      { provider: A, liquidity: "600" },
      { provider: B, liquidity: "400" },
    ]);
  });

  it("rejects a zero amount", async () => {
    const { app } = createTestApp();
    const { poolId } = await launchedPool(app);

    const res = await deposit(app, poolId ?? "", A, "0");

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INVALID_LIQUIDITY_AMOUNT");
  });

  it("rejects a non-numeric amount before reaching the pool", async () => {
    const { app } = createTestApp();
    const { poolId } = await launchedPool(app);

    const res = await deposit(app, poolId ?? "", A, "12.5");

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });
});

describe("POST /api/v1/pools/:poolId/liquidity/remove", () => {
  it("removes an emptied position", async () => {
    const { app } = createTestApp();
    const { poolId } = await launchedPool(app);
    await deposit(app, poolId ?? "", A, "600");
    await deposit(app, poolId ?? "", B, "100");

    const res = await withdraw(app, poolId ?? "", A, "600");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: PoolView };
    expect(body.data.liquidity).toBe("100");
    expect(body.data.positions).toEqual([{ provider: B, liquidity: "100" }]);
  });

  it("returns 409 when withdrawing more than the position holds", async () => {
    const { app } = createTestApp();
    const { poolId } = await launchedPool(app);
    await deposit(app, poolId ?? "", A, "600");

    const res = await withdraw(app, poolId ?? "", A, "700");

    expect(res.status).toBe(409);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INSUFFICIENT_LIQUIDITY");
  });
});
